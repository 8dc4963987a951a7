import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import Ajv2020Module from 'ajv/dist/2020.js';
import addFormatsModule from 'ajv-formats';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import { ReportValidationError } from '@qoslens/core';

import type { ComparisonReport } from '../model/comparison.js';

export const COMPARISON_SCHEMA_PATH = fileURLToPath(
  new URL('../schemas/comparison-report-v1.schema.json', import.meta.url)
);

let cachedValidator: ValidateFunction | undefined;

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function getValidator(): ValidateFunction {
  if (cachedValidator) {
    return cachedValidator;
  }
  const schema: unknown = JSON.parse(readFileSync(COMPARISON_SCHEMA_PATH, 'utf8'));
  if (!isSchemaObject(schema)) {
    throw new TypeError(`${COMPARISON_SCHEMA_PATH} is not a JSON Schema object`);
  }
  const ajv = new Ajv2020Module.default({ strict: false, allErrors: true });
  addFormatsModule.default(ajv);
  cachedValidator = ajv.compile(schema);
  return cachedValidator;
}

function describeFailure(error: ErrorObject): string {
  const where = error.instancePath || '/';
  return `${where} ${error.message ?? error.keyword}`;
}

/** Schema failures for `document`, empty when it is a valid comparison report. */
export function validateComparisonDocument(document: unknown): string[] {
  const validate = getValidator();
  if (validate(document)) {
    return [];
  }
  return (validate.errors ?? []).map(describeFailure);
}

/**
 * Pretty-printed JSON form of the comparison. The document is checked
 * against comparison-report/v1 before it is returned.
 */
export function renderJsonReport(report: ComparisonReport): string {
  const serialized = JSON.stringify(report, null, 2);
  const failures = validateComparisonDocument(JSON.parse(serialized));
  if (failures.length > 0) {
    throw new ReportValidationError({
      message: 'Comparison report does not match comparison-report/v1',
      failures,
    });
  }
  return `${serialized}\n`;
}
