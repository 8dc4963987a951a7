import { describe, it, expect } from 'vitest';
/**
 * Tests for the error hierarchy
 */

import {
  AnalysisError,
  ConfigurationError,
  InternalError,
  ReportValidationError,
  RunDataReadError,
  SampleParseError,
  isAnalysisError,
  toAnalysisError,
} from '../errors.js';
import { ErrorCode } from '../../errors/codes.js';

describe('Error Hierarchy', () => {
  describe('AnalysisError base class', () => {
    class TestError extends AnalysisError {
      constructor(message: string) {
        super({ message, errorCode: ErrorCode.INTERNAL_ERROR });
      }
    }

    it('creates error with params object', () => {
      const error = new TestError('Test message');

      expect(error.message).toBe('Test message');
      expect(error.errorCode).toBe(ErrorCode.INTERNAL_ERROR);
      expect(error.severity).toBe('error');
      expect(error.name).toBe('TestError');
      expect(error).toBeInstanceOf(Error);
    });

    it('serializes differently for dev and prod', () => {
      const cause = new Error('EACCES');
      const error = new RunDataReadError({
        message: 'Cannot read metadata.txt',
        path: '/runs/a/metadata.txt',
        cause,
      });

      const devJson = error.toJSON('dev');
      const prodJson = error.toJSON('prod');

      expect(devJson.stack).toBeDefined();
      expect(devJson.cause).toEqual({ name: 'Error', message: 'EACCES' });
      expect(prodJson.stack).toBeUndefined();
      expect(prodJson.context).toEqual({ path: '/runs/a/metadata.txt' });
    });
  });

  describe('subclasses', () => {
    it('maps each subclass to its stable code and exit code', () => {
      const cases: Array<[AnalysisError, ErrorCode, number]> = [
        [new ConfigurationError({ message: 'x' }), ErrorCode.CONFIGURATION_ERROR, 1],
        [
          new ConfigurationError({
            message: 'x',
            errorCode: ErrorCode.RUN_DIRECTORY_NOT_FOUND,
          }),
          ErrorCode.RUN_DIRECTORY_NOT_FOUND,
          1,
        ],
        [
          new SampleParseError({
            message: 'x',
            context: { path: 'f', line: 1, token: 't' },
          }),
          ErrorCode.SAMPLE_PARSE_FAILED,
          2,
        ],
        [new RunDataReadError({ message: 'x', path: 'f' }), ErrorCode.RUN_DATA_READ_FAILED, 3],
        [
          new ReportValidationError({ message: 'x', failures: [] }),
          ErrorCode.REPORT_VALIDATION_FAILED,
          4,
        ],
        [new InternalError('x'), ErrorCode.INTERNAL_ERROR, 99],
      ];

      for (const [error, code, exit] of cases) {
        expect(error.errorCode).toBe(code);
        expect(error.getExitCode()).toBe(exit);
      }
    });
  });

  describe('guards', () => {
    it('isAnalysisError distinguishes plain errors', () => {
      expect(isAnalysisError(new ConfigurationError({ message: 'x' }))).toBe(
        true
      );
      expect(isAnalysisError(new Error('x'))).toBe(false);
      expect(isAnalysisError('x')).toBe(false);
    });

    it('toAnalysisError wraps foreign errors as internal errors', () => {
      const original = new ConfigurationError({ message: 'keep me' });
      expect(toAnalysisError(original)).toBe(original);

      const wrapped = toAnalysisError(new TypeError('boom'));
      expect(wrapped).toBeInstanceOf(InternalError);
      expect(wrapped.message).toBe('boom');
      expect(wrapped.cause?.name).toBe('TypeError');

      expect(toAnalysisError('text failure').message).toBe('text failure');
    });
  });
});
