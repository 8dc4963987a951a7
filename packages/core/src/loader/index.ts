import type { RunData } from '../types/run.js';
import { loadMetadata } from './metadata.js';
import { loadSamples } from './samples.js';

export * from './metadata.js';
export * from './samples.js';
export { readRunFile } from './read.js';

/**
 * Loads everything a run directory holds. Missing files yield empty
 * metadata or empty phases; unreadable or corrupt files throw.
 */
export function loadRunData(directory: string): RunData {
  return {
    metadata: loadMetadata(directory),
    samples: loadSamples(directory),
  };
}
