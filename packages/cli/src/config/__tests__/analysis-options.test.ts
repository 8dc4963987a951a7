import { describe, expect, it } from 'vitest';

import {
  DEFAULT_OUT_DIR,
  resolveAnalysisOptions,
  resolveColors,
  resolveErrorEnv,
} from '../analysis-options.js';

describe('resolveAnalysisOptions', () => {
  it('applies defaults', () => {
    expect(resolveAnalysisOptions({}, {})).toEqual({
      outDir: DEFAULT_OUT_DIR,
      formats: ['text'],
      charts: true,
      labels: { baseline: 'NO FDP', treatment: 'WITH FDP' },
      debug: false,
      colors: false,
      errorEnv: 'dev',
    });
  });

  it('takes the output directory from the environment', () => {
    expect(resolveAnalysisOptions({}, { QOSLENS_OUT_DIR: ' /tmp/qos ' }).outDir).toBe(
      '/tmp/qos'
    );
    expect(resolveAnalysisOptions({}, { QOSLENS_OUT_DIR: '' }).outDir).toBe(
      DEFAULT_OUT_DIR
    );
  });

  it('prefers command-line values over the environment', () => {
    const options = resolveAnalysisOptions(
      {
        outDir: 'reports',
        format: 'json',
        charts: false,
        baselineLabel: 'before',
        treatmentLabel: 'after',
        debug: true,
      },
      { QOSLENS_OUT_DIR: '/tmp/qos', NODE_ENV: 'production' }
    );

    expect(options).toEqual({
      outDir: 'reports',
      formats: ['text', 'json'],
      charts: false,
      labels: { baseline: 'before', treatment: 'after' },
      debug: true,
      colors: false,
      errorEnv: 'prod',
    });
  });
});

describe('resolveColors', () => {
  it('needs a TTY', () => {
    expect(resolveColors({}, {}, true)).toBe(true);
    expect(resolveColors({}, {}, false)).toBe(false);
  });

  it('honours --no-color and NO_COLOR', () => {
    expect(resolveColors({ color: false }, {}, true)).toBe(false);
    expect(resolveColors({}, { NO_COLOR: '1' }, true)).toBe(false);
    expect(resolveColors({}, { NO_COLOR: '0' }, true)).toBe(true);
  });
});

describe('resolveErrorEnv', () => {
  it('maps NODE_ENV=production to prod', () => {
    expect(resolveErrorEnv({ NODE_ENV: 'production' })).toBe('prod');
    expect(resolveErrorEnv({ NODE_ENV: 'test' })).toBe('dev');
  });
});
