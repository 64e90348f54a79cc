import { describe, expect, it } from 'vitest';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({ jsonIndent: 2, minBatchSize: 50 });
    expect(loadConfig({ PO_JSON_INDENT: '', PO_MIN_BATCH_SIZE: '' })).toEqual({ jsonIndent: 2, minBatchSize: 50 });
  });

  it('reads numbers from the environment', () => {
    expect(loadConfig({ PO_JSON_INDENT: '0', PO_MIN_BATCH_SIZE: '20' })).toEqual({ jsonIndent: 0, minBatchSize: 20 });
  });

  it('rejects values out of range', () => {
    expect(() => loadConfig({ PO_MIN_BATCH_SIZE: '0' })).toThrow(
      'Invalid environment configuration: PO_MIN_BATCH_SIZE: Number must be greater than 0'
    );
    expect(() => loadConfig({ PO_JSON_INDENT: 'wide' })).toThrow('Invalid environment configuration: PO_JSON_INDENT: ');
  });
});
