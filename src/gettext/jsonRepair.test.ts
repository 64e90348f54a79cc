import { describe, expect, it } from 'vitest';
import { JsonSyntaxError } from './errors.js';
import { balancedObjects, extractFencedBlock, repairJson } from './jsonRepair.js';

function repairError(text: string): JsonSyntaxError {
  try {
    repairJson(text);
  } catch (error) {
    if (error instanceof JsonSyntaxError) return error;
    throw error;
  }
  throw new Error('expected a JSON syntax error');
}

describe('repairJson', () => {
  it('parses valid JSON without repair', () => {
    expect(repairJson('{"a":1}')).toEqual({ value: { a: 1 }, stage: 'none' });
  });

  it('drops a byte-order mark and surrounding whitespace', () => {
    expect(repairJson('\uFEFF{"a":1}\n')).toEqual({ value: { a: 1 }, stage: 'bom' });
  });

  it('takes the inside of a fenced block with a language tag', () => {
    expect(repairJson('Here you go:\n```json\n{"a":1}\n```\nThanks')).toEqual({ value: { a: 1 }, stage: 'fence' });
  });

  it('reads an unclosed fence to the end', () => {
    expect(repairJson('```\n{"a":2}')).toEqual({ value: { a: 2 }, stage: 'fence' });
  });

  it('finds an object wrapped in prose', () => {
    expect(repairJson('The result is {"a":{"b":"}"}} as requested.')).toEqual({
      value: { a: { b: '}' } },
      stage: 'balanced',
    });
  });

  it('skips balanced candidates that do not parse', () => {
    expect(repairJson('note {not json} then {"ok":true}')).toEqual({ value: { ok: true }, stage: 'balanced' });
  });

  it('passes over balanced objects the caller does not accept', () => {
    const accept = (value: unknown): boolean => typeof value === 'object' && value !== null && 'entries' in value;
    expect(repairJson('see {"x":1} and {"entries":[]}', { accept })).toEqual({ value: { entries: [] }, stage: 'balanced' });
    expect(() => repairJson('only {"x":1} here', { accept })).toThrow(JsonSyntaxError);
  });

  it('reports what it tried when nothing parses', () => {
    const error = repairError('no json here');
    expect(error.stage).toBe('balanced');
    expect(error.snippet).toBe('no json here');
    expect(error.diagnostic).not.toBe('');
    expect(error.message).toContain('Please supply valid JSON that conforms to this schema.');
  });

  it('truncates long snippets', () => {
    const error = repairError('x'.repeat(1000));
    expect(error.snippet).toBe(`${'x'.repeat(800)}\n... (truncated, total 1000 bytes)`);
  });
});

describe('repair helpers', () => {
  it('returns undefined without a fence', () => {
    expect(extractFencedBlock('no fence')).toBeUndefined();
  });

  it('lists balanced objects in order', () => {
    expect([...balancedObjects('{a}{b {c}}')]).toEqual(['{a}', '{b {c}}', '{c}']);
  });

  it('stops at a brace that is never closed', () => {
    expect([...balancedObjects('{"a":1} {"b": {"c":2}')]).toEqual(['{"a":1}']);
  });
});
