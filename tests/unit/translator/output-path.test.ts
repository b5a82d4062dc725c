import { describe, it, expect } from 'vitest';
import { readOutputPath, writeOutputPath } from '../../../src/lib/translator/output-path.js';
import type { OutputRecord } from '../../../src/types/records.js';

describe('writeOutputPath', () => {
  it('should write top-level keys', () => {
    const output: OutputRecord = {};
    writeOutputPath(output, ['a'], 1);

    expect(output).toEqual({ a: 1 });
  });

  it('should create intermediate objects', () => {
    const output: OutputRecord = {};
    writeOutputPath(output, ['a', 'b', 'c'], 'deep');

    expect(output).toEqual({ a: { b: { c: 'deep' } } });
  });

  it('should keep siblings under a shared prefix', () => {
    const output: OutputRecord = {};
    writeOutputPath(output, ['data', 'x'], 1);
    writeOutputPath(output, ['data', 'y'], 2);

    expect(output).toEqual({ data: { x: 1, y: 2 } });
  });

  it('should replace a scalar sitting on the path', () => {
    const output: OutputRecord = { data: 'flat' };
    writeOutputPath(output, ['data', 'x'], 1);

    expect(output).toEqual({ data: { x: 1 } });
  });

  it('should replace an array sitting on the path', () => {
    const output: OutputRecord = { data: [1, 2] };
    writeOutputPath(output, ['data', 'x'], 1);

    expect(output).toEqual({ data: { x: 1 } });
  });

  it('should not descend into inherited properties', () => {
    const output: OutputRecord = {};
    writeOutputPath(output, ['__proto__', 'polluted'], 'x');
    writeOutputPath(output, ['constructor', 'name'], 'y');

    expect('polluted' in {}).toBe(false);
    expect(Object.hasOwn(output, 'constructor')).toBe(true);
    expect(readOutputPath(output, ['constructor'])).toEqual({ name: 'y' });
  });

  it('should overwrite only the leaf', () => {
    const output: OutputRecord = { a: { b: 1, c: 2 } };
    writeOutputPath(output, ['a', 'b'], null);

    expect(output).toEqual({ a: { b: null, c: 2 } });
  });
});

describe('readOutputPath', () => {
  const output: OutputRecord = { a: { b: { c: 3 } }, flat: 'x' };

  it('should read nested values', () => {
    expect(readOutputPath(output, ['a', 'b', 'c'])).toBe(3);
    expect(readOutputPath(output, ['a', 'b'])).toEqual({ c: 3 });
  });

  it('should return undefined for missing segments', () => {
    expect(readOutputPath(output, ['a', 'missing', 'c'])).toBeUndefined();
    expect(readOutputPath(output, ['flat', 'x'])).toBeUndefined();
    expect(readOutputPath(output, ['toString'])).toBeUndefined();
  });
});
