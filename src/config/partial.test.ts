import { describe, test, expect } from 'vitest';
import {
  accumulate,
  addErrorContext,
  collectErrors,
  combineIndexed,
  combineLast,
  combineOptional,
  combineRecord,
  fail,
  getOption,
  mapValidation,
  succeed,
  validateOptional,
} from './partial.js';

describe('Last Combination', () => {
  test('should let the right value win when set', () => {
    expect(combineLast(1, 2)).toBe(2);
    expect(combineLast(1, undefined)).toBe(1);
    expect(combineLast(undefined, 2)).toBe(2);
    expect(combineLast<number>(undefined, undefined)).toBeUndefined();
  });

  test('should treat null as a set value', () => {
    expect(combineLast<number | null>(5432, null)).toBeNull();
  });

  test('should be associative', () => {
    const values = [undefined, 1, 2, undefined, 3];
    for (const a of values) {
      for (const b of values) {
        for (const c of values) {
          expect(combineLast(combineLast(a, b), c)).toBe(combineLast(a, combineLast(b, c)));
        }
      }
    }
  });
});

describe('Record Combination', () => {
  test('should union keys with the right side winning on collision', () => {
    expect(combineRecord({ a: '1', b: '2' }, { b: '3', c: '4' })).toEqual({ a: '1', b: '3', c: '4' });
  });

  test('should have the empty record as identity', () => {
    const record = { PATH: '/bin' };
    expect(combineRecord({}, record)).toEqual(record);
    expect(combineRecord(record, {})).toEqual(record);
  });

  test('should union positional maps the same way', () => {
    expect(combineIndexed({ 0: 'a', 1: 'b' }, { 1: 'c' })).toEqual({ 0: 'a', 1: 'c' });
  });
});

describe('Optional Combination', () => {
  const join = (left: string, right: string) => `${left}+${right}`;

  test('should keep the set side when the other is unset', () => {
    expect(combineOptional('a', undefined, join)).toBe('a');
    expect(combineOptional(undefined, 'b', join)).toBe('b');
    expect(combineOptional<string>(undefined, undefined, join)).toBeUndefined();
  });

  test('should merge when both sides are set', () => {
    expect(combineOptional('a', 'b', join)).toBe('a+b');
  });
});

describe('Validation', () => {
  test('should report a missing option by name', () => {
    expect(getOption('stdIn', undefined)).toEqual({ ok: false, errors: ['Missing stdIn option'] });
    expect(getOption('stdIn', 'inherit')).toEqual({ ok: true, value: 'inherit' });
  });

  test('should accumulate errors from both sides', () => {
    const result = accumulate(fail('first'), fail('second', 'third'), () => 0);
    expect(result).toEqual({ ok: false, errors: ['first', 'second', 'third'] });
  });

  test('should combine two successes', () => {
    expect(accumulate(succeed(2), succeed(3), (a, b) => a * b)).toEqual({ ok: true, value: 6 });
  });

  test('should collect errors in argument order', () => {
    expect(collectErrors(fail('a'), succeed(1), fail('b'))).toEqual({ ok: false, errors: ['a', 'b'] });
  });

  test('should prefix every error with its context', () => {
    expect(addErrorContext('postgresConfig: ', fail('Missing stdIn option', 'Missing stdOut option'))).toEqual({
      ok: false,
      errors: ['postgresConfig: Missing stdIn option', 'postgresConfig: Missing stdOut option'],
    });
    expect(addErrorContext('ignored: ', succeed(1))).toEqual({ ok: true, value: 1 });
  });

  test('should map only successful values', () => {
    expect(mapValidation(succeed(2), value => value + 1)).toEqual({ ok: true, value: 3 });
    expect(mapValidation(fail('nope'), (value: number) => value + 1)).toEqual({ ok: false, errors: ['nope'] });
  });

  test('should skip validation of an absent value', () => {
    expect(validateOptional(undefined, () => fail('never'))).toEqual({ ok: true, value: undefined });
    expect(validateOptional('x', () => fail('checked'))).toEqual({ ok: false, errors: ['checked'] });
  });
});
