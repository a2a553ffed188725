/**
 * Evaluator Tests
 */

import { describe, it, expect } from 'vitest';
import { DivisionByZeroError } from '../../../common/errors.js';
import { evaluate, findZeroDivisor, hasZeroDivisor, tryEvaluate } from '../services/calculation.evaluator.js';
import type { OperationKind } from '../contracts/calculation.types.js';

describe('evaluate', () => {
  const cases: Array<[OperationKind, number[], number]> = [
    ['addition', [10, 20, 30], 60],
    ['addition', [1.5, 2.5, 3.0], 7],
    ['addition', [-4, 4], 0],
    ['subtraction', [10, 3, 2], 5],
    ['subtraction', [1.5, 2.5, 3.0], -4],
    ['multiplication', [2, 3, 4], 24],
    ['multiplication', [5, 0, 10], 0],
    ['division', [100, 5, 2], 10],
    ['division', [0, 10], 0],
    ['division', [-9, 3], -3],
  ];

  for (const [kind, inputs, expected] of cases) {
    it(`should compute ${kind} of [${inputs.join(', ')}] = ${expected}`, () => {
      expect(evaluate(kind, inputs)).toBe(expected);
    });
  }

  it('should fold subtraction and division left to right', () => {
    const triples: Array<[number, number, number]> = [
      [10, 4, 3],
      [1, 2, 3],
      [-5, 2.5, 7],
    ];

    for (const [a, b, c] of triples) {
      expect(evaluate('subtraction', [a, b, c])).toBe(a - b - c);
      expect(evaluate('division', [a, b, c])).toBe(a / b / c);
    }
  });

  it('should return 0 for an empty list of every kind', () => {
    expect(evaluate('addition', [])).toBe(0);
    expect(evaluate('subtraction', [])).toBe(0);
    expect(evaluate('multiplication', [])).toBe(0);
    expect(evaluate('division', [])).toBe(0);
  });

  it('should return the single value for a one-element list', () => {
    expect(evaluate('addition', [7])).toBe(7);
    expect(evaluate('subtraction', [7])).toBe(7);
    expect(evaluate('multiplication', [7])).toBe(7);
    expect(evaluate('division', [7])).toBe(7);
    expect(evaluate('division', [0])).toBe(0);
  });

  it('should throw DivisionByZeroError with the divisor index', () => {
    let caught: unknown;
    try {
      evaluate('division', [10, 2, 0, 5]);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(DivisionByZeroError);
    expect(caught).toMatchObject({ divisorIndex: 2, statusCode: 422, code: 'DIVISION_BY_ZERO' });
  });

  it('should treat negative zero as a zero divisor', () => {
    expect(() => evaluate('division', [10, -0])).toThrow(DivisionByZeroError);
  });

  it('should not mutate its inputs', () => {
    const inputs = Object.freeze([8, 2, 2]);
    expect(evaluate('division', inputs)).toBe(2);
    expect(inputs).toEqual([8, 2, 2]);
  });
});

describe('tryEvaluate', () => {
  it('should return null for a zero divisor', () => {
    expect(tryEvaluate('division', [100, 0])).toBeNull();
  });

  it('should return the value otherwise', () => {
    expect(tryEvaluate('division', [100, 4])).toBe(25);
    expect(tryEvaluate('addition', [1, 0])).toBe(1);
  });
});

describe('findZeroDivisor', () => {
  it('should ignore a zero in the first position', () => {
    expect(findZeroDivisor([0, 1, 2])).toBe(-1);
    expect(hasZeroDivisor([0, 1, 2])).toBe(false);
  });

  it('should report the first zero after the first position', () => {
    expect(findZeroDivisor([5, 1, 0, 0])).toBe(2);
    expect(hasZeroDivisor([5, 0])).toBe(true);
  });

  it('should not count tiny non-zero values', () => {
    expect(findZeroDivisor([1, 1e-300])).toBe(-1);
  });
});
