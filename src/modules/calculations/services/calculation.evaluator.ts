/**
 * Calculation Evaluator
 *
 * Per-kind result rules. All four are total over any input length:
 * an empty list yields 0, a single value yields that value.
 * Subtraction and division fold strictly left to right.
 */

import { DivisionByZeroError } from '../../../common/errors.js';
import type { OperationKind } from '../contracts/calculation.types.js';

/**
 * Index of the first zero divisor (index >= 1), or -1.
 * Exact comparison, so -0 counts as zero and 1e-300 does not.
 */
export function findZeroDivisor(inputs: readonly number[]): number {
  for (let i = 1; i < inputs.length; i++) {
    if (inputs[i] === 0) return i;
  }
  return -1;
}

/**
 * The zero-divisor rule. Request validation and evaluation both guard on it.
 */
export function hasZeroDivisor(inputs: readonly number[]): boolean {
  return findZeroDivisor(inputs) !== -1;
}

function add(inputs: readonly number[]): number {
  let result = 0;
  for (const value of inputs) result += value;
  return result;
}

function subtract(inputs: readonly number[]): number {
  if (inputs.length === 0) return 0;
  let result = inputs[0];
  for (let i = 1; i < inputs.length; i++) result -= inputs[i];
  return result;
}

function multiply(inputs: readonly number[]): number {
  if (inputs.length === 0) return 0;
  let result = 1;
  for (const value of inputs) result *= value;
  return result;
}

function divide(inputs: readonly number[]): number {
  if (inputs.length === 0) return 0;

  if (hasZeroDivisor(inputs)) {
    throw new DivisionByZeroError(findZeroDivisor(inputs));
  }

  let result = inputs[0];
  for (let i = 1; i < inputs.length; i++) result /= inputs[i];
  return result;
}

/**
 * @throws DivisionByZeroError for a division with a zero divisor
 */
export function evaluate(kind: OperationKind, inputs: readonly number[]): number {
  switch (kind) {
    case 'addition':
      return add(inputs);
    case 'subtraction':
      return subtract(inputs);
    case 'multiplication':
      return multiply(inputs);
    case 'division':
      return divide(inputs);
    default: {
      const unreachable: never = kind;
      throw new Error(`Unhandled operation kind: ${String(unreachable)}`);
    }
  }
}

/**
 * Read-path evaluation: a division by zero that reached storage becomes an
 * absent result instead of failing the read. Anything else still throws.
 */
export function tryEvaluate(kind: OperationKind, inputs: readonly number[]): number | null {
  try {
    return evaluate(kind, inputs);
  } catch (err) {
    if (err instanceof DivisionByZeroError) {
      return null;
    }
    throw err;
  }
}
