/**
 * Factory Tests
 */

import { describe, it, expect } from 'vitest';
import { InvalidOperationKindError } from '../../../common/errors.js';
import { createCalculation, resolveOperationKind } from '../services/calculation.factory.js';
import { evaluate } from '../services/calculation.evaluator.js';

describe('resolveOperationKind', () => {
  it('should resolve tags regardless of case and surrounding whitespace', () => {
    expect(resolveOperationKind('ADDITION')).toBe('addition');
    expect(resolveOperationKind('Addition')).toBe('addition');
    expect(resolveOperationKind('addition')).toBe('addition');
    expect(resolveOperationKind('  Division ')).toBe('division');
    expect(resolveOperationKind('MultiPlication')).toBe('multiplication');
    expect(resolveOperationKind('subtraction')).toBe('subtraction');
  });

  it('should reject unknown tags and keep the tag as given', () => {
    let caught: unknown;
    try {
      resolveOperationKind('Modulo ');
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(InvalidOperationKindError);
    expect(caught).toMatchObject({
      operationKind: 'Modulo ',
      message: 'Invalid calculation type: Modulo ',
      code: 'INVALID_OPERATION_KIND',
    });
  });

  it('should reject the empty tag', () => {
    expect(() => resolveOperationKind('')).toThrow(InvalidOperationKindError);
  });
});

describe('createCalculation', () => {
  it('should build a draft of the resolved kind', () => {
    const draft = createCalculation('Subtraction', 'user-1', [10, 3]);

    expect(draft).toEqual({ operationKind: 'subtraction', ownerId: 'user-1', inputs: [10, 3] });
    expect(evaluate(draft.operationKind, draft.inputs)).toBe(7);
  });

  it('should allow a draft without an owner', () => {
    expect(createCalculation('addition', null, [1, 2]).ownerId).toBeNull();
  });

  it('should copy the inputs', () => {
    const inputs = [1, 2];
    const draft = createCalculation('addition', 'user-1', inputs);
    inputs.push(3);

    expect(draft.inputs).toEqual([1, 2]);
  });

  it('should not check the inputs itself', () => {
    const draft = createCalculation('division', 'user-1', [1, 0]);
    expect(draft.inputs).toEqual([1, 0]);
  });
});
