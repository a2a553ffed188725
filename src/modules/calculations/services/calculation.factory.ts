/**
 * Calculation Factory
 *
 * Resolves an operation tag to its variant and builds an unsaved draft.
 * Inputs are taken as given; checking them is the schema layer's job.
 */

import { InvalidOperationKindError } from '../../../common/errors.js';
import {
  isOperationKind,
  type CalculationDraft,
  type OperationKind,
} from '../contracts/calculation.types.js';

export function normalizeOperationTag(tag: string): string {
  return tag.trim().toLowerCase();
}

/**
 * @throws InvalidOperationKindError carrying the tag exactly as supplied
 */
export function resolveOperationKind(tag: string): OperationKind {
  const normalized = normalizeOperationTag(tag);
  if (!isOperationKind(normalized)) {
    throw new InvalidOperationKindError(tag);
  }
  return normalized;
}

export function createCalculation(
  tag: string,
  ownerId: string | null,
  inputs: readonly number[]
): CalculationDraft {
  const kind = resolveOperationKind(tag);
  const fields = { ownerId, inputs: [...inputs] };

  switch (kind) {
    case 'addition':
      return { operationKind: 'addition', ...fields };
    case 'subtraction':
      return { operationKind: 'subtraction', ...fields };
    case 'multiplication':
      return { operationKind: 'multiplication', ...fields };
    case 'division':
      return { operationKind: 'division', ...fields };
  }
}
