/**
 * Calculation request schemas (zod)
 *
 * Field rules are reported per field; the division rule is a cross-field
 * check that only runs once kind and length are already valid, so a
 * malformed request is never reported as a divide-by-zero.
 */

import { z } from 'zod';
import { normalizeOperationTag } from '../services/calculation.factory.js';
import { findZeroDivisor, hasZeroDivisor } from '../services/calculation.evaluator.js';
import { OPERATION_KINDS, isOperationKind, type OperationKind } from './calculation.types.js';

export const MIN_INPUTS = 2;
export const MAX_PAGE_SIZE = 100;

export const OperationKindSchema = z
  .string({
    required_error: 'Calculation type is required',
    invalid_type_error: 'Calculation type must be a string',
  })
  .transform((tag, ctx): OperationKind => {
    const normalized = normalizeOperationTag(tag);
    if (!isOperationKind(normalized)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid calculation type: ${tag} (expected one of ${OPERATION_KINDS.join(', ')})`,
      });
      return z.NEVER;
    }
    return normalized;
  });

export const InputsSchema = z
  .array(
    z
      .number({ invalid_type_error: 'Inputs must be numbers' })
      .finite('Inputs must be finite numbers'),
    {
      required_error: 'Inputs are required',
      invalid_type_error: 'Inputs must be a list of numbers',
    }
  )
  .min(MIN_INPUTS, `At least ${MIN_INPUTS} inputs are required`);

/**
 * Clients may send the kind as `type`; `operationKind` wins when both are present.
 */
function acceptTypeAlias(body: unknown): unknown {
  if (body === null || typeof body !== 'object' || Array.isArray(body)) {
    return body;
  }
  const record: Record<string, unknown> = { ...body };
  const { type, ...rest } = record;
  if (type !== undefined && rest.operationKind === undefined) {
    return { ...rest, operationKind: type };
  }
  return rest;
}

interface CandidateLike {
  operationKind?: unknown;
  inputs?: unknown;
}

function rejectZeroDivisor(candidate: CandidateLike, ctx: z.RefinementCtx): void {
  const { operationKind, inputs } = candidate;
  if (operationKind !== 'division') return;
  if (!Array.isArray(inputs) || inputs.length < MIN_INPUTS) return;

  if (hasZeroDivisor(inputs)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['inputs', findZeroDivisor(inputs)],
      message: 'Cannot divide by zero',
    });
  }
}

const CandidateObject = z.object({
  operationKind: OperationKindSchema,
  inputs: InputsSchema,
});

/**
 * A complete calculation candidate: used for creation, full replacement,
 * and for re-checking the merged result of a partial edit.
 */
export const CalculationCandidateSchema = z.preprocess(
  acceptTypeAlias,
  CandidateObject.superRefine(rejectZeroDivisor)
);

export type CalculationCandidate = z.output<typeof CalculationCandidateSchema>;

export const CalculationCreateSchema = CalculationCandidateSchema;
export const CalculationReplaceSchema = CalculationCandidateSchema;

/**
 * Partial edit: each field is checked alone here; the merged record is
 * checked again against CalculationCandidateSchema before it is saved.
 */
export const CalculationPatchSchema = z.preprocess(
  acceptTypeAlias,
  CandidateObject.partial().superRefine(rejectZeroDivisor)
);

export type CalculationPatch = z.output<typeof CalculationPatchSchema>;

export const CalculationIdParamsSchema = z.object({
  id: z.string().uuid('Invalid calculation id'),
});

export const BrowseQuerySchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(MAX_PAGE_SIZE),
});

export type BrowseQuery = z.output<typeof BrowseQuerySchema>;
