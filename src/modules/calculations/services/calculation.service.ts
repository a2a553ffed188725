/**
 * CALCULATION SERVICE
 * ===================
 *
 * Browse / Read / Edit / Add / Delete for one owner's calculations.
 *
 * Writes pass the request schemas before anything is stored, and an edit
 * re-checks the merged record, not only the fields it touched. Reads
 * re-derive the result every time; a stored division by zero comes back
 * as result: null.
 */

import { ForbiddenError, NotFoundError } from '../../../common/errors.js';
import { parseWith } from '../../../common/validation.js';
import type { ServiceLogger } from '../../../common/logger.js';
import {
  CalculationCandidateSchema,
  CalculationCreateSchema,
  CalculationPatchSchema,
  CalculationReplaceSchema,
  type BrowseQuery,
} from '../contracts/calculation.schemas.js';
import type {
  Calculation,
  CalculationContents,
  CalculationView,
} from '../contracts/calculation.types.js';
import type { CalculationRepository } from '../storage/calculation.repository.js';
import { tryEvaluate } from './calculation.evaluator.js';
import { createCalculation } from './calculation.factory.js';

export function toCalculationView(calc: Calculation): CalculationView {
  return {
    id: calc.id,
    operationKind: calc.operationKind,
    inputs: [...calc.inputs],
    ownerId: calc.ownerId,
    result: tryEvaluate(calc.operationKind, calc.inputs),
    createdAt: calc.createdAt.toISOString(),
    updatedAt: calc.updatedAt.toISOString(),
  };
}

/**
 * Merge a partial edit onto stored contents and check the whole result.
 * Dividing stored inputs by a new kind, or new inputs under a stored
 * division, is rejected the same way a fresh create would be.
 */
export function replaceContents(existing: CalculationContents, patch: unknown): CalculationContents {
  const changes = parseWith(CalculationPatchSchema, patch);
  return parseWith(CalculationCandidateSchema, {
    operationKind: changes.operationKind ?? existing.operationKind,
    inputs: changes.inputs ?? existing.inputs,
  });
}

export interface CalculationListResult {
  total: number;
  skip: number;
  limit: number;
  items: CalculationView[];
}

export class CalculationService {
  constructor(
    private readonly repo: CalculationRepository,
    private readonly logger: ServiceLogger
  ) {}

  async browse(ownerId: string, page: BrowseQuery): Promise<CalculationListResult> {
    const [rows, total] = await Promise.all([
      this.repo.listByOwner(ownerId, page),
      this.repo.countByOwner(ownerId),
    ]);

    const items = rows.map(toCalculationView);
    const unavailable = items.filter((item) => item.result === null).length;
    if (unavailable > 0) {
      this.logger.warn({ ownerId, unavailable }, '[Calculations] stored rows with no computable result');
    }

    return { total, skip: page.skip, limit: page.limit, items };
  }

  async read(id: string, ownerId: string): Promise<CalculationView> {
    const calc = await this.getOwned(id, ownerId, 'view');
    return toCalculationView(calc);
  }

  async add(ownerId: string | null, body: unknown): Promise<CalculationView> {
    const candidate = parseWith(CalculationCreateSchema, body);
    const draft = createCalculation(candidate.operationKind, ownerId, candidate.inputs);
    const created = await this.repo.create(draft);

    this.logger.info(
      { calculationId: created.id, operationKind: created.operationKind, ownerId },
      '[Calculations] created'
    );
    return toCalculationView(created);
  }

  /**
   * PUT: both fields required.
   */
  async replace(id: string, ownerId: string, body: unknown): Promise<CalculationView> {
    const existing = await this.getOwned(id, ownerId, 'edit');
    const contents = parseWith(CalculationReplaceSchema, body);
    return this.save(existing, contents);
  }

  /**
   * PATCH: either field; the merged record is validated as a whole.
   */
  async edit(id: string, ownerId: string, body: unknown): Promise<CalculationView> {
    const existing = await this.getOwned(id, ownerId, 'edit');
    const contents = replaceContents(existing, body);
    return this.save(existing, contents);
  }

  async remove(id: string, ownerId: string): Promise<void> {
    await this.getOwned(id, ownerId, 'delete');
    await this.repo.deleteById(id);
    this.logger.info({ calculationId: id, ownerId }, '[Calculations] deleted');
  }

  async removeAllForOwner(ownerId: string): Promise<number> {
    const deleted = await this.repo.deleteByOwner(ownerId);
    this.logger.info({ ownerId, deleted }, '[Calculations] deleted all for owner');
    return deleted;
  }

  private async save(existing: Calculation, contents: CalculationContents): Promise<CalculationView> {
    const updated = await this.repo.replaceContents(existing.id, contents);
    if (!updated) {
      // deleted between the ownership check and the write
      throw new NotFoundError('Calculation not found');
    }

    this.logger.info(
      { calculationId: updated.id, operationKind: updated.operationKind },
      '[Calculations] updated'
    );
    return toCalculationView(updated);
  }

  private async getOwned(id: string, ownerId: string, action: 'view' | 'edit' | 'delete'): Promise<Calculation> {
    const calc = await this.repo.findById(id);
    if (!calc) {
      throw new NotFoundError('Calculation not found');
    }
    if (calc.ownerId !== ownerId) {
      throw new ForbiddenError(`Not authorized to ${action} this calculation`);
    }
    return calc;
  }
}
