/**
 * CALCULATION REPOSITORY
 * ======================
 *
 * Persistence seam for calculations. Two implementations:
 * - MongoCalculationRepository (Mongoose, default)
 * - MemoryCalculationRepository (STORAGE_DRIVER=memory, tests)
 *
 * Both must hand back inputs in stored order with exact float values.
 */

import type {
  Calculation,
  CalculationContents,
  CalculationDraft,
  Page,
} from '../contracts/calculation.types.js';
import { CalculationModel, type CalculationDocument } from './calculation.model.js';

export interface CalculationRepository {
  create(draft: CalculationDraft): Promise<Calculation>;
  findById(id: string): Promise<Calculation | null>;
  listByOwner(ownerId: string, page: Page): Promise<Calculation[]>;
  countByOwner(ownerId: string): Promise<number>;
  replaceContents(id: string, contents: CalculationContents): Promise<Calculation | null>;
  deleteById(id: string): Promise<boolean>;
  deleteByOwner(ownerId: string): Promise<number>;
}

// ═══════════════════════════════════════════════════════════════
// MONGO
// ═══════════════════════════════════════════════════════════════

function fromDocument(doc: CalculationDocument): Calculation {
  return {
    id: doc._id,
    operationKind: doc.operationKind,
    ownerId: doc.ownerId ?? null,
    inputs: [...doc.inputs],
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export class MongoCalculationRepository implements CalculationRepository {
  async create(draft: CalculationDraft): Promise<Calculation> {
    const created = await CalculationModel.create({
      operationKind: draft.operationKind,
      ownerId: draft.ownerId,
      inputs: draft.inputs,
    });
    return fromDocument(created.toObject());
  }

  async findById(id: string): Promise<Calculation | null> {
    const doc = await CalculationModel.findById(id).lean<CalculationDocument>().exec();
    return doc ? fromDocument(doc) : null;
  }

  async listByOwner(ownerId: string, { skip, limit }: Page): Promise<Calculation[]> {
    const docs = await CalculationModel.find({ ownerId })
      .sort({ createdAt: 1, _id: 1 })
      .skip(skip)
      .limit(limit)
      .lean<CalculationDocument[]>()
      .exec();
    return docs.map(fromDocument);
  }

  async countByOwner(ownerId: string): Promise<number> {
    return CalculationModel.countDocuments({ ownerId }).exec();
  }

  async replaceContents(id: string, contents: CalculationContents): Promise<Calculation | null> {
    const doc = await CalculationModel.findByIdAndUpdate(
      id,
      { $set: { operationKind: contents.operationKind, inputs: contents.inputs } },
      { new: true, runValidators: true }
    )
      .lean<CalculationDocument>()
      .exec();
    return doc ? fromDocument(doc) : null;
  }

  async deleteById(id: string): Promise<boolean> {
    const result = await CalculationModel.deleteOne({ _id: id }).exec();
    return result.deletedCount > 0;
  }

  async deleteByOwner(ownerId: string): Promise<number> {
    const result = await CalculationModel.deleteMany({ ownerId }).exec();
    return result.deletedCount;
  }
}

// ═══════════════════════════════════════════════════════════════
// IN-MEMORY
// ═══════════════════════════════════════════════════════════════

function copy(calc: Calculation): Calculation {
  return { ...calc, inputs: [...calc.inputs] };
}

export class MemoryCalculationRepository implements CalculationRepository {
  private readonly rows = new Map<string, Calculation>();

  constructor(private readonly newId: () => string) {}

  async create(draft: CalculationDraft): Promise<Calculation> {
    const now = new Date();
    const row: Calculation = { ...draft, inputs: [...draft.inputs], id: this.newId(), createdAt: now, updatedAt: now };
    this.rows.set(row.id, row);
    return copy(row);
  }

  async findById(id: string): Promise<Calculation | null> {
    const row = this.rows.get(id);
    return row ? copy(row) : null;
  }

  async listByOwner(ownerId: string, { skip, limit }: Page): Promise<Calculation[]> {
    return [...this.rows.values()]
      .filter((row) => row.ownerId === ownerId)
      .slice(skip, skip + limit)
      .map(copy);
  }

  async countByOwner(ownerId: string): Promise<number> {
    let count = 0;
    for (const row of this.rows.values()) {
      if (row.ownerId === ownerId) count++;
    }
    return count;
  }

  async replaceContents(id: string, contents: CalculationContents): Promise<Calculation | null> {
    const row = this.rows.get(id);
    if (!row) return null;

    const updated: Calculation = {
      id: row.id,
      ownerId: row.ownerId,
      createdAt: row.createdAt,
      updatedAt: new Date(),
      operationKind: contents.operationKind,
      inputs: [...contents.inputs],
    };
    this.rows.set(id, updated);
    return copy(updated);
  }

  async deleteById(id: string): Promise<boolean> {
    return this.rows.delete(id);
  }

  async deleteByOwner(ownerId: string): Promise<number> {
    let deleted = 0;
    for (const [id, row] of this.rows) {
      if (row.ownerId === ownerId) {
        this.rows.delete(id);
        deleted++;
      }
    }
    return deleted;
  }
}
