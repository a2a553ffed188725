/**
 * CALCULATION MONGO MODEL
 *
 * Single collection for all four operation kinds; operationKind is the
 * discriminator. No result column: results are derived at read time.
 */

import mongoose, { Schema } from 'mongoose';
import { v4 as uuidv4 } from 'uuid';
import { OPERATION_KINDS, type OperationKind } from '../contracts/calculation.types.js';

export interface CalculationDocument {
  _id: string;
  operationKind: OperationKind;
  ownerId: string | null;
  inputs: number[];
  createdAt: Date;
  updatedAt: Date;
}

const CalculationSchema = new Schema<CalculationDocument>(
  {
    _id: { type: String, default: () => uuidv4() },
    operationKind: { type: String, required: true, enum: [...OPERATION_KINDS], lowercase: true },
    ownerId: { type: String, default: null, index: true },

    // may be empty at rest; the >= 2 rule lives in the request schemas
    inputs: { type: [Number], default: [] },
  },
  { timestamps: true, collection: 'calculations', versionKey: false }
);

CalculationSchema.index({ ownerId: 1, createdAt: 1 });

export const CalculationModel = mongoose.model<CalculationDocument>('Calculation', CalculationSchema);
