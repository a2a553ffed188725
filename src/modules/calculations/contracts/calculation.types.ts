/**
 * Calculation Types
 * =================
 *
 * One stored record shape, four behaviours selected by operationKind.
 * The result is never stored; it is derived from inputs on every read.
 */

export const OPERATION_KINDS = ['addition', 'subtraction', 'multiplication', 'division'] as const;

export type OperationKind = (typeof OPERATION_KINDS)[number];

export function isOperationKind(value: string): value is OperationKind {
  return (OPERATION_KINDS as readonly string[]).includes(value);
}

interface CalculationFields<K extends OperationKind> {
  operationKind: K;
  ownerId: string | null;
  inputs: number[];
}

export type Addition = CalculationFields<'addition'>;
export type Subtraction = CalculationFields<'subtraction'>;
export type Multiplication = CalculationFields<'multiplication'>;
export type Division = CalculationFields<'division'>;

/**
 * A calculation that has been resolved by the factory but not yet persisted.
 */
export type CalculationDraft = Addition | Subtraction | Multiplication | Division;

/**
 * A persisted calculation.
 */
export type Calculation = CalculationDraft & {
  id: string;
  createdAt: Date;
  updatedAt: Date;
};

/**
 * The only mutable part of a stored calculation. Replaced wholesale.
 */
export interface CalculationContents {
  operationKind: OperationKind;
  inputs: number[];
}

export interface CalculationView {
  id: string;
  operationKind: OperationKind;
  inputs: number[];
  ownerId: string | null;
  result: number | null;
  createdAt: string;
  updatedAt: string;
}

export interface Page {
  skip: number;
  limit: number;
}
