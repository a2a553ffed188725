/**
 * Application Errors
 *
 * Every error that should reach the client as something other than a 500
 * extends AppError. The global error handler in app.ts maps statusCode/code
 * onto the response body.
 */

export interface FieldIssue {
  field: string;
  message: string;
}

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(statusCode: number, code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
  }

  get isClientError(): boolean {
    return this.statusCode < 500;
  }
}

// ═══════════════════════════════════════════════════════════════
// CLIENT INPUT
// ═══════════════════════════════════════════════════════════════

export class ValidationFailedError extends AppError {
  readonly issues: FieldIssue[];

  constructor(issues: FieldIssue[], message?: string) {
    super(422, 'VALIDATION_ERROR', message ?? issues.map((i) => `${i.field}: ${i.message}`).join('; '));
    this.issues = issues;
  }
}

export class InvalidOperationKindError extends AppError {
  readonly operationKind: string;

  constructor(operationKind: string) {
    super(422, 'INVALID_OPERATION_KIND', `Invalid calculation type: ${operationKind}`);
    this.operationKind = operationKind;
  }
}

export class DivisionByZeroError extends AppError {
  readonly divisorIndex: number;

  constructor(divisorIndex: number) {
    super(422, 'DIVISION_BY_ZERO', 'Cannot divide by zero');
    this.divisorIndex = divisorIndex;
  }
}

export class BadRequestError extends AppError {
  constructor(code: string, message: string) {
    super(400, code, message);
  }
}

// ═══════════════════════════════════════════════════════════════
// ACCESS
// ═══════════════════════════════════════════════════════════════

export class UnauthorizedError extends AppError {
  constructor(message = 'Could not validate credentials', code = 'UNAUTHORIZED') {
    super(401, code, message);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Not authorized to access this resource') {
    super(403, 'FORBIDDEN', message);
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found') {
    super(404, 'NOT_FOUND', message);
  }
}
