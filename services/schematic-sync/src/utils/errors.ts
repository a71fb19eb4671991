/**
 * Schematic Sync - Custom Error Classes
 *
 * Structured error handling with full context for debugging
 */

import type { ProjectSyncReport } from '../types/index.js';

export interface ErrorContext {
  operation: string;
  input?: unknown;
  timestamp: Date;
  sheet?: string;
  suggestion?: string;
  [key: string]: unknown;
}

export class SyncEngineError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string,
    context?: Partial<ErrorContext>,
    isOperational = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = {
      operation: context?.operation || 'unknown',
      timestamp: new Date(),
      ...(context || {}),
    };
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

// Input shape errors
export class ValidationError extends SyncEngineError {
  public readonly issues: string[];

  constructor(message: string, issues: string[], context?: Partial<ErrorContext>) {
    super(message, 'VALIDATION_ERROR', { ...context, issues });
    this.issues = issues;
  }
}

/**
 * Malformed or inconsistent sheet hierarchy: a net with no common ancestor,
 * a cyclic sheet reference, a parent that does not exist. Fatal for the
 * affected subtree only; `partialReport` holds whatever completed before the
 * error was raised.
 */
export class StructuralError extends SyncEngineError {
  public readonly sheets: string[];
  public readonly partialReport?: ProjectSyncReport;

  constructor(
    message: string,
    sheets: string[],
    context?: Partial<ErrorContext>,
    partialReport?: ProjectSyncReport
  ) {
    super(message, 'STRUCTURAL_ERROR', { ...context, sheets });
    this.sheets = sheets;
    this.partialReport = partialReport;
  }

  withReport(report: ProjectSyncReport): StructuralError {
    return new StructuralError(this.message, this.sheets, this.context, report);
  }
}

export class SheetReconciliationError extends SyncEngineError {
  constructor(sheet: string, message: string, context?: Partial<ErrorContext>) {
    super(
      `Failed to reconcile sheet ${sheet}: ${message}`,
      'SHEET_RECONCILIATION_ERROR',
      { ...context, sheet }
    );
  }
}

export class InternalError extends SyncEngineError {
  constructor(message: string, context?: Partial<ErrorContext>) {
    super(message, 'INTERNAL_ERROR', context, false);
  }
}

// Error type guard
export function isSyncEngineError(error: unknown): error is SyncEngineError {
  return error instanceof SyncEngineError;
}

// Error handler helper
export function handleError(error: unknown, operation = 'unknown'): SyncEngineError {
  if (isSyncEngineError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError(error.message, {
      operation,
      originalError: error.name,
      stack: error.stack,
    });
  }

  return new InternalError('An unexpected error occurred', {
    operation,
    originalError: String(error),
  });
}
