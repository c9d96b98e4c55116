/**
 * Custom error hierarchy for Keelson
 */

import type { WorkloadStatus } from '../types/index.js';

export type ErrorCategory =
  | 'VALIDATION'
  | 'BUILD'
  | 'GITOPS'
  | 'KUBERNETES'
  | 'ROLLOUT'
  | 'CONFIGURATION'
  | 'UNKNOWN';

export type ErrorSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface ErrorContext {
  category: ErrorCategory;
  severity: ErrorSeverity;
  retryable: boolean;
  runId?: string;
  phase?: string;
  [key: string]: unknown;
}

/**
 * Base error class for Keelson
 */
export class KeelsonError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(message);
    this.name = 'KeelsonError';
    this.code = code;
    this.context = {
      category: context.category ?? 'UNKNOWN',
      severity: context.severity ?? 'MEDIUM',
      retryable: context.retryable ?? false,
      ...context,
    };
    this.timestamp = new Date();

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

/**
 * Validation errors (user input, ambiguous overlay contents)
 */
export class ValidationError extends KeelsonError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E1001', {
      category: 'VALIDATION',
      severity: 'LOW',
      retryable: false,
      ...context,
    });
    this.name = 'ValidationError';
  }
}

/**
 * Kubernetes errors
 */
export class KubectlError extends KeelsonError {
  constructor(message: string, context: Partial<ErrorContext> = {}, code = 'E3001') {
    super(message, code, {
      category: 'KUBERNETES',
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'KubectlError';
  }
}

/**
 * Rollout did not reach Succeeded
 */
export class RolloutError extends KeelsonError {
  public readonly lastStatus: WorkloadStatus | undefined;

  constructor(
    message: string,
    code: string,
    lastStatus: WorkloadStatus | undefined,
    context: Partial<ErrorContext> = {}
  ) {
    super(message, code, {
      category: 'ROLLOUT',
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'RolloutError';
    this.lastStatus = lastStatus;
  }

  override toJSON() {
    return { ...super.toJSON(), lastStatus: this.lastStatus };
  }
}

export class RolloutFailureError extends RolloutError {
  constructor(workload: string, lastStatus: WorkloadStatus | undefined, context: Partial<ErrorContext> = {}) {
    super(
      `Rollout of '${workload}' failed: ${lastStatus?.message ?? 'no status observed'}`,
      'E3101',
      lastStatus,
      context
    );
    this.name = 'RolloutFailureError';
  }
}

export class RolloutTimeoutError extends RolloutError {
  public readonly timeoutSeconds: number;

  constructor(
    workload: string,
    timeoutSeconds: number,
    lastStatus: WorkloadStatus | undefined,
    context: Partial<ErrorContext> = {}
  ) {
    super(
      `Rollout of '${workload}' did not complete within ${timeoutSeconds}s (last state: ${lastStatus?.state ?? 'none'})`,
      'E3102',
      lastStatus,
      context
    );
    this.name = 'RolloutTimeoutError';
    this.timeoutSeconds = timeoutSeconds;
  }
}

/**
 * Overlay rendering and editing errors
 */
export class BuildError extends KeelsonError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E4001', {
      category: 'BUILD',
      severity: 'MEDIUM',
      retryable: false,
      ...context,
    });
    this.name = 'BuildError';
  }
}

/**
 * Stage / commit / push errors
 */
export class GitOpsError extends KeelsonError {
  constructor(message: string, context: Partial<ErrorContext> = {}, code = 'E5001') {
    super(message, code, {
      category: 'GITOPS',
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'GitOpsError';
  }
}

export class PushRejectedError extends GitOpsError {
  constructor(branch: string, context: Partial<ErrorContext> = {}) {
    super(`Push to '${branch}' rejected: remote has advanced`, context, 'E5002');
    this.name = 'PushRejectedError';
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends KeelsonError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E6001', {
      category: 'CONFIGURATION',
      severity: 'CRITICAL',
      retryable: false,
      ...context,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Helper to check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof KeelsonError) {
    return error.context.retryable;
  }
  return false;
}

/**
 * Helper to wrap unknown errors
 */
export function wrapError(error: unknown, context: Partial<ErrorContext> = {}): KeelsonError {
  if (error instanceof KeelsonError) {
    return error;
  }

  if (error instanceof Error) {
    return new KeelsonError(error.message, 'E9999', {
      category: 'UNKNOWN',
      severity: 'MEDIUM',
      retryable: false,
      originalError: error.name,
      ...context,
    });
  }

  return new KeelsonError(String(error), 'E9999', {
    category: 'UNKNOWN',
    severity: 'MEDIUM',
    retryable: false,
    ...context,
  });
}
