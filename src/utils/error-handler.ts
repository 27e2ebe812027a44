/**
 * Standardized error handling utilities for the ingestion engine
 *
 * Provides consistent error logging, categorization, and retry patterns
 * across retrieval, staging, promotion, sync and backup.
 */

/**
 * Error categories for better classification and handling
 */
export enum ErrorCategory {
  RETRIEVAL = 'retrieval',
  ORACLE = 'oracle',
  STAGING = 'staging',
  CLUSTERING = 'clustering',
  COMMIT = 'commit',
  RELATION = 'relation',
  SYNC = 'sync',
  BACKUP = 'backup',
  CONFIGURATION = 'configuration',
  INPUT = 'input'
}

/**
 * Error severity levels for prioritization
 */
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

/**
 * Structured error information
 */
export interface ErrorInfo {
  category: ErrorCategory;
  severity: ErrorSeverity;
  message: string;
  originalError?: Error;
  context?: Record<string, unknown>;
  timestamp: Date;
  recoveryHint?: string;
}

/**
 * Error result for operations that can fail without aborting the caller
 */
export interface ErrorResult<T = unknown> {
  success: false;
  error: ErrorInfo;
  partialData?: T;
}

/**
 * Success result for operations
 */
export interface SuccessResult<T = unknown> {
  success: true;
  data: T;
}

/**
 * Combined result type for fallible operations
 */
export type OperationResult<T = unknown> = SuccessResult<T> | ErrorResult<T>;

/**
 * Retry policy for `wrapOperationWithRetry`
 */
export interface RetryPolicy {
  /** Total attempts including the first */
  maxAttempts: number;
  /** Delay before the second attempt; doubles on each further attempt */
  baseDelayMs: number;
  /** Return false to stop retrying on this error */
  isRetryable?: (error: Error) => boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000
};

/**
 * Standard error handler with categorization and recovery hints
 */
export class ErrorHandler {
  private static errorCounts = new Map<string, number>();

  /**
   * Handle an error with proper categorization and logging
   */
  static handle(
    category: ErrorCategory,
    severity: ErrorSeverity,
    message: string,
    originalError?: Error,
    context?: Record<string, unknown>,
    recoveryHint?: string
  ): ErrorInfo {
    const errorInfo: ErrorInfo = {
      category,
      severity,
      message,
      originalError,
      context,
      timestamp: new Date(),
      recoveryHint
    };

    this.logError(errorInfo);
    this.trackErrorFrequency(category, message);

    return errorInfo;
  }

  /**
   * Create a standardized error result
   */
  static createErrorResult<T>(
    category: ErrorCategory,
    severity: ErrorSeverity,
    message: string,
    originalError?: Error,
    context?: Record<string, unknown>,
    partialData?: T,
    recoveryHint?: string
  ): ErrorResult<T> {
    const error = this.handle(category, severity, message, originalError, context, recoveryHint);

    return {
      success: false,
      error,
      partialData
    };
  }

  /**
   * Create a standardized success result
   */
  static createSuccessResult<T>(data: T): SuccessResult<T> {
    return {
      success: true,
      data
    };
  }

  /**
   * Wrap an operation with retry logic and exponential backoff
   */
  static async wrapOperationWithRetry<T>(
    operation: (attempt: number) => Promise<T>,
    category: ErrorCategory,
    operationName: string,
    context?: Record<string, unknown>,
    policy: RetryPolicy = DEFAULT_RETRY_POLICY
  ): Promise<OperationResult<T>> {
    const maxAttempts = Math.max(1, policy.maxAttempts);
    let lastError: Error | undefined;
    let attempts = 0;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      attempts = attempt;
      try {
        const result = await operation(attempt);

        if (attempt > 1) {
          console.log(`✅ ${operationName} succeeded on attempt ${attempt}/${maxAttempts}`);
        }

        return this.createSuccessResult(result);
      } catch (error) {
        lastError = toError(error);

        if (policy.isRetryable && !policy.isRetryable(lastError)) {
          break;
        }

        if (attempt < maxAttempts) {
          console.warn(`⚠️ ${operationName} failed (attempt ${attempt}/${maxAttempts}), retrying...`);
          await this.sleep(Math.pow(2, attempt - 1) * policy.baseDelayMs);
        }
      }
    }

    return this.createErrorResult<T>(
      category,
      ErrorSeverity.HIGH,
      `Failed to ${operationName} after ${attempts} attempts`,
      lastError,
      { ...context, attempts },
      undefined,
      `Check ${category} configuration, network connectivity, and system resources`
    );
  }

  /**
   * Log error with appropriate formatting
   */
  private static logError(errorInfo: ErrorInfo): void {
    const emoji = this.getSeverityEmoji(errorInfo.severity);
    const timestamp = errorInfo.timestamp.toISOString();

    const logMessage = [
      `${emoji} [${errorInfo.category.toUpperCase()}] ${errorInfo.message}`,
      `   Severity: ${errorInfo.severity}`,
      `   Time: ${timestamp}`,
      errorInfo.context ? `   Context: ${JSON.stringify(errorInfo.context)}` : '',
      errorInfo.recoveryHint ? `   💡 Hint: ${errorInfo.recoveryHint}` : '',
      errorInfo.originalError ? `   Original: ${errorInfo.originalError.message}` : ''
    ].filter(Boolean).join('\n');

    if (errorInfo.severity === ErrorSeverity.CRITICAL) {
      console.error(logMessage);
    } else if (errorInfo.severity === ErrorSeverity.HIGH) {
      console.warn(logMessage);
    } else {
      console.log(logMessage);
    }
  }

  /**
   * Track error frequency for monitoring
   */
  private static trackErrorFrequency(category: ErrorCategory, message: string): void {
    const key = `${category}:${message}`;
    const currentCount = this.errorCounts.get(key) ?? 0;
    this.errorCounts.set(key, currentCount + 1);

    if (currentCount > 5) {
      console.warn(`🔔 Frequent error detected: ${key} (${currentCount + 1} times)`);
    }
  }

  private static getSeverityEmoji(severity: ErrorSeverity): string {
    switch (severity) {
      case ErrorSeverity.CRITICAL: return '🚨';
      case ErrorSeverity.HIGH: return '⚠️';
      case ErrorSeverity.MEDIUM: return '⚡';
      case ErrorSeverity.LOW: return 'ℹ️';
    }
  }

  private static sleep(ms: number): Promise<void> {
    if (ms <= 0) return Promise.resolve();
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  /**
   * Get error statistics for monitoring
   */
  static getErrorStats(): Record<string, number> {
    return Object.fromEntries(this.errorCounts.entries());
  }

  /**
   * Reset error statistics
   */
  static resetErrorStats(): void {
    this.errorCounts.clear();
  }
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
