import { describe, expect, test } from 'vitest';
import { ErrorCategory, ErrorHandler, ErrorSeverity, toError } from '../../utils/error-handler.js';

const policy = { maxAttempts: 3, baseDelayMs: 0 };

describe('ErrorHandler', () => {
  test('should return data when a retry succeeds', async () => {
    const seen: number[] = [];

    const result = await ErrorHandler.wrapOperationWithRetry(
      async attempt => {
        seen.push(attempt);
        if (attempt < 2) throw new Error('flaky');
        return 'ok';
      },
      ErrorCategory.ORACLE,
      'describe mention',
      undefined,
      policy
    );

    expect(result).toEqual({ success: true, data: 'ok' });
    expect(seen).toEqual([1, 2]);
  });

  test('should report the last error after exhausting attempts', async () => {
    let calls = 0;

    const result = await ErrorHandler.wrapOperationWithRetry(
      async () => {
        calls++;
        throw new Error(`failure ${calls}`);
      },
      ErrorCategory.ORACLE,
      'resolve match',
      { conceptText: 'vector search' },
      policy
    );

    expect(calls).toBe(3);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe('Failed to resolve match after 3 attempts');
    expect(result.error.severity).toBe(ErrorSeverity.HIGH);
    expect(result.error.originalError?.message).toBe('failure 3');
    expect(result.error.context).toEqual({ conceptText: 'vector search', attempts: 3 });
  });

  test('should stop early when the error is not retryable', async () => {
    let calls = 0;

    const result = await ErrorHandler.wrapOperationWithRetry(
      async () => {
        calls++;
        throw new Error('401 unauthorized');
      },
      ErrorCategory.ORACLE,
      'validate cluster',
      undefined,
      { ...policy, isRetryable: error => !error.message.includes('401') }
    );

    expect(calls).toBe(1);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.context).toEqual({ attempts: 1 });
  });

  test('should count repeated errors per category and message', () => {
    ErrorHandler.handle(ErrorCategory.SYNC, ErrorSeverity.MEDIUM, 'conflict on vector search');
    ErrorHandler.handle(ErrorCategory.SYNC, ErrorSeverity.MEDIUM, 'conflict on vector search');
    ErrorHandler.handle(ErrorCategory.BACKUP, ErrorSeverity.CRITICAL, 'disk full');

    expect(ErrorHandler.getErrorStats()).toEqual({
      'sync:conflict on vector search': 2,
      'backup:disk full': 1
    });
  });

  test('should normalize thrown values into errors', () => {
    const original = new Error('kept');

    expect(toError(original)).toBe(original);
    expect(toError('plain text').message).toBe('plain text');
  });
});
