import { setTimeout as delay } from 'node:timers/promises';
import { LoggingService } from '../logging.service';
import { errorMessage } from '../errors/ingestion.errors';
import { BackoffPolicy, backoffDelay } from './backoff.util';

/**
 * Utility for handling MongoDB read retries with exponential backoff
 */
export class MongoDbRetryUtil {
  private static readonly MAX_RETRIES = 3;
  private static readonly POLICY: BackoffPolicy = {
    initialDelayMs: 1000,
    maxDelayMs: 10000,
    jitterRatio: 0.25
  };

  // Connection-related errors that are worth retrying
  private static readonly RETRYABLE_PATTERNS = [
    'connection closed',
    'connection reset',
    'connection timeout',
    'network error',
    'socket timeout',
    'connection refused',
    'server selection timeout',
    'mongonetworkerror',
    'mongotimeouterror',
    'mongoserverselectionerror',
    'econnreset',
    'econnrefused',
    'etimedout'
  ];

  /**
   * Execute a MongoDB operation with retry logic
   */
  public static async executeWithRetry<T>(
    operation: () => Promise<T>,
    operationName: string,
    logger: LoggingService,
    context: string,
    maxRetries: number = MongoDbRetryUtil.MAX_RETRIES,
    wait: (ms: number) => Promise<void> = (ms) => delay(ms)
  ): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        if (!MongoDbRetryUtil.isRetryableError(error)) {
          logger.error(`${operationName} failed with non-retryable error`, error, context);
          throw error;
        }
        if (attempt >= maxRetries) {
          logger.error(`${operationName} failed after ${maxRetries} attempts`, error, context);
          throw error;
        }

        const delayMs = backoffDelay(attempt, MongoDbRetryUtil.POLICY);
        logger.warn(
          `${operationName} failed (attempt ${attempt}/${maxRetries}), retrying in ${delayMs}ms: ${errorMessage(error)}`,
          context
        );
        await wait(delayMs);
      }
    }
  }

  public static isRetryableError(error: unknown): boolean {
    if (!(error instanceof Error)) {
      return false;
    }

    const message = error.message.toLowerCase();
    const name = error.name.toLowerCase();

    return MongoDbRetryUtil.RETRYABLE_PATTERNS.some((pattern) => message.includes(pattern) || name.includes(pattern));
  }
}
