import { logger } from './logger';
import { isError } from '../download/core/errors';

/**
 * Retry helper for network operations with exponential backoff
 * Errors rejected by `shouldRetry` are rethrown immediately.
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  maxRetries: number = 3,
  baseDelay: number = 1000,
  operationName: string = 'operation',
  shouldRetry: (error: Error) => boolean = () => true,
): Promise<T> {
  let lastError: Error | undefined;

  for (let i = 0; i <= maxRetries; i++) {
    try {
      return await operation();
    } catch (error) {
      lastError = isError(error) ? error : new Error(String(error));
      if (i === maxRetries || !shouldRetry(lastError)) {
        break;
      }
      const delay = baseDelay * Math.pow(2, i);
      const retryCount = i + 1;
      logger.warn(
        `${operationName} failed, retrying in ${delay}ms (retry ${retryCount}/${maxRetries})`,
        {
          error: lastError.message,
        },
      );
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  logger.debug(`${operationName} gave up`, {
    error: lastError?.message,
  });
  throw lastError;
}
