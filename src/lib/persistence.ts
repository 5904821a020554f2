import { DataIntegrityError, isAppError } from './errors';
import { logger } from './logger';

/**
 * Run a repository write, reclassifying unexpected failures as DataIntegrityError
 */
export async function withDataIntegrity<T>(
  operation: string,
  write: () => Promise<T>,
  context: Record<string, unknown> = {}
): Promise<T> {
  try {
    return await write();
  } catch (error) {
    if (isAppError(error)) {
      throw error;
    }
    const wrapped = new DataIntegrityError(`Failed to ${operation}`, { cause: error });
    logger.error(`Failed to ${operation}`, wrapped, context);
    throw wrapped;
  }
}
