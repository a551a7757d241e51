import { HttpException, Logger } from '@nestjs/common';
import { DependencyFailureException } from '../exceptions/workflow.exceptions';

/**
 * Run a collaborator call. HTTP exceptions pass through unchanged; any
 * other failure is logged and rethrown as DependencyFailureException.
 */
export async function callDependency<T>(
  logger: Logger,
  dependency: string,
  call: () => Promise<T>,
): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof HttpException) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`${dependency} call failed: ${message}`);
    throw new DependencyFailureException(dependency, message);
  }
}
