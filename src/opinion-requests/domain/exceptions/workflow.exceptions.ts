import {
  BadRequestException,
  ConflictException,
  HttpStatus,
  InternalServerErrorException,
} from '@nestjs/common';

/**
 * Transition not legal from the request's (or opinion's) current state.
 */
export class InvalidStateTransitionException extends BadRequestException {
  constructor(
    readonly currentStatus: string,
    readonly targetStatus: string | null,
    message?: string,
  ) {
    super({
      statusCode: HttpStatus.BAD_REQUEST,
      error: 'Invalid State Transition',
      message:
        message ??
        `Invalid state transition: ${currentStatus} → ${targetStatus ?? 'none'}`,
      currentStatus,
      targetStatus,
    });
  }
}

/**
 * The request changed between read and write (version mismatch).
 */
export class ConcurrentModificationException extends ConflictException {
  constructor(
    readonly requestId: number,
    readonly expectedVersion: number,
  ) {
    super(
      `Opinion request ${requestId} was modified concurrently (expected version ${expectedVersion})`,
    );
  }
}

/**
 * A collaborator (file storage, department registry, user directory) failed.
 */
export class DependencyFailureException extends InternalServerErrorException {
  constructor(
    readonly dependency: string,
    message: string,
  ) {
    super(`${dependency} failure: ${message}`);
  }
}
