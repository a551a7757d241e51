import {
  BadRequestException,
  HttpStatus,
  ValidationError,
  ValidationPipeOptions,
} from '@nestjs/common';

/**
 * Flatten nested validation errors into `{ 'parent.child': 'messages' }`.
 */
function collectErrors(
  errors: ValidationError[],
  parentPath = '',
): Record<string, string> {
  const collected: Record<string, string> = {};

  for (const error of errors) {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    if (error.constraints) {
      collected[path] = Object.values(error.constraints).join(', ');
    }
    if (error.children?.length) {
      Object.assign(collected, collectErrors(error.children, path));
    }
  }

  return collected;
}

const validationOptions: ValidationPipeOptions = {
  transform: true,
  whitelist: true,
  errorHttpStatusCode: HttpStatus.BAD_REQUEST,
  exceptionFactory: (errors: ValidationError[]) =>
    new BadRequestException({
      statusCode: HttpStatus.BAD_REQUEST,
      message: 'Validation failed',
      errors: collectErrors(errors),
    }),
};

export default validationOptions;
