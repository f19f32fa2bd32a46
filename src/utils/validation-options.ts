import {
  BadRequestException,
  HttpStatus,
  ValidationError,
  ValidationPipeOptions,
} from '@nestjs/common';

type FieldErrors = { [property: string]: string | FieldErrors };

function collectFieldErrors(errors: ValidationError[]): FieldErrors {
  const fields: FieldErrors = {};
  for (const error of errors) {
    const children = error.children ?? [];
    fields[error.property] =
      children.length > 0
        ? collectFieldErrors(children)
        : Object.values(error.constraints ?? {}).join(', ');
  }
  return fields;
}

/**
 * Global ValidationPipe options.
 *
 * Rejections share the shape of domain validation errors
 * (`status`, `code`, `message`) plus a per-field breakdown.
 */
const validationOptions: ValidationPipeOptions = {
  transform: true,
  whitelist: true,
  forbidNonWhitelisted: true,
  errorHttpStatusCode: HttpStatus.BAD_REQUEST,
  exceptionFactory: (errors: ValidationError[]) =>
    new BadRequestException({
      status: HttpStatus.BAD_REQUEST,
      code: 'INVALID_INPUT',
      message: 'Request validation failed',
      errors: collectFieldErrors(errors),
    }),
};

export default validationOptions;
