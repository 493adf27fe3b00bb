import {
  BadRequestException,
  HttpStatus,
  ValidationError,
  ValidationPipeOptions,
} from '@nestjs/common';

/**
 * Flatten class-validator errors to `{ 'path.to.field': 'messages' }`.
 */
export function flattenValidationErrors(
  errors: ValidationError[],
  parentPath = '',
): Record<string, string> {
  return errors.reduce<Record<string, string>>((accumulator, error) => {
    const path = parentPath
      ? `${parentPath}.${error.property}`
      : error.property;

    if (error.children?.length) {
      return {
        ...accumulator,
        ...flattenValidationErrors(error.children, path),
      };
    }

    return {
      ...accumulator,
      [path]: Object.values(error.constraints ?? {}).join(', '),
    };
  }, {});
}

const validationOptions: ValidationPipeOptions = {
  transform: true,
  whitelist: true,
  errorHttpStatusCode: HttpStatus.BAD_REQUEST,
  exceptionFactory: (errors: ValidationError[]) => {
    return new BadRequestException({
      status: HttpStatus.BAD_REQUEST,
      errors: flattenValidationErrors(errors),
    });
  },
};

export default validationOptions;
