import { BadRequestException, ValidationError, ValidationPipe } from '@nestjs/common';

export const REQUIRED_FIELDS = ['html_code', 'focus_keyword', 'seo_score'] as const;

const MISSING_CONSTRAINTS = ['isDefined', 'isNotEmpty'];

const isMissing = (error: ValidationError) =>
  MISSING_CONSTRAINTS.some((constraint) => constraint in (error.constraints ?? {}));

/**
 * Reduces class-validator output to a single message: the first missing
 * required field in request order, otherwise the first invalid field.
 */
export function toBadRequest(errors: ValidationError[]): BadRequestException {
  for (const field of REQUIRED_FIELDS) {
    const error = errors.find((candidate) => candidate.property === field);
    if (error && isMissing(error)) {
      return new BadRequestException(`Missing required field: ${field}`);
    }
  }
  const [first] = errors;
  return new BadRequestException(
    first ? `Invalid value for field: ${first.property}` : 'Invalid request body',
  );
}

export const createValidationPipe = () =>
  new ValidationPipe({
    transform: true,
    whitelist: true,
    exceptionFactory: toBadRequest,
  });
