import { plainToInstance, type ClassConstructor } from 'class-transformer';
import { validate, type ValidationError as ConstraintViolation } from 'class-validator';

export type PayloadValidation<T> =
  | { valid: true; value: T }
  | { valid: false; errors: string[] };

function collectMessages(violations: ConstraintViolation[], prefix = ''): string[] {
  return violations.flatMap((violation) => {
    const path = prefix ? `${prefix}.${violation.property}` : violation.property;
    const own = Object.values(violation.constraints ?? {});
    const nested = collectMessages(violation.children ?? [], path);
    return [...own.map((message) => (prefix ? `${path}: ${message}` : message)), ...nested];
  });
}

/**
 * Validate a message payload against a class-validator DTO. Microservice
 * handlers answer invalid payloads with an envelope instead of an exception.
 */
export async function validatePayload<T extends object>(
  dtoClass: ClassConstructor<T>,
  payload: unknown,
): Promise<PayloadValidation<T>> {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    return { valid: false, errors: ['payload must be an object'] };
  }

  const value = plainToInstance(dtoClass, payload);
  const violations = await validate(value, { whitelist: true });

  if (violations.length > 0) {
    return { valid: false, errors: collectMessages(violations) };
  }

  return { valid: true, value };
}
