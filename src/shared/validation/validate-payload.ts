import { plainToInstance } from 'class-transformer';
import type { ClassConstructor } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';

export type PayloadCheck<T> =
  | { valid: true; value: T }
  | { valid: false; error: string };

/**
 * Runs a message payload through the same DTO rules the HTTP routes use.
 * An absent or non-object payload is validated as `{}`, so required
 * fields report as missing instead of throwing.
 */
export async function validatePayload<T extends object>(
  dto: ClassConstructor<T>,
  payload: unknown,
): Promise<PayloadCheck<T>> {
  const plain =
    typeof payload === 'object' && payload !== null && !Array.isArray(payload)
      ? payload
      : {};
  const value = plainToInstance(dto, plain);
  const errors = await validate(value);
  if (errors.length > 0) {
    return { valid: false, error: firstMessage(errors, '') };
  }
  return { valid: true, value };
}

function firstMessage(errors: ValidationError[], prefix: string): string {
  const [first] = errors;
  const path = prefix ? `${prefix}.${first.property}` : first.property;
  const [message] = Object.values(first.constraints ?? {});
  if (message !== undefined) {
    return prefix ? `${prefix}.${message}` : message;
  }
  if (first.children && first.children.length > 0) {
    return firstMessage(first.children, path);
  }
  return `${path} is invalid`;
}
