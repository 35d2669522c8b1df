import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError, validate } from 'class-validator';

/**
 * Invalid command-line or programmatic input
 */
export class InvalidOptionsError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid options: ${problems.join('; ')}`);
    this.name = 'InvalidOptionsError';
  }
}

/**
 * Build a DTO from plain values and validate it.
 * Keys whose value is undefined are dropped so property defaults apply.
 */
export async function toValidatedDto<T extends object>(
  cls: ClassConstructor<T>,
  plain: Record<string, unknown>,
): Promise<T> {
  const dto = plainToInstance(cls, dropUndefined(plain));
  const errors = await validate(dto);
  if (errors.length > 0) {
    throw new InvalidOptionsError(describeErrors(errors));
  }
  return dto;
}

export function describeErrors(errors: ValidationError[], prefix = ''): string[] {
  return errors.flatMap((error) => {
    const property = `${prefix}${error.property}`;
    const own = Object.values(error.constraints ?? {}).map(
      (message) => `${property}: ${message}`,
    );
    return [...own, ...describeErrors(error.children ?? [], `${property}.`)];
  });
}

function dropUndefined(plain: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(plain)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => [
        key,
        isPlainObject(value) ? dropUndefined(value) : value,
      ]),
  );
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}
