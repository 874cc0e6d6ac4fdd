import { validate, ValidationError } from "class-validator";
import { plainToInstance } from "class-transformer";

export async function validateDto<T extends object>(
  DtoClass: new () => T,
  plain: Record<string, unknown>,
): Promise<{ instance: T; errors: string[] }> {
  const instance = plainToInstance(DtoClass, plain);
  const validationErrors: ValidationError[] = await validate(instance);

  return { instance, errors: flattenErrors(validationErrors) };
}

/** Collects constraint messages from nested DTOs, prefixed with their path. */
function flattenErrors(errors: ValidationError[], parentPath = ""): string[] {
  return errors.flatMap((err) => {
    const path = parentPath ? `${parentPath}.${err.property}` : err.property;
    const own = Object.values(err.constraints || {}).map((message) =>
      parentPath ? `${parentPath}.${message}` : message,
    );
    return [...own, ...flattenErrors(err.children || [], path)];
  });
}

export function isPlainObject(
  value: unknown,
): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
