import { plainToInstance, type ClassConstructor } from 'class-transformer';
import { validate, type ValidationError } from 'class-validator';

export type FormValues = Record<string, unknown>;

export type FormResult<T> =
  | { ok: true; value: T }
  | { ok: false; errors: string[] };

function messages(errors: ValidationError[]): string[] {
  return errors.flatMap((e) => [
    ...Object.values(e.constraints ?? {}),
    ...messages(e.children ?? []),
  ]);
}

/** Same rules the JSON API applies through ValidationPipe. */
export async function validateForm<T extends object>(
  cls: ClassConstructor<T>,
  body: FormValues,
): Promise<FormResult<T>> {
  const value = plainToInstance(cls, body);
  const errors = await validate(value, { whitelist: true });
  if (errors.length) return { ok: false, errors: messages(errors) };
  return { ok: true, value };
}

export function fieldValue(values: FormValues, name: string): string {
  const v = values[name];
  return typeof v === 'string' ? v : '';
}
