import {
  ValidateBy,
  buildMessage,
  type ValidationOptions,
} from 'class-validator';
import { Decimal, MAX_INPUT_DIGITS } from '@stock-tracker/ledger';

export function parseDecimal(value: unknown): Decimal | null {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    return new Decimal(value);
  }
  if (typeof value === 'string') {
    const s = value.trim().replace(',', '.');
    if (!s) return null;
    try {
      const d = new Decimal(s);
      return d.isFinite() ? d : null;
    } catch {
      return null;
    }
  }
  return null;
}

export const IsPositiveDecimal: (
  options?: ValidationOptions,
) => PropertyDecorator = (options) =>
  ValidateBy(
    {
      name: 'isPositiveDecimal',
      validator: {
        validate(value: unknown) {
          const d = parseDecimal(value);
          return d !== null && d.gt(0);
        },
        defaultMessage: buildMessage(
          (eachPrefix) => `${eachPrefix}$property must be a positive decimal`,
          options,
        ),
      },
    },
    options,
  );

export const IsNonNegativeDecimal: (
  options?: ValidationOptions,
) => PropertyDecorator = (options) =>
  ValidateBy(
    {
      name: 'isNonNegativeDecimal',
      validator: {
        validate(value: unknown) {
          const d = parseDecimal(value);
          return d !== null && d.gte(0);
        },
        defaultMessage: buildMessage(
          (eachPrefix) => `${eachPrefix}$property must be a decimal >= 0`,
          options,
        ),
      },
    },
    options,
  );

// integer digits plus decimal places, so 1e30 counts as 31
export function digitSpan(d: Decimal): number {
  return d.trunc().abs().toFixed().length + d.decimalPlaces();
}

export const HasMaxDigits: (
  options?: ValidationOptions,
) => PropertyDecorator = (options) =>
  ValidateBy(
    {
      name: 'hasMaxDigits',
      validator: {
        validate(value: unknown) {
          const d = parseDecimal(value);
          return d === null || digitSpan(d) <= MAX_INPUT_DIGITS;
        },
        defaultMessage: buildMessage(
          (eachPrefix) =>
            `${eachPrefix}$property must have at most ${MAX_INPUT_DIGITS} digits`,
          options,
        ),
      },
    },
    options,
  );
