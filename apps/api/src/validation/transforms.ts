import type { TransformFnParams } from 'class-transformer';

export function normalizeDecimal({ value }: TransformFnParams): string {
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : '';
  if (typeof value === 'string') return value.trim().replace(',', '.');
  return '';
}

// Blank form fields count as absent.
export function normalizeOptionalDecimal(
  params: TransformFnParams,
): string | undefined {
  const s = normalizeDecimal(params);
  return s === '' ? undefined : s;
}

export function trimText({ value }: TransformFnParams): unknown {
  return typeof value === 'string' ? value.trim() : value;
}

export function normalizeSymbol({ value }: TransformFnParams): unknown {
  return typeof value === 'string' ? value.trim().toUpperCase() : value;
}

export function blankToUndefined({ value }: TransformFnParams): unknown {
  if (typeof value !== 'string') return value;
  const s = value.trim();
  return s === '' ? undefined : s;
}

export function optionalSymbol(params: TransformFnParams): unknown {
  return blankToUndefined({ ...params, value: normalizeSymbol(params) });
}
