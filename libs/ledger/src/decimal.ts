import BaseDecimal from "decimal.js";

/**
 * Most digits (integer part plus decimal places) accepted for an entered
 * quantity, price or commission. Sums and products of two such values fit
 * within the precision below, so share counts are never rounded.
 */
export const MAX_INPUT_DIGITS = 24;

export const Decimal = BaseDecimal.clone({
  precision: 2 * MAX_INPUT_DIGITS + 2,
  rounding: BaseDecimal.ROUND_HALF_UP,
});

export type Decimal = BaseDecimal;
