import { Decimal as DecimalJs } from 'decimal.js';

/**
 * Decimal constructor shared by the parser and interpreter: 28 significant
 * digits, half-even rounding.
 */
export const Decimal = DecimalJs.clone({ precision: 28, rounding: DecimalJs.ROUND_HALF_EVEN });
export type Decimal = DecimalJs;

/** Millimeters per mil. */
export const MM_PER_MIL: Decimal = new Decimal('0.0254');
