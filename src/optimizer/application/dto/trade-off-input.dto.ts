import { z } from 'zod';
import { TradeOffSchema } from './optimize-intervals.dto';

// Plain decimal or exponent notation; no hex, octal or binary prefixes
const DECIMAL_NUMBER = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

// Text typed at the prompt or passed as a flag
export const TradeOffInputSchema = z
  .string()
  .trim()
  .min(1, 'Trade-off is required')
  .regex(DECIMAL_NUMBER, 'Expected a decimal number')
  .pipe(z.coerce.number().pipe(TradeOffSchema));
