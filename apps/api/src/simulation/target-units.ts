import { InvalidInputError } from './simulation.errors';

// Reserved for a time-adjusted cost buffer; not modelled.
const TIME_COST_BUFFER = 0;

/**
 * Largest position that survives a `maxDropPercent` fall without hitting the
 * broker closeout level.
 *
 * Buffer = max drop + (margin requirement × closeout fraction), so the
 * position size is equity / (price × buffer).
 */
export function targetUnits(
  equity: number,
  price: number,
  maxDropPercent: number,
  marginRequirement: number,
  marginCloseoutFraction: number,
): number {
  if (!Number.isFinite(price) || price <= 0) {
    throw new InvalidInputError(`price must be a positive number, got ${price}`);
  }
  if (!Number.isFinite(equity)) {
    throw new InvalidInputError(`equity must be a finite number, got ${equity}`);
  }

  const buffer = maxDropPercent + marginRequirement * marginCloseoutFraction + TIME_COST_BUFFER;
  if (!Number.isFinite(buffer) || buffer <= 0) {
    throw new InvalidInputError(
      `total buffer must be positive (maxDropPercent=${maxDropPercent}, marginRequirement=${marginRequirement}, marginCloseoutFraction=${marginCloseoutFraction})`,
    );
  }

  // Units never go negative; an account with no equity holds nothing.
  if (equity <= 0) return 0;

  return equity / (price * buffer);
}
