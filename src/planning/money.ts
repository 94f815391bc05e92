/**
 * Cent-exact money arithmetic. Amounts travel as major units rounded to
 * cents; sums and comparisons happen in integer cents.
 */

export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

export function roundMoney(amount: number): number {
  return fromCents(toCents(amount));
}

/** Round down to the cent, never up. */
export function floorMoney(amount: number): number {
  return Math.floor(amount * 100 + 1e-6) / 100;
}

export function sumAmounts(amounts: readonly number[]): number {
  return fromCents(amounts.reduce((acc, amount) => acc + toCents(amount), 0));
}
