/**
 * Multiply a two-decimal amount without binary float drift
 */
export function multiplyAmount(unitAmount: number, quantity: number): number {
  return Math.round(unitAmount * 100) * quantity / 100;
}

export function isWholeCents(amount: number): boolean {
  const cents = amount * 100;
  return Math.abs(cents - Math.round(cents)) < 1e-6;
}
