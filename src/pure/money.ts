/**
 * Rounds to cents, half to even, on the exact binary value of the amount:
 * 0.125 is stored exactly and rounds to 0.12, while 1.005 is stored just
 * below 1.005 and rounds to 1.00. Every monetary step is rounded on its
 * own, so the order in which amounts are rounded is part of the pricing
 * rules.
 */
export function roundMoney(amount: number): number {
  if (!Number.isFinite(amount)) {
    return amount;
  }

  // 20 places is enough to tell a tie from a near-tie for any amount below 10^5
  const [whole = '0', fraction = ''] = Math.abs(amount).toFixed(20).split('.');
  const cents = Number(whole) * 100 + Number(fraction.slice(0, 2));
  const rest = fraction.slice(2);
  const half = '5'.padEnd(rest.length, '0');
  const roundUp = rest > half || (rest === half && cents % 2 === 1);

  const rounded = (cents + (roundUp ? 1 : 0)) / 100;
  return amount < 0 && rounded !== 0 ? -rounded : rounded;
}

export function toFixedMoney(amount: number): string {
  return roundMoney(amount).toFixed(2);
}

export function formatMoney(amount: number): string {
  return `$${toFixedMoney(amount)}`;
}
