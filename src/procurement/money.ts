// Amounts travel as decimal currency values (two fractional digits) and are
// converted to integer minor units for every ledger calculation.

export function toMinorUnits(amount: number): number {
  return Math.round(amount * 100);
}

export function fromMinorUnits(minor: number): number {
  return minor / 100;
}

export function isWholeMinorAmount(amount: number): boolean {
  return Number.isFinite(amount) && Math.abs(amount * 100 - toMinorUnits(amount)) < 1e-6;
}

export function formatMoney(amount: number, currency: string): string {
  try {
    return new Intl.NumberFormat('en-US', {
      style: 'currency',
      currency,
      minimumFractionDigits: 2,
      maximumFractionDigits: 2,
    }).format(amount);
  } catch {
    return `${currency} ${amount.toFixed(2)}`;
  }
}
