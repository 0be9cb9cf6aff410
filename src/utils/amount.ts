import Decimal from "decimal.js";

// Amounts are whole numbers of the smallest currency unit.
export function parseAmount(value: string | number): Decimal | null {
  let amount: Decimal;
  try {
    amount = new Decimal(value);
  } catch {
    return null;
  }
  if (!amount.isFinite() || !amount.isInteger() || amount.isNegative()) {
    return null;
  }
  return amount;
}

export function formatAmount(amount: Decimal): string {
  return amount.toFixed(0);
}
