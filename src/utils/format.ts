export function formatPercentage(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

export function formatCurrency(amount: number): string {
  return `$${amount.toFixed(2)}`;
}
