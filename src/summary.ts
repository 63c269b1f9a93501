import type { CartItem, SummaryLine } from './types';
import { InvalidArgumentError } from './errors';

function assertAmount(value: number, what: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidArgumentError(`${what} must be a non-negative integer amount in minor units, got ${value}`);
  }
}

/**
 * Items in input order, then Tax and Shipping only when strictly positive,
 * then Total.
 *
 * Prices, tax and shipping are integers in the currency's minor unit (cents
 * for USD, yen for JPY): 25.50 USD is passed as 2550. A fractional amount
 * throws InvalidArgumentError rather than being rounded. Use formatAmount to
 * render a line as a decimal string.
 */
export function buildSummary(items: readonly CartItem[], tax = 0, shipping = 0): SummaryLine[] {
  for (const item of items) {
    assertAmount(item.price, `price of "${item.name}"`);
  }
  assertAmount(tax, 'tax');
  assertAmount(shipping, 'shipping');

  const lines: SummaryLine[] = items.map(item => ({ label: item.name, amount: item.price }));

  if (tax > 0) {
    lines.push({ label: 'Tax', amount: tax });
  }
  if (shipping > 0) {
    lines.push({ label: 'Shipping', amount: shipping });
  }

  const total = lines.reduce((sum, line) => sum + line.amount, 0);
  if (!Number.isSafeInteger(total)) {
    throw new InvalidArgumentError('Total exceeds the representable amount range');
  }

  lines.push({ label: 'Total', amount: total });
  return lines;
}

/** Number of minor-unit digits for a currency: 2 for USD, 0 for JPY. */
export function minorUnitDigits(currencyCode: string): number {
  const { maximumFractionDigits } = new Intl.NumberFormat('en', {
    style: 'currency',
    currency: currencyCode,
  }).resolvedOptions();
  return maximumFractionDigits ?? 2;
}

/** Renders a minor-unit amount as a plain decimal string, e.g. 4050 USD → "40.50". */
export function formatAmount(amount: number, currencyCode: string): string {
  assertAmount(amount, 'amount');
  const digits = minorUnitDigits(currencyCode);
  if (digits === 0) {
    return String(amount);
  }
  const padded = String(amount).padStart(digits + 1, '0');
  return `${padded.slice(0, -digits)}.${padded.slice(-digits)}`;
}
