import { MERCHANT_CAPABILITIES, NETWORKS } from './types';
import type {
  MerchantCapability,
  Network,
  PaymentRequestConfig,
  PaymentRequestDescriptor,
  SummaryLine,
} from './types';
import { ConfigurationError } from './errors';
import { formatAmount } from './summary';

const REGION_RE = /^[A-Z]{2}$/;
const CURRENCY_RE = /^[A-Z]{3}$/;

export function isNetwork(value: string): value is Network {
  return (NETWORKS as readonly string[]).includes(value);
}

export function isMerchantCapability(value: string): value is MerchantCapability {
  return (MERCHANT_CAPABILITIES as readonly string[]).includes(value);
}

function validateConfig(config: PaymentRequestConfig): string | null {
  if (config.merchantId.trim() === '') {
    return 'merchantId must not be blank';
  }
  if (!REGION_RE.test(config.regionCode)) {
    return `regionCode must be a two-letter uppercase code, got "${config.regionCode}"`;
  }
  if (!CURRENCY_RE.test(config.currencyCode)) {
    return `currencyCode must be a three-letter uppercase code, got "${config.currencyCode}"`;
  }
  if (config.acceptedNetworks.size === 0) {
    return 'acceptedNetworks must not be empty';
  }
  for (const network of config.acceptedNetworks) {
    if (!isNetwork(network)) {
      return `Unknown network "${String(network)}"`;
    }
  }
  for (const flag of config.capabilityFlags) {
    if (!isMerchantCapability(flag)) {
      return `Unknown capability flag "${String(flag)}"`;
    }
  }
  if (!config.capabilityFlags.has('supports3DS')) {
    return 'capabilityFlags must include supports3DS';
  }
  return null;
}

function validateSummary(lines: readonly SummaryLine[]): string | null {
  const last = lines[lines.length - 1];
  if (last === undefined) {
    return 'summaryLines must not be empty';
  }
  for (const line of lines) {
    if (line.label.trim() === '') {
      return 'Every summary line needs a label';
    }
    if (!Number.isSafeInteger(line.amount) || line.amount < 0) {
      return `Summary line "${line.label}" has an invalid amount`;
    }
  }
  if (last.label !== 'Total') {
    return 'The last summary line must be the Total';
  }
  const sum = lines.slice(0, -1).reduce((acc, line) => acc + line.amount, 0);
  if (sum !== last.amount) {
    return `Total ${last.amount} does not match the sum of the other lines (${sum})`;
  }
  return null;
}

/** Builds the descriptor handed to the wallet UI. Throws ConfigurationError when it would be malformed. */
export function buildPaymentRequest(
  config: PaymentRequestConfig,
  summaryLines: readonly SummaryLine[],
): PaymentRequestDescriptor {
  const problem = validateConfig(config) ?? validateSummary(summaryLines);
  if (problem !== null) {
    throw new ConfigurationError(problem);
  }

  return Object.freeze({
    merchantId: config.merchantId,
    regionCode: config.regionCode,
    currencyCode: config.currencyCode,
    acceptedNetworks: Object.freeze([...config.acceptedNetworks]),
    capabilityFlags: Object.freeze([...config.capabilityFlags]),
    summaryLines: Object.freeze(
      summaryLines.map(line => Object.freeze({
        label: line.label,
        amount: formatAmount(line.amount, config.currencyCode),
      })),
    ),
  });
}
