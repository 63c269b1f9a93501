import type { MerchantCapability, Network, PaymentRequestConfig } from './types';
import { ConfigurationError } from './errors';
import { isMerchantCapability, isNetwork } from './request';
import type { HttpTokenSubmitterOptions } from './submitter';

type Env = Record<string, string | undefined>;

function required(env: Env, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new ConfigurationError(`Missing required environment variable: ${name}`);
  }
  return value;
}

function list(raw: string): string[] {
  return raw.split(',').map(part => part.trim()).filter(part => part !== '');
}

/**
 * Per-deployment merchant defaults. Values are checked for shape here;
 * buildPaymentRequest checks the rest.
 */
export function loadPaymentRequestConfig(env: Env = process.env): PaymentRequestConfig {
  const networks = new Set<Network>();
  for (const name of list(required(env, 'ACCEPTED_NETWORKS'))) {
    if (!isNetwork(name)) {
      throw new ConfigurationError(`ACCEPTED_NETWORKS: unknown network "${name}"`);
    }
    networks.add(name);
  }

  const capabilities = new Set<MerchantCapability>();
  for (const name of list(env['MERCHANT_CAPABILITIES']?.trim() || 'supports3DS')) {
    if (!isMerchantCapability(name)) {
      throw new ConfigurationError(`MERCHANT_CAPABILITIES: unknown capability "${name}"`);
    }
    capabilities.add(name);
  }

  return {
    merchantId: required(env, 'MERCHANT_ID'),
    regionCode: required(env, 'MERCHANT_REGION').toUpperCase(),
    currencyCode: required(env, 'MERCHANT_CURRENCY').toUpperCase(),
    acceptedNetworks: networks,
    capabilityFlags: capabilities,
  };
}

export function loadSubmitterConfig(env: Env = process.env): HttpTokenSubmitterOptions {
  const endpoint = required(env, 'TOKEN_ENDPOINT');
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch (err) {
    throw new ConfigurationError(`TOKEN_ENDPOINT is not a valid URL: ${endpoint}`, { cause: err });
  }
  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new ConfigurationError(`TOKEN_ENDPOINT must use http or https, got ${url.protocol}`);
  }

  const rawTimeout = env['TOKEN_TIMEOUT_MS']?.trim();
  if (!rawTimeout) {
    return { endpoint };
  }
  const timeoutMs = Number(rawTimeout);
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigurationError(`TOKEN_TIMEOUT_MS must be a positive integer, got "${rawTimeout}"`);
  }
  return { endpoint, timeoutMs };
}
