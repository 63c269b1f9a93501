import { loadPaymentRequestConfig, loadSubmitterConfig } from '../src/config';
import { ConfigurationError } from '../src/errors';

const MERCHANT_ENV = {
  MERCHANT_ID: 'merchant.test.shop',
  MERCHANT_REGION: 'us',
  MERCHANT_CURRENCY: 'usd',
  ACCEPTED_NETWORKS: 'visa, masterCard,amex',
};

test('reads merchant defaults from the environment', () => {
  const config = loadPaymentRequestConfig(MERCHANT_ENV);

  expect(config.merchantId).toBe('merchant.test.shop');
  expect(config.regionCode).toBe('US');
  expect(config.currencyCode).toBe('USD');
  expect([...config.acceptedNetworks]).toEqual(['visa', 'masterCard', 'amex']);
  expect([...config.capabilityFlags]).toEqual(['supports3DS']);
});

test('MERCHANT_CAPABILITIES overrides the default flags', () => {
  const config = loadPaymentRequestConfig({ ...MERCHANT_ENV, MERCHANT_CAPABILITIES: 'supports3DS,supportsDebit' });

  expect([...config.capabilityFlags]).toEqual(['supports3DS', 'supportsDebit']);
});

test('blank MERCHANT_CAPABILITIES falls back to supports3DS', () => {
  const config = loadPaymentRequestConfig({ ...MERCHANT_ENV, MERCHANT_CAPABILITIES: '  ' });

  expect([...config.capabilityFlags]).toEqual(['supports3DS']);
});

test('missing MERCHANT_ID → ConfigurationError', () => {
  const { MERCHANT_ID: _omitted, ...env } = MERCHANT_ENV;

  expect(() => loadPaymentRequestConfig(env)).toThrow('Missing required environment variable: MERCHANT_ID');
});

test('unknown network → ConfigurationError', () => {
  expect(() => loadPaymentRequestConfig({ ...MERCHANT_ENV, ACCEPTED_NETWORKS: 'visa,bitcoin' }))
    .toThrow(ConfigurationError);
});

test('unknown capability → ConfigurationError', () => {
  expect(() => loadPaymentRequestConfig({ ...MERCHANT_ENV, MERCHANT_CAPABILITIES: 'supportsMagic' }))
    .toThrow(ConfigurationError);
});

test('submitter config without a timeout', () => {
  expect(loadSubmitterConfig({ TOKEN_ENDPOINT: 'https://pay.example.test/tokens' }))
    .toEqual({ endpoint: 'https://pay.example.test/tokens' });
});

test('submitter config with a timeout', () => {
  expect(loadSubmitterConfig({ TOKEN_ENDPOINT: 'https://pay.example.test/tokens', TOKEN_TIMEOUT_MS: '8000' }))
    .toEqual({ endpoint: 'https://pay.example.test/tokens', timeoutMs: 8000 });
});

test('invalid submitter settings → ConfigurationError', () => {
  expect(() => loadSubmitterConfig({})).toThrow(ConfigurationError);
  expect(() => loadSubmitterConfig({ TOKEN_ENDPOINT: 'not a url' })).toThrow(ConfigurationError);
  expect(() => loadSubmitterConfig({ TOKEN_ENDPOINT: 'ftp://pay.example.test' })).toThrow(ConfigurationError);
  expect(() => loadSubmitterConfig({ TOKEN_ENDPOINT: 'https://pay.example.test', TOKEN_TIMEOUT_MS: '0' }))
    .toThrow(ConfigurationError);
});
