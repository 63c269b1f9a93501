export * from './types';
export * from './errors';
export { buildSummary, formatAmount, minorUnitDigits } from './summary';
export { canAuthorize } from './capability';
export type { WalletCapabilityQuery } from './capability';
export { buildPaymentRequest } from './request';
export { requestAuthorization } from './authorization';
export type { AuthorizationCollaborators, AuthorizationEvent, AuthorizationUi } from './authorization';
export { relayToken } from './relay';
export type { TokenSubmitter } from './relay';
export { createHttpTokenSubmitter } from './submitter';
export type { HttpTokenSubmitterOptions } from './submitter';
export { loadPaymentRequestConfig, loadSubmitterConfig } from './config';
