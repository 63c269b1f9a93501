export const NETWORKS = [
  'amex',
  'cartesBancaires',
  'chinaUnionPay',
  'discover',
  'eftpos',
  'electron',
  'elo',
  'girocard',
  'interac',
  'jcb',
  'mada',
  'maestro',
  'masterCard',
  'mir',
  'privateLabel',
  'visa',
  'vPay',
] as const;

export type Network = (typeof NETWORKS)[number];

export const MERCHANT_CAPABILITIES = ['supports3DS', 'supportsEMV', 'supportsCredit', 'supportsDebit'] as const;

export type MerchantCapability = (typeof MERCHANT_CAPABILITIES)[number];

export interface CartItem {
  readonly name: string;
  readonly price: number; // minor units, integer >= 0
}

export interface SummaryLine {
  readonly label: string;
  readonly amount: number; // minor units
}

export interface PaymentRequestConfig {
  merchantId: string;
  regionCode: string;   // ISO 3166-1 alpha-2
  currencyCode: string; // ISO 4217
  acceptedNetworks: ReadonlySet<Network>;
  capabilityFlags: ReadonlySet<MerchantCapability>;
}

export interface DescriptorLine {
  readonly label: string;
  readonly amount: string; // decimal, e.g. "40.50"
}

export interface PaymentRequestDescriptor {
  readonly merchantId: string;
  readonly regionCode: string;
  readonly currencyCode: string;
  readonly acceptedNetworks: readonly Network[];
  readonly capabilityFlags: readonly MerchantCapability[];
  readonly summaryLines: readonly DescriptorLine[];
}

/** Produced by the wallet UI; meaningful only to the backend. */
export type OpaqueToken = string;

export type AuthorizationOutcome = 'SUCCESS' | 'FAILURE';

export type CompletionStatus = AuthorizationOutcome;

export type AttemptState =
  | 'IDLE'
  | 'CAPABILITY_CHECKED'
  | 'REQUEST_BUILT'
  | 'PRESENTED'
  | 'USER_APPROVED'
  | 'TOKEN_RECEIVED'
  | 'BACKEND_SUBMITTED'
  | 'USER_CANCELLED'
  | 'PRESENTATION_FAILED'
  | 'COMPLETED';

export type AttemptOutcome = 'SUCCESS' | 'BACKEND_FAILURE' | 'USER_CANCELLED' | 'PRESENTATION_FAILED';

export interface AttemptResult {
  attemptId: string;
  outcome: AttemptOutcome;
  states: AttemptState[];
}

export interface SubmissionContext {
  attemptId: string;
  currencyCode: string;
  totalAmount: number; // minor units
}

// ---------------------------------------------------------------------------
// Token intake wire format
// ---------------------------------------------------------------------------

export interface TokenSubmissionRequest {
  attemptId: string;    // UUID
  token: OpaqueToken;
  currencyCode: string;
  totalAmount: number;  // minor units
}

export interface TokenSubmissionResponse {
  attemptId: string;
  outcome: AuthorizationOutcome;
}

export interface Submission {
  attemptId: string;
  tokenDigest: string;  // sha256 hex of the token
  currencyCode: string;
  totalAmount: number;
  status: 'PENDING' | 'COMPLETED';
  outcome?: AuthorizationOutcome | undefined;
  createdAt: string;    // ISO 8601 timestamp
  completedAt?: string | undefined;
}

export interface ValidationError {
  error: 'VALIDATION_ERROR';
  message: string;
}

export interface ConflictError {
  error: 'SUBMISSION_IN_PROGRESS';
  message: string;
}

export interface AttemptReusedError {
  error: 'ATTEMPT_ID_REUSED';
  message: string;
}

export interface InternalError {
  error: 'INTERNAL_ERROR';
  message: string;
}

export type IntakeErrorResponse = ValidationError | ConflictError | AttemptReusedError | InternalError;
