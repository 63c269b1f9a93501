import { randomUUID } from 'crypto';
import type {
  AttemptOutcome,
  AttemptResult,
  AttemptState,
  CompletionStatus,
  OpaqueToken,
  PaymentRequestConfig,
  PaymentRequestDescriptor,
  SummaryLine,
} from './types';
import { canAuthorize } from './capability';
import type { WalletCapabilityQuery } from './capability';
import { ConfigurationError, NotSupportedError } from './errors';
import { log } from './log';
import { relayToken } from './relay';
import type { TokenSubmitter } from './relay';
import { buildPaymentRequest } from './request';

// ---------------------------------------------------------------------------
// Wallet UI boundary
// ---------------------------------------------------------------------------

export type AuthorizationEvent =
  | { type: 'authorized'; token: OpaqueToken; complete: (status: CompletionStatus) => void }
  | { type: 'dismissed'; reason: 'cancelled' | 'failed' };

/**
 * The platform's modal authorization sheet. It reports back through the
 * single `onEvent` callback and dismisses itself once `complete` is called.
 */
export interface AuthorizationUi {
  present(descriptor: PaymentRequestDescriptor, onEvent: (event: AuthorizationEvent) => void): void | Promise<void>;
}

export interface AuthorizationCollaborators {
  capability: WalletCapabilityQuery;
  ui: AuthorizationUi;
  submitter: TokenSubmitter;
}

// ---------------------------------------------------------------------------
// Attempt
// ---------------------------------------------------------------------------

/**
 * Runs one payment attempt. Rejects with NotSupportedError or
 * ConfigurationError before anything is shown; otherwise resolves once the
 * attempt reaches COMPLETED. There are no retries: call again for a new attempt.
 */
export async function requestAuthorization(
  config: PaymentRequestConfig,
  summaryLines: readonly SummaryLine[],
  collaborators: AuthorizationCollaborators,
): Promise<AttemptResult> {
  const { capability, ui, submitter } = collaborators;
  const attemptId = randomUUID();
  const start = Date.now();
  const states: AttemptState[] = ['IDLE'];

  log({ level: 'info', action: 'authorization.start', attemptId });

  if (!canAuthorize(capability, config.acceptedNetworks)) {
    log({ level: 'warn', action: 'authorization.not_supported', attemptId, networks: [...config.acceptedNetworks] });
    throw new NotSupportedError('This device cannot complete a wallet payment with the accepted networks');
  }
  states.push('CAPABILITY_CHECKED');

  let descriptor: PaymentRequestDescriptor;
  try {
    descriptor = buildPaymentRequest(config, summaryLines);
  } catch (err) {
    log({ level: 'error', action: 'authorization.invalid_request', attemptId, error: String(err) });
    throw err;
  }
  states.push('REQUEST_BUILT');

  const totalAmount = summaryLines[summaryLines.length - 1]?.amount ?? 0;

  return new Promise<AttemptResult>((resolve, reject) => {
    let tokenReceived = false;
    let completed = false;

    const finish = (outcome: AttemptOutcome): void => {
      completed = true;
      states.push('COMPLETED');
      log({ level: 'info', action: 'authorization.complete', attemptId, outcome, durationMs: Date.now() - start });
      resolve({ attemptId, outcome, states: [...states] });
    };

    const onEvent = (event: AuthorizationEvent): void => {
      if (completed || tokenReceived) {
        log({ level: 'info', action: 'authorization.event_ignored', attemptId, event: event.type });
        return;
      }

      if (event.type === 'dismissed') {
        if (event.reason === 'cancelled') {
          states.push('USER_CANCELLED');
          finish('USER_CANCELLED');
        } else {
          states.push('PRESENTATION_FAILED');
          finish('PRESENTATION_FAILED');
        }
        return;
      }

      tokenReceived = true;
      states.push('USER_APPROVED', 'TOKEN_RECEIVED', 'BACKEND_SUBMITTED');

      void relayToken(event.token, { attemptId, currencyCode: config.currencyCode, totalAmount }, submitter, event.complete)
        .then(
          status => finish(status === 'SUCCESS' ? 'SUCCESS' : 'BACKEND_FAILURE'),
          (err: unknown) => {
            completed = true;
            states.push('COMPLETED');
            log({ level: 'error', action: 'authorization.error', attemptId, error: String(err) });
            reject(err);
          },
        );
    };

    const failPresentation = (err: unknown): void => {
      if (completed || tokenReceived) {
        log({ level: 'error', action: 'authorization.present_error', attemptId, error: String(err) });
        return;
      }
      completed = true;
      states.push('PRESENTATION_FAILED', 'COMPLETED');
      log({ level: 'error', action: 'authorization.present_failed', attemptId, error: String(err) });
      reject(new ConfigurationError('The authorization UI could not be presented', { cause: err }));
    };

    states.push('PRESENTED');
    log({ level: 'info', action: 'authorization.presented', attemptId });

    let presentation: void | Promise<void>;
    try {
      presentation = ui.present(descriptor, onEvent);
    } catch (err) {
      failPresentation(err);
      return;
    }
    void Promise.resolve(presentation).catch(failPresentation);
  });
}
