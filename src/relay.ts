import type { AuthorizationOutcome, CompletionStatus, OpaqueToken, SubmissionContext } from './types';
import { log } from './log';

/**
 * Boundary to the backend that turns a token into an outcome. Latency and
 * failure modes belong to the implementation; a throw counts as FAILURE.
 */
export interface TokenSubmitter {
  submit(token: OpaqueToken, context: SubmissionContext): Promise<AuthorizationOutcome>;
}

/**
 * Submits the token once and reports the mapped status to `complete`
 * exactly once. Anything other than a SUCCESS answer maps to FAILURE.
 */
export async function relayToken(
  token: OpaqueToken,
  context: SubmissionContext,
  submitter: TokenSubmitter,
  complete: (status: CompletionStatus) => void,
): Promise<CompletionStatus> {
  const start = Date.now();
  const { attemptId } = context;

  log({ level: 'info', action: 'relay.submit', attemptId });

  let status: CompletionStatus;
  try {
    const outcome = await submitter.submit(token, context);
    status = outcome === 'SUCCESS' ? 'SUCCESS' : 'FAILURE';
    if (status === 'FAILURE') {
      log({ level: 'warn', action: 'relay.backend_failure', attemptId, reason: String(outcome) });
    }
  } catch (err) {
    status = 'FAILURE';
    log({ level: 'warn', action: 'relay.backend_failure', attemptId, error: String(err) });
  }

  complete(status);

  log({ level: 'info', action: 'relay.complete', attemptId, status, durationMs: Date.now() - start });
  return status;
}
