import type { AuthorizationOutcome, OpaqueToken, SubmissionContext, TokenSubmissionRequest } from './types';
import { SubmissionError } from './errors';
import type { TokenSubmitter } from './relay';

export interface HttpTokenSubmitterOptions {
  endpoint: string;
  /** Abort after this many ms. Without it the request waits as long as the transport does. */
  timeoutMs?: number | undefined;
  fetchImpl?: typeof fetch;
}

function readOutcome(body: unknown): AuthorizationOutcome | null {
  if (body === null || typeof body !== 'object' || Array.isArray(body)) {
    return null;
  }
  const outcome: unknown = (body as Record<string, unknown>)['outcome'];
  return outcome === 'SUCCESS' || outcome === 'FAILURE' ? outcome : null;
}

/** Posts the token to the token intake endpoint and returns its outcome. */
export function createHttpTokenSubmitter(options: HttpTokenSubmitterOptions): TokenSubmitter {
  const fetchImpl = options.fetchImpl ?? fetch;

  return {
    async submit(token: OpaqueToken, context: SubmissionContext): Promise<AuthorizationOutcome> {
      const payload: TokenSubmissionRequest = {
        attemptId: context.attemptId,
        token,
        currencyCode: context.currencyCode,
        totalAmount: context.totalAmount,
      };

      let res: Response;
      try {
        res = await fetchImpl(options.endpoint, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(payload),
          signal: options.timeoutMs === undefined ? null : AbortSignal.timeout(options.timeoutMs),
        });
      } catch (err) {
        throw new SubmissionError('Token endpoint unreachable', { cause: err });
      }

      if (!res.ok) {
        throw new SubmissionError(`Token endpoint answered ${res.status}`, { status: res.status });
      }

      let body: unknown;
      try {
        body = await res.json();
      } catch (err) {
        throw new SubmissionError('Token endpoint returned invalid JSON', { status: res.status, cause: err });
      }

      const outcome = readOutcome(body);
      if (outcome === null) {
        throw new SubmissionError('Token endpoint response carries no outcome', { status: res.status });
      }
      return outcome;
    },
  };
}
