import { createHash } from 'crypto';
import type { APIGatewayProxyHandler, APIGatewayProxyResult } from 'aws-lambda';
import type {
  AuthorizationOutcome,
  Submission,
  TokenSubmissionRequest,
  TokenSubmissionResponse,
} from './types';
import { log } from './log';
import { claimSubmission, recordOutcome } from './repository';

/**
 * Gateway integration that turns a wallet token into a charge outcome.
 * Lives outside this repository; deployments pass their own.
 */
export interface PaymentProcessor {
  process(submission: TokenSubmissionRequest): Promise<AuthorizationOutcome>;
}

// ---------------------------------------------------------------------------
// Response helpers
// ---------------------------------------------------------------------------

function json(statusCode: number, body: unknown): APIGatewayProxyResult {
  return {
    statusCode,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}

function ok(attemptId: string, outcome: AuthorizationOutcome): APIGatewayProxyResult {
  const body: TokenSubmissionResponse = { attemptId, outcome };
  return json(200, body);
}

function validationError(message: string): APIGatewayProxyResult {
  return json(400, { error: 'VALIDATION_ERROR', message });
}

function conflict(): APIGatewayProxyResult {
  return json(409, { error: 'SUBMISSION_IN_PROGRESS', message: 'This attempt is already being processed' });
}

function attemptReused(): APIGatewayProxyResult {
  return json(409, { error: 'ATTEMPT_ID_REUSED', message: 'This attempt id was already used for a different payment' });
}

function internalError(): APIGatewayProxyResult {
  return json(500, { error: 'INTERNAL_ERROR', message: 'An unexpected error occurred' });
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const CURRENCY_RE = /^[A-Z]{3}$/;

function validateRequest(body: unknown): { ok: true; value: TokenSubmissionRequest } | { ok: false; message: string } {
  if (body === null || typeof body !== 'object' || Array.isArray(body)) {
    return { ok: false, message: 'Request body must be a JSON object' };
  }

  const raw = body as Record<string, unknown>;
  const { attemptId, token, currencyCode, totalAmount } = raw;

  if (typeof attemptId !== 'string' || attemptId === '') {
    return { ok: false, message: 'Missing or invalid attemptId' };
  }
  if (!UUID_RE.test(attemptId)) {
    return { ok: false, message: 'attemptId must be a valid UUID' };
  }
  if (typeof token !== 'string' || token === '') {
    return { ok: false, message: 'Missing or invalid token' };
  }
  if (typeof currencyCode !== 'string' || !CURRENCY_RE.test(currencyCode)) {
    return { ok: false, message: 'currencyCode must be a three-letter uppercase code' };
  }
  if (typeof totalAmount !== 'number' || !Number.isSafeInteger(totalAmount) || totalAmount < 0) {
    return { ok: false, message: 'totalAmount must be a non-negative integer (minor units)' };
  }

  return { ok: true, value: { attemptId, token, currencyCode, totalAmount } };
}

function digest(token: string): string {
  return createHash('sha256').update(token).digest('hex');
}

// ---------------------------------------------------------------------------
// Lambda handler
// ---------------------------------------------------------------------------

export function createIntakeHandler(processor: PaymentProcessor): APIGatewayProxyHandler {
  return async (event) => {
    const start = Date.now();
    let attemptId: string | undefined;

    try {
      let body: unknown;
      try {
        body = JSON.parse(event.body ?? '');
      } catch {
        return validationError('Invalid JSON body');
      }

      const validation = validateRequest(body);
      if (!validation.ok) {
        return validationError(validation.message);
      }

      const req = validation.value;
      attemptId = req.attemptId;

      log({ level: 'info', action: 'intake.start', attemptId });

      const submission: Submission = {
        attemptId,
        tokenDigest: digest(req.token),
        currencyCode: req.currencyCode,
        totalAmount: req.totalAmount,
        status: 'PENDING',
        createdAt: new Date().toISOString(),
      };

      // At most one processor call per attempt
      const claim = await claimSubmission(submission);
      if (claim.kind === 'mismatch') {
        log({ level: 'warn', action: 'intake.attempt_reused', attemptId, durationMs: Date.now() - start });
        return attemptReused();
      }
      if (claim.kind === 'existing') {
        const recorded = claim.submission.outcome;
        if (!recorded) {
          log({ level: 'warn', action: 'intake.in_progress', attemptId, durationMs: Date.now() - start });
          return conflict();
        }
        log({ level: 'info', action: 'intake.duplicate', attemptId, durationMs: Date.now() - start });
        return ok(attemptId, recorded);
      }

      let outcome: AuthorizationOutcome;
      try {
        outcome = await processor.process(req);
      } catch (err) {
        // Processor errors are recorded as FAILURE
        log({ level: 'error', action: 'intake.processor_error', attemptId, error: String(err) });
        await recordOutcome(attemptId, 'FAILURE');
        return internalError();
      }
      await recordOutcome(attemptId, outcome);

      log({ level: 'info', action: 'intake.complete', attemptId, outcome, durationMs: Date.now() - start });
      return ok(attemptId, outcome);

    } catch (err) {
      log({ level: 'error', action: 'intake.error', attemptId, error: String(err), durationMs: Date.now() - start });
      return internalError();
    }
  };
}
