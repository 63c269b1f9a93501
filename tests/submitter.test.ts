import { createHttpTokenSubmitter } from '../src/submitter';
import { SubmissionError } from '../src/errors';
import type { SubmissionContext } from '../src/types';

const ENDPOINT = 'https://pay.example.test/tokens';

const CONTEXT: SubmissionContext = {
  attemptId: '123e4567-e89b-12d3-a456-426614174000',
  currencyCode: 'USD',
  totalAmount: 4050,
};

function mockFetch(response: Response | Error): jest.Mock<Promise<Response>, Parameters<typeof fetch>> {
  const fn = jest.fn<Promise<Response>, Parameters<typeof fetch>>();
  if (response instanceof Error) {
    fn.mockRejectedValue(response);
  } else {
    fn.mockResolvedValue(response);
  }
  return fn;
}

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

test('POSTs the token with its attempt context and returns the outcome', async () => {
  const fetchImpl = mockFetch(jsonResponse(200, { attemptId: CONTEXT.attemptId, outcome: 'SUCCESS' }));
  const submitter = createHttpTokenSubmitter({ endpoint: ENDPOINT, fetchImpl });

  await expect(submitter.submit('test-token', CONTEXT)).resolves.toBe('SUCCESS');

  const [url, init] = fetchImpl.mock.calls[0] ?? [];
  expect(url).toBe(ENDPOINT);
  expect(init?.method).toBe('POST');
  expect(JSON.parse(String(init?.body))).toEqual({
    attemptId: CONTEXT.attemptId,
    token: 'test-token',
    currencyCode: 'USD',
    totalAmount: 4050,
  });
});

test('a FAILURE outcome is returned as-is', async () => {
  const fetchImpl = mockFetch(jsonResponse(200, { attemptId: CONTEXT.attemptId, outcome: 'FAILURE' }));
  const submitter = createHttpTokenSubmitter({ endpoint: ENDPOINT, fetchImpl });

  await expect(submitter.submit('test-token', CONTEXT)).resolves.toBe('FAILURE');
});

test('no timeout by default', async () => {
  const fetchImpl = mockFetch(jsonResponse(200, { outcome: 'SUCCESS' }));
  const submitter = createHttpTokenSubmitter({ endpoint: ENDPOINT, fetchImpl });

  await submitter.submit('test-token', CONTEXT);

  expect(fetchImpl.mock.calls[0]?.[1]?.signal).toBeNull();
});

test('timeoutMs attaches an abort signal', async () => {
  const fetchImpl = mockFetch(jsonResponse(200, { outcome: 'SUCCESS' }));
  const submitter = createHttpTokenSubmitter({ endpoint: ENDPOINT, timeoutMs: 5000, fetchImpl });

  await submitter.submit('test-token', CONTEXT);

  expect(fetchImpl.mock.calls[0]?.[1]?.signal).toBeInstanceOf(AbortSignal);
});

test('non-2xx status → SubmissionError with the status', async () => {
  const fetchImpl = mockFetch(jsonResponse(502, { error: 'BAD_GATEWAY' }));
  const submitter = createHttpTokenSubmitter({ endpoint: ENDPOINT, fetchImpl });

  const submission = submitter.submit('test-token', CONTEXT);

  await expect(submission).rejects.toBeInstanceOf(SubmissionError);
  await expect(submission).rejects.toHaveProperty('status', 502);
});

test('response without an outcome → SubmissionError', async () => {
  const fetchImpl = mockFetch(jsonResponse(200, { outcome: 'MAYBE' }));
  const submitter = createHttpTokenSubmitter({ endpoint: ENDPOINT, fetchImpl });

  await expect(submitter.submit('test-token', CONTEXT)).rejects.toThrow('Token endpoint response carries no outcome');
});

test('network error → SubmissionError', async () => {
  const fetchImpl = mockFetch(new TypeError('fetch failed'));
  const submitter = createHttpTokenSubmitter({ endpoint: ENDPOINT, fetchImpl });

  await expect(submitter.submit('test-token', CONTEXT)).rejects.toThrow('Token endpoint unreachable');
});
