import { ConditionalCheckFailedException, DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, GetCommand, PutCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import type { AuthorizationOutcome, Submission } from './types';

const client = DynamoDBDocumentClient.from(new DynamoDBClient({}));

function tableName(): string {
  const name = process.env['SUBMISSIONS_TABLE'];
  if (!name) {
    throw new Error('Missing required environment variable: SUBMISSIONS_TABLE');
  }
  return name;
}

export type ClaimResult =
  | { kind: 'created' }
  | { kind: 'existing'; submission: Submission }  // same token, currency and amount
  | { kind: 'mismatch'; submission: Submission }; // attempt id reused for a different request

/** Two submissions describe the same request when token digest, currency and amount agree. */
export function sameRequest(a: Submission, b: Submission): boolean {
  return a.tokenDigest === b.tokenDigest
    && a.currencyCode === b.currencyCode
    && a.totalAmount === b.totalAmount;
}

/**
 * Claims the attempt id with a conditional put. Only a `created` claim may
 * reach the processor; a lost claim reports the stored record and whether
 * it matches the incoming request.
 */
export async function claimSubmission(submission: Submission): Promise<ClaimResult> {
  const TableName = tableName();

  try {
    await client.send(
      new PutCommand({
        TableName,
        Item: submission,
        ConditionExpression: 'attribute_not_exists(attemptId)',
      })
    );
    return { kind: 'created' };
  } catch (err) {
    if (!(err instanceof ConditionalCheckFailedException)) {
      throw err;
    }
  }

  const result = await client.send(
    new GetCommand({
      TableName,
      Key: { attemptId: submission.attemptId },
      ConsistentRead: true,
    })
  );
  if (!result.Item) {
    throw new Error(`Submission ${submission.attemptId} vanished after a conflicting write`);
  }

  const stored = result.Item as Submission;
  return sameRequest(stored, submission)
    ? { kind: 'existing', submission: stored }
    : { kind: 'mismatch', submission: stored };
}

export async function recordOutcome(attemptId: string, outcome: AuthorizationOutcome): Promise<void> {
  await client.send(
    new UpdateCommand({
      TableName: tableName(),
      Key: { attemptId },
      UpdateExpression: 'SET #status = :completed, outcome = :outcome, completedAt = :completedAt',
      ConditionExpression: 'attribute_exists(attemptId)',
      ExpressionAttributeNames: { '#status': 'status' },
      ExpressionAttributeValues: {
        ':completed': 'COMPLETED',
        ':outcome': outcome,
        ':completedAt': new Date().toISOString(),
      },
    })
  );
}
