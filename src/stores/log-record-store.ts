/**
 * Log record persistence
 *
 * The relay only depends on the LogRecordStore interface; DynamoLogRecordStore
 * is the production implementation backed by a DynamoDB table keyed by imageTag.
 */

import {
  GetCommand,
  PutCommand,
  type GetCommandOutput,
  type PutCommandOutput,
} from '@aws-sdk/lib-dynamodb';
import { z } from 'zod';
import type { LogRecord } from '../types';

export interface LogRecordStore {
  /** Upsert the record. An existing record with the same tag is replaced. */
  put(record: LogRecord): Promise<void>;
  get(imageTag: string): Promise<LogRecord | undefined>;
}

/**
 * The subset of DynamoDBDocumentClient this store calls
 */
export interface DocumentClient {
  send(command: PutCommand): Promise<PutCommandOutput>;
  send(command: GetCommand): Promise<GetCommandOutput>;
}

const logRecordSchema = z.object({
  imageTag: z.string(),
  repository: z.string(),
  timestamp: z.string(),
});

export class DynamoLogRecordStore implements LogRecordStore {
  constructor(
    private readonly docClient: DocumentClient,
    private readonly tableName: string,
  ) {}

  async put(record: LogRecord): Promise<void> {
    // Unconditional write: no ConditionExpression, last write wins
    await this.docClient.send(new PutCommand({
      TableName: this.tableName,
      Item: {
        imageTag: record.imageTag,
        repository: record.repository,
        timestamp: record.timestamp,
      },
    }));
  }

  async get(imageTag: string): Promise<LogRecord | undefined> {
    const result = await this.docClient.send(new GetCommand({
      TableName: this.tableName,
      Key: { imageTag },
    }));

    if (!result.Item) {
      return undefined;
    }

    // Items written by something other than this relay may not match
    const parsed = logRecordSchema.safeParse(result.Item);
    if (!parsed.success) {
      console.log(JSON.stringify({
        level: 'warn',
        message: 'Stored item is not a log record',
        action: 'db_get',
        imageTag,
        issues: parsed.error.issues.map((issue) => issue.message),
      }));
      return undefined;
    }

    return parsed.data;
  }
}
