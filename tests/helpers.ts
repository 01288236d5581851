import { vi } from 'vitest';
import {
  GetCommand,
  PutCommand,
  type GetCommandOutput,
  type PutCommandOutput,
} from '@aws-sdk/lib-dynamodb';
import type { NotificationChannel } from '../src/channels/notification-channel';
import type { DocumentClient, LogRecordStore } from '../src/stores/log-record-store';
import type { LogRecord, NotificationMessage } from '../src/types';

/**
 * Table stand-in. Keeps every write so tests can see overwrites.
 */
export class InMemoryLogRecordStore implements LogRecordStore {
  readonly writes: LogRecord[] = [];
  private readonly items = new Map<string, LogRecord>();
  failure?: Error;

  async put(record: LogRecord): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    this.writes.push({ ...record });
    this.items.set(record.imageTag, { ...record });
  }

  async get(imageTag: string): Promise<LogRecord | undefined> {
    return this.items.get(imageTag);
  }
}

/**
 * Topic stand-in. Records every published message.
 */
export class RecordingChannel implements NotificationChannel {
  readonly published: NotificationMessage[] = [];
  failure?: Error;
  private nextId = 1;

  async publish(message: NotificationMessage): Promise<string | undefined> {
    if (this.failure) {
      throw this.failure;
    }
    this.published.push(message);
    return `msg-${this.nextId++}`;
  }
}

/** Records commands instead of calling DynamoDB. */
export class FakeDocumentClient implements DocumentClient {
  readonly commands: Array<PutCommand | GetCommand> = [];
  getOutput: GetCommandOutput = { $metadata: {} };
  failure?: Error;

  send(command: PutCommand): Promise<PutCommandOutput>;
  send(command: GetCommand): Promise<GetCommandOutput>;
  async send(command: PutCommand | GetCommand): Promise<PutCommandOutput | GetCommandOutput> {
    this.commands.push(command);
    if (this.failure) {
      throw this.failure;
    }
    if (command instanceof GetCommand) {
      return this.getOutput;
    }
    return { $metadata: {} };
  }
}

/**
 * Clock returning the given instants in order, then repeating the last one
 */
export function fixedClock(...isoTimes: string[]): () => Date {
  let index = 0;
  return () => {
    const time = isoTimes[Math.min(index, isoTimes.length - 1)];
    index++;
    return new Date(time);
  };
}

/**
 * Silence the JSON log lines and expose them parsed
 */
export function captureLogs() {
  const log = vi.spyOn(console, 'log').mockImplementation(() => {});
  const error = vi.spyOn(console, 'error').mockImplementation(() => {});

  const parse = (calls: unknown[][]): Record<string, unknown>[] =>
    calls.map((args) => JSON.parse(String(args[0])));

  return {
    info: () => parse(log.mock.calls),
    errors: () => parse(error.mock.calls),
  };
}
