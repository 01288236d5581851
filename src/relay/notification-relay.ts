/**
 * Notification Relay
 *
 * What it does:
 * 1. Extracts repository and image tag from an image push event
 * 2. Stamps the time the relay observed the push
 * 3. Saves a log record to the store (keyed by image tag, last write wins)
 * 4. Publishes a human-readable notification to the channel
 *
 * The two side effects are not atomic. A failed write skips the publish;
 * a failed publish leaves the record in place. Nothing is retried here:
 * redelivery is up to whatever invoked the relay.
 */

import { v4 as uuidv4 } from 'uuid';
import { NotificationError, PersistenceError } from '../errors';
import type { NotificationChannel } from '../channels/notification-channel';
import type { LogRecordStore } from '../stores/log-record-store';
import {
  NOTIFICATION_SUBJECT,
  type LogRecord,
  type NotificationMessage,
  type RelayResult,
} from '../types';
import { parseImagePushEvent } from './event-schema';

export interface NotificationRelayDeps {
  store: LogRecordStore;
  channel: NotificationChannel;
  /** Source of the record timestamp. Defaults to the wall clock. */
  clock?: () => Date;
}

export class NotificationRelay {
  private readonly store: LogRecordStore;
  private readonly channel: NotificationChannel;
  private readonly clock: () => Date;

  constructor(deps: NotificationRelayDeps) {
    this.store = deps.store;
    this.channel = deps.channel;
    this.clock = deps.clock ?? (() => new Date());
  }

  async process(event: unknown, correlationId: string = correlationIdOf(event)): Promise<RelayResult> {
    console.log(JSON.stringify({
      level: 'info',
      message: 'Event received',
      correlationId,
      action: 'event_received',
      event,
    }));

    const { repository, imageTag } = parseImagePushEvent(event);

    const record: LogRecord = {
      imageTag,
      repository,
      timestamp: this.clock().toISOString(),
    };

    // Step 1: Save log record
    try {
      await this.store.put(record);
    } catch (error) {
      throw new PersistenceError(imageTag, error);
    }

    console.log(JSON.stringify({
      level: 'info',
      message: 'Log record saved',
      correlationId,
      action: 'db_save',
      imageTag,
      repository,
    }));

    // Step 2: Publish notification
    let messageId: string | undefined;
    try {
      messageId = await this.channel.publish(formatNotification(record));
    } catch (error) {
      throw new NotificationError(imageTag, error);
    }

    console.log(JSON.stringify({
      level: 'info',
      message: 'Notification published',
      correlationId,
      action: 'sns_publish',
      imageTag,
      messageId,
    }));

    return messageId === undefined
      ? { status: 'ok', record }
      : { status: 'ok', record, messageId };
  }
}

/**
 * Build the notification for a saved record
 */
export function formatNotification(record: LogRecord): NotificationMessage {
  return {
    subject: NOTIFICATION_SUBJECT,
    body: `Image pushed: ${record.repository}:${record.imageTag} at ${record.timestamp}`,
  };
}

/**
 * EventBridge assigns every event an id; reuse it so log lines can be
 * matched to the delivery. Hand-built events get a fresh one.
 */
export function correlationIdOf(event: unknown): string {
  if (typeof event === 'object' && event !== null && 'id' in event && typeof event.id === 'string') {
    return event.id;
  }
  return uuidv4();
}
