/**
 * Image Push Lambda Handler
 *
 * Triggered by an EventBridge rule matching the custom "image pushed" event
 * the build pipeline emits after pushing to the container registry.
 *
 * What it does:
 * 1. Builds the relay on the first invocation (cold start)
 * 2. Hands the event to the relay (record to DynamoDB, notification to SNS)
 * 3. Logs failures and rethrows so EventBridge applies its retry policy
 */

import { loadConfig } from '../config';
import { RelayError, messageOf } from '../errors';
import { createRelay } from '../relay/create-relay';
import { correlationIdOf, type NotificationRelay } from '../relay/notification-relay';
import type { ImagePushEvent, RelayResult } from '../types';

export type ImagePushHandler = (event: ImagePushEvent) => Promise<RelayResult>;

export function createHandler(getRelay: () => NotificationRelay): ImagePushHandler {
  return async function handler(event: ImagePushEvent): Promise<RelayResult> {
    const correlationId = correlationIdOf(event);

    console.log(JSON.stringify({
      level: 'info',
      message: 'Image push Lambda invoked',
      correlationId,
      action: 'lambda_start',
      source: event.source,
      detailType: event['detail-type'],
    }));

    try {
      const result = await getRelay().process(event, correlationId);

      console.log(JSON.stringify({
        level: 'info',
        message: 'Image push relayed',
        correlationId,
        action: 'lambda_complete',
        imageTag: result.record.imageTag,
      }));

      return result;
    } catch (error) {
      console.error(JSON.stringify({
        level: 'error',
        message: 'Image push relay failed',
        correlationId,
        action: 'lambda_error',
        code: error instanceof RelayError ? error.code : undefined,
        error: messageOf(error),
        stack: error instanceof Error ? error.stack : undefined,
      }));

      // Rethrow to let EventBridge retry
      throw error;
    }
  };
}

// Created once per container, reused on warm starts
let relay: NotificationRelay | undefined;

function getProcessRelay(): NotificationRelay {
  if (!relay) {
    relay = createRelay(loadConfig());
  }
  return relay;
}

export const handler = createHandler(getProcessRelay);
