/**
 * Shared TypeScript types for the Image Push Relay
 */

import type { EventBridgeEvent } from 'aws-lambda';

// ============================================
// INBOUND EVENT
// ============================================

/**
 * Detail payload of the custom push event emitted by the build pipeline.
 * Both fields are optional; the relay substitutes UNKNOWN for missing values.
 */
export interface ImagePushDetail {
  repository?: string | null;
  imageTag?: string | null;
}

/**
 * EventBridge envelope carrying an image push.
 * `detail` is optional so hand-crafted test events like `{ detail: {} }` still fit.
 */
export type ImagePushEvent = Partial<
  Omit<EventBridgeEvent<string, ImagePushDetail>, 'detail'>
> & {
  detail?: ImagePushDetail;
};

/**
 * Identifying fields extracted from an event, defaults applied
 */
export interface PushedImage {
  repository: string;
  imageTag: string;
}

// ============================================
// PERSISTENCE
// ============================================

/**
 * Log record stored in DynamoDB, one item per image tag.
 * A later push of the same tag overwrites the item.
 */
export interface LogRecord {
  imageTag: string;         // Partition key
  repository: string;
  timestamp: string;        // ISO 8601, when the relay observed the push
}

// ============================================
// NOTIFICATION
// ============================================

export interface NotificationMessage {
  subject: string;
  body: string;
}

// ============================================
// RESULTS
// ============================================

/**
 * Value returned to the Lambda runtime on success
 */
export interface RelayResult {
  status: 'ok';
  record: LogRecord;
  messageId?: string;       // SNS message id, when the topic returns one
}

// ============================================
// CONFIGURATION
// ============================================

export interface RelayConfig {
  tableName: string;
  topicArn: string;
  region?: string;
}

/**
 * Placeholder for identifying fields missing from the event
 */
export const UNKNOWN = 'unknown';

/**
 * Subject line of every push notification
 */
export const NOTIFICATION_SUBJECT = 'ECR Image Push Notification';
