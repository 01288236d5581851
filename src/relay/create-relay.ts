import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { SNSClient } from '@aws-sdk/client-sns';
import { SnsNotificationChannel, type TopicClient } from '../channels/notification-channel';
import { DynamoLogRecordStore, type DocumentClient } from '../stores/log-record-store';
import type { RelayConfig } from '../types';
import { NotificationRelay } from './notification-relay';

/**
 * Clients the relay talks to
 */
export interface RelayClients {
  docClient: DocumentClient;
  snsClient: TopicClient;
}

/**
 * Initialize AWS SDK clients for the configured region.
 * Lambda supplies AWS_REGION; without it the SDK falls back to its own chain.
 */
export function createClients(config: RelayConfig) {
  const clientConfig = config.region ? { region: config.region } : {};

  const dynamoClient = new DynamoDBClient(clientConfig);
  const docClient = DynamoDBDocumentClient.from(dynamoClient);
  const snsClient = new SNSClient(clientConfig);

  return { dynamoClient, docClient, snsClient };
}

/**
 * Build the relay. Call once per process (cold start) and reuse across warm invocations.
 */
export function createRelay(
  config: RelayConfig,
  clients: RelayClients = createClients(config),
): NotificationRelay {
  return new NotificationRelay({
    store: new DynamoLogRecordStore(clients.docClient, config.tableName),
    channel: new SnsNotificationChannel(clients.snsClient, config.topicArn),
  });
}
