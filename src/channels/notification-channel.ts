/**
 * Notification delivery
 *
 * SnsNotificationChannel publishes to a single topic; fan-out to subscribers
 * (email, SMS, queues) is configured on the topic, not here.
 */

import { PublishCommand, type PublishCommandOutput } from '@aws-sdk/client-sns';
import type { NotificationMessage } from '../types';

export interface NotificationChannel {
  /** Resolves with the provider's message id, if it returned one. */
  publish(message: NotificationMessage): Promise<string | undefined>;
}

/**
 * The subset of SNSClient this channel calls
 */
export interface TopicClient {
  send(command: PublishCommand): Promise<PublishCommandOutput>;
}

export class SnsNotificationChannel implements NotificationChannel {
  constructor(
    private readonly snsClient: TopicClient,
    private readonly topicArn: string,
  ) {}

  async publish(message: NotificationMessage): Promise<string | undefined> {
    const result = await this.snsClient.send(new PublishCommand({
      TopicArn: this.topicArn,
      Subject: message.subject,
      Message: message.body,
    }));

    return result.MessageId;
  }
}
