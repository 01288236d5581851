import { z } from 'zod';
import { MalformedEventError } from '../errors';
import { UNKNOWN, type PushedImage } from '../types';

/**
 * Zod schema for the push event.
 *
 * - `detail` may be absent; then both fields fall back to "unknown".
 * - `repository` and `imageTag` may be absent or null, but not another type.
 * - Envelope fields (source, detail-type, time, ...) are not inspected.
 */
const imagePushEventSchema = z.object({
  detail: z
    .object({
      repository: z.string().nullish(),
      imageTag: z.string().nullish(),
    })
    .nullish(),
});

/**
 * Extract repository and tag from a raw event, applying the "unknown" defaults.
 * Throws MalformedEventError only when the event structure itself is wrong.
 */
export function parseImagePushEvent(event: unknown): PushedImage {
  const parsed = imagePushEventSchema.safeParse(event);

  if (!parsed.success) {
    throw new MalformedEventError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'event'}: ${issue.message}`),
    );
  }

  const { detail } = parsed.data;

  return {
    repository: detail?.repository ?? UNKNOWN,
    imageTag: detail?.imageTag ?? UNKNOWN,
  };
}
