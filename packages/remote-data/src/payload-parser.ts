import { InAppError, type ScheduleDraft } from '@inapp/core';
import { z } from 'zod';
import type { RemoteDataPayload } from './transport/types.js';
import type { SchedulePayload } from './types.js';

const timestamp = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Invalid ISO-8601 timestamp' })
  .transform((value) => Date.parse(value));

const inAppMessageSchema = z
  .object({
    id: z.string().min(1).optional(),
    message: z.object({ message_id: z.string().min(1).optional() }).passthrough(),
    created: timestamp.optional(),
    last_updated: timestamp.optional(),
    start: timestamp.optional(),
    end: timestamp.optional(),
    priority: z.number().int().optional(),
    group: z.string().optional(),
    audience: z.object({ new_user: z.boolean().optional() }).passthrough().optional(),
    min_sdk_version: z.string().optional(),
  })
  .passthrough();

const documentSchema = z
  .object({
    in_app_messages: z.array(z.unknown()).optional(),
    frequency_constraints: z.unknown().optional(),
  })
  .passthrough();

export type InAppMessageEntry = z.infer<typeof inAppMessageSchema>;

export interface InvalidEntry {
  /** Position in `in_app_messages` */
  index: number;
  error: InAppError;
}

export interface ParsedRemotePayload {
  payload: SchedulePayload;
  /** Entries that were dropped because they failed validation */
  invalid: InvalidEntry[];
}

/**
 * Turn a raw remote data document into schedule drafts.
 *
 * ```json
 * {
 *   "in_app_messages": [
 *     {
 *       "message": { "message_id": "welcome", "display": { ... } },
 *       "created": "2024-01-01T00:00:00Z",
 *       "end": "2024-03-01T00:00:00Z",
 *       "audience": { "new_user": true }
 *     }
 *   ],
 *   "frequency_constraints": [ ... ]
 * }
 * ```
 *
 * The whole `message` object becomes the draft's opaque content. Entries that
 * fail validation are skipped and reported in `invalid`.
 *
 * @throws InAppError `INAPP_V300` when the document itself is malformed
 */
export function parseRemotePayload(raw: RemoteDataPayload): ParsedRemotePayload {
  if (raw.metadata.source !== raw.source) {
    throw new InAppError({
      code: 'INAPP_V300',
      message: `Payload for "${raw.source}" carries metadata of "${raw.metadata.source}"`,
      context: { source: raw.source, metadataSource: raw.metadata.source },
    });
  }

  const document = documentSchema.safeParse(raw.data);
  if (!document.success) {
    throw new InAppError({
      code: 'INAPP_V300',
      context: { source: raw.source, issues: document.error.issues.map((i) => i.message) },
    });
  }

  const drafts: ScheduleDraft[] = [];
  const invalid: InvalidEntry[] = [];

  (document.data.in_app_messages ?? []).forEach((entry, index) => {
    const parsed = inAppMessageSchema.safeParse(entry);
    if (!parsed.success) {
      invalid.push({
        index,
        error: new InAppError({
          code: 'INAPP_V301',
          context: {
            source: raw.source,
            index,
            issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
          },
        }),
      });
      return;
    }

    const id = parsed.data.id ?? parsed.data.message.message_id;
    if (!id) {
      invalid.push({
        index,
        error: new InAppError({
          code: 'INAPP_V301',
          message: 'In-app message has no identifier',
          context: { source: raw.source, index },
        }),
      });
      return;
    }

    drafts.push(toDraft(id, parsed.data));
  });

  const payload: SchedulePayload = {
    source: raw.source,
    metadata: { ...raw.metadata },
    drafts,
  };
  if (document.data.frequency_constraints !== undefined) {
    payload.constraints = document.data.frequency_constraints;
  }
  if (raw.contactId !== undefined) {
    payload.contactId = raw.contactId;
  }

  return { payload, invalid };
}

function toDraft(id: string, entry: InAppMessageEntry): ScheduleDraft {
  const draft: ScheduleDraft = { id, content: entry.message };

  if (entry.start !== undefined) draft.start = entry.start;
  if (entry.end !== undefined) draft.end = entry.end;
  if (entry.priority !== undefined) draft.priority = entry.priority;
  if (entry.group !== undefined) draft.group = entry.group;
  if (entry.audience?.new_user !== undefined) draft.newUserOnly = entry.audience.new_user;
  if (entry.created !== undefined) draft.created = entry.created;
  if (entry.last_updated !== undefined) draft.lastUpdated = entry.last_updated;
  if (entry.min_sdk_version !== undefined) draft.minSdkVersion = entry.min_sdk_version;

  return draft;
}
