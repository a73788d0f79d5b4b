import { InAppError } from '@inapp/core';
import { describe, expect, it } from 'vitest';
import { parseRemotePayload } from './payload-parser.js';
import type { RemoteDataPayload } from './transport/types.js';

function raw(data: unknown, overrides: Partial<RemoteDataPayload> = {}): RemoteDataPayload {
  return { source: 'app', metadata: { source: 'app', version: 4 }, data, ...overrides };
}

describe('parseRemotePayload', () => {
  it('should convert in-app messages to drafts', () => {
    const { payload, invalid } = parseRemotePayload(
      raw({
        in_app_messages: [
          {
            message: { message_id: 'welcome', display: { body: 'Hi' } },
            created: '2024-01-01T00:00:00Z',
            last_updated: '2024-01-02T00:00:00Z',
            start: '2024-01-03T00:00:00Z',
            end: '2024-03-01T00:00:00Z',
            priority: 2,
            group: 'onboarding',
            audience: { new_user: true },
            min_sdk_version: '17.0.0',
          },
        ],
      })
    );

    expect(invalid).toEqual([]);
    expect(payload).toEqual({
      source: 'app',
      metadata: { source: 'app', version: 4 },
      drafts: [
        {
          id: 'welcome',
          content: { message_id: 'welcome', display: { body: 'Hi' } },
          created: Date.UTC(2024, 0, 1),
          lastUpdated: Date.UTC(2024, 0, 2),
          start: Date.UTC(2024, 0, 3),
          end: Date.UTC(2024, 2, 1),
          priority: 2,
          group: 'onboarding',
          newUserOnly: true,
          minSdkVersion: '17.0.0',
        },
      ],
    });
  });

  it('should prefer an explicit id over the message id', () => {
    const { payload } = parseRemotePayload(
      raw({ in_app_messages: [{ id: 'schedule-1', message: { message_id: 'message-1' } }] })
    );

    expect(payload.drafts).toEqual([{ id: 'schedule-1', content: { message_id: 'message-1' } }]);
  });

  it('should pass frequency constraints and contact through', () => {
    const constraints = [{ id: 'daily', range: 86400, boundary: 1 }];

    const { payload } = parseRemotePayload(
      raw(
        { in_app_messages: [], frequency_constraints: constraints },
        { source: 'contact', metadata: { source: 'contact', version: 1 }, contactId: 'contact-1' }
      )
    );

    expect(payload.constraints).toEqual(constraints);
    expect(payload.contactId).toBe('contact-1');
    expect(payload.drafts).toEqual([]);
  });

  it('should treat a document without messages as empty', () => {
    const { payload } = parseRemotePayload(raw({}));

    expect(payload.drafts).toEqual([]);
    expect('constraints' in payload).toBe(false);
  });

  it('should skip invalid entries and report them', () => {
    const { payload, invalid } = parseRemotePayload(
      raw({
        in_app_messages: [
          { message: { message_id: 'ok' } },
          { message: { message_id: 'bad-date' }, end: 'not a date' },
          { message: {} },
          'nonsense',
        ],
      })
    );

    expect(payload.drafts.map((d) => d.id)).toEqual(['ok']);
    expect(invalid.map((entry) => entry.index)).toEqual([1, 2, 3]);
    expect(invalid.every((entry) => entry.error.code === 'INAPP_V301')).toBe(true);
    expect(invalid[0]!.error.context.issues).toEqual(['end: Invalid ISO-8601 timestamp']);
    expect(invalid[1]!.error.message).toBe('In-app message has no identifier');
  });

  it('should reject documents that are not objects', () => {
    expect(() => parseRemotePayload(raw([1, 2]))).toThrow(InAppError);
    expect(() => parseRemotePayload(raw(null))).toThrow(InAppError);

    try {
      parseRemotePayload(raw({ in_app_messages: 'many' }));
      expect.unreachable();
    } catch (error) {
      expect(InAppError.isCode(error, 'INAPP_V300')).toBe(true);
    }
  });

  it('should reject metadata from another source', () => {
    expect(() =>
      parseRemotePayload(raw({}, { metadata: { source: 'contact', version: 1 } }))
    ).toThrow('Payload for "app" carries metadata of "contact"');
  });
});
