import { UpstreamError } from '@utils/errors';
import type { Message, MessageCandidate } from './types';

const TEXT_FIELDS = ['text', 'message'] as const;
const MEMBER_ID_FIELDS = ['member_id', 'user_id', 'memberId'] as const;
const MEMBER_NAME_FIELDS = ['member_name', 'user_name', 'memberName'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Upstream records disagree on field names; the first truthy synonym wins
function firstTruthy(item: Record<string, unknown>, fields: readonly string[]): unknown {
  for (const field of fields) {
    const value = item[field];
    if (value) return value;
  }
  return undefined;
}

function asText(value: unknown): string {
  if (value === undefined || value === null) return '';
  return typeof value === 'string' ? value : String(value);
}

/**
 * Accepts a bare list or an object wrapping the list under `items`.
 */
export function unwrapPayload(payload: unknown): unknown[] {
  const data = isRecord(payload) && 'items' in payload ? payload.items : payload;
  if (!Array.isArray(data)) {
    throw new UpstreamError('Unexpected upstream format: list expected.');
  }
  return data;
}

/**
 * Coalesces every object record into the message shape, blank texts included.
 */
export function toMessageCandidates(payload: unknown): MessageCandidate[] {
  return unwrapPayload(payload)
    .filter(isRecord)
    .map((item) => {
      const memberId = firstTruthy(item, MEMBER_ID_FIELDS);
      return {
        memberId: memberId === undefined ? null : String(memberId),
        memberName: asText(firstTruthy(item, MEMBER_NAME_FIELDS)),
        text: asText(firstTruthy(item, TEXT_FIELDS)).trim(),
        timestamp: item.timestamp ?? null,
      };
    });
}

export function normalizeMessages(payload: unknown): Message[] {
  const messages = toMessageCandidates(payload).filter((m) => m.text.length > 0);
  if (messages.length === 0) {
    throw new UpstreamError('No usable message text returned from upstream API.');
  }
  return messages;
}
