import { UnknownStatusError } from '../errors.js';
import type { Condition } from './types.js';

export const TicketStatus = {
  OPEN: 2,
  PENDING: 3,
  RESOLVED: 4,
  CLOSED: 5,
} as const;

export const TicketPriority = {
  LOW: 1,
  MEDIUM: 2,
  HIGH: 3,
  URGENT: 4,
} as const;

/**
 * What a status keyword filters on. Most keywords are provider status codes;
 * squad workflow states live in a custom field instead.
 */
export type StatusTarget =
  | { kind: 'status_codes'; codes: number[] }
  | { kind: 'custom_field'; condition: Condition };

export const STATUS_TOKENS = [
  'open',
  'pending',
  'resolved',
  'closed',
  'unresolved',
  'awaiting_l2_response',
] as const;

export type StatusToken = (typeof STATUS_TOKENS)[number];

const STATUS_VOCABULARY: Record<StatusToken, StatusTarget> = {
  open: { kind: 'status_codes', codes: [TicketStatus.OPEN] },
  pending: { kind: 'status_codes', codes: [TicketStatus.PENDING] },
  resolved: { kind: 'status_codes', codes: [TicketStatus.RESOLVED] },
  closed: { kind: 'status_codes', codes: [TicketStatus.CLOSED] },
  unresolved: { kind: 'status_codes', codes: [TicketStatus.OPEN, TicketStatus.PENDING] },
  awaiting_l2_response: {
    kind: 'custom_field',
    condition: {
      condition: 'cf_l2_status',
      operator: 'is_in',
      type: 'custom_field',
      value: ['Awaiting L2 Response'],
    },
  },
};

export function findStatusToken(token: string): StatusToken | undefined {
  const key = token.trim().toLowerCase();
  return STATUS_TOKENS.find((known) => known === key);
}

/** Looks up a status keyword, ignoring case and surrounding whitespace. */
export function resolveStatusToken(token: string): StatusTarget {
  const key = findStatusToken(token);
  if (key === undefined) {
    throw new UnknownStatusError(token, STATUS_TOKENS);
  }
  // Copies, so callers cannot mutate the vocabulary.
  const target = STATUS_VOCABULARY[key];
  return target.kind === 'status_codes'
    ? { kind: 'status_codes', codes: [...target.codes] }
    : { kind: 'custom_field', condition: { ...target.condition, value: [...target.condition.value] } };
}

const STATUS_NAMES: Record<number, string> = {
  2: 'Open',
  3: 'Pending',
  4: 'Resolved',
  5: 'Closed',
};

const PRIORITY_NAMES: Record<number, string> = {
  1: 'Low',
  2: 'Medium',
  3: 'High',
  4: 'Urgent',
};

export function statusName(code: number | null | undefined): string {
  if (code === null || code === undefined) return 'Unknown';
  return STATUS_NAMES[code] ?? `Unknown (${code})`;
}

export function priorityName(code: number | null | undefined): string {
  if (code === null || code === undefined) return 'Unknown';
  return PRIORITY_NAMES[code] ?? `Unknown (${code})`;
}
