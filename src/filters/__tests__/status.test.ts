import { describe, expect, it } from 'vitest';
import { UnknownStatusError } from '../../errors.js';
import { priorityName, resolveStatusToken, statusName } from '../status.js';

describe('resolveStatusToken', () => {
  it('maps single statuses to one code', () => {
    expect(resolveStatusToken('open')).toEqual({ kind: 'status_codes', codes: [2] });
    expect(resolveStatusToken('pending')).toEqual({ kind: 'status_codes', codes: [3] });
    expect(resolveStatusToken('resolved')).toEqual({ kind: 'status_codes', codes: [4] });
    expect(resolveStatusToken('closed')).toEqual({ kind: 'status_codes', codes: [5] });
  });

  it('expands unresolved to open and pending, ignoring case and whitespace', () => {
    expect(resolveStatusToken(' UnResolved ')).toEqual({ kind: 'status_codes', codes: [2, 3] });
  });

  it('maps awaiting_l2_response to a custom field condition', () => {
    expect(resolveStatusToken('awaiting_l2_response')).toEqual({
      kind: 'custom_field',
      condition: {
        condition: 'cf_l2_status',
        operator: 'is_in',
        type: 'custom_field',
        value: ['Awaiting L2 Response'],
      },
    });
  });

  it('rejects unknown tokens', () => {
    expect(() => resolveStatusToken('snoozed')).toThrow(UnknownStatusError);
    expect(() => resolveStatusToken('snoozed')).toThrow('Unknown status "snoozed"');
  });

  it('hands out copies of the vocabulary', () => {
    const first = resolveStatusToken('unresolved');
    if (first.kind === 'status_codes') first.codes.push(9);

    expect(resolveStatusToken('unresolved')).toEqual({ kind: 'status_codes', codes: [2, 3] });
  });
});

describe('display names', () => {
  it('names known codes', () => {
    expect(statusName(2)).toBe('Open');
    expect(statusName(5)).toBe('Closed');
    expect(priorityName(4)).toBe('Urgent');
  });

  it('falls back for unknown and missing codes', () => {
    expect(statusName(9)).toBe('Unknown (9)');
    expect(statusName(undefined)).toBe('Unknown');
    expect(priorityName(null)).toBe('Unknown');
  });
});
