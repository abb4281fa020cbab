import { describe, expect, it, vi } from 'vitest';
import { NotFoundError } from '../../errors.js';
import { composeQuery, upsertCondition } from '../compose.js';
import type { Condition, HelperParams, RawCondition } from '../types.js';

const status4: Condition = { condition: 'status', operator: 'is_in', type: 'default', value: [4] };
const requestFor: Condition = { condition: 'cf_request_for', operator: 'is_in', type: 'custom_field', value: ['ITPM'] };

const noLookup = vi.fn(async (_name: string): Promise<number> => {
  throw new Error('unexpected lookup');
});

describe('upsertCondition', () => {
  it('appends a new field', () => {
    expect(upsertCondition([status4], requestFor)).toEqual([status4, requestFor]);
  });

  it('replaces an existing field in place', () => {
    const status2: Condition = { ...status4, value: [2] };
    expect(upsertCondition([status4, requestFor], status2)).toEqual([status2, requestFor]);
  });

  it('leaves the input untouched', () => {
    const query = [status4];
    upsertCondition(query, requestFor);
    expect(query).toEqual([status4]);
  });
});

describe('composeQuery', () => {
  it('lets a helper parameter override the explicit condition on the same field', async () => {
    const query = await composeQuery([status4], { status: 2 }, noLookup);

    expect(query).toEqual([{ condition: 'status', operator: 'is_in', type: 'default', value: [2] }]);
  });

  it('keeps first-seen positions and resolves the assignee last', async () => {
    const explicit: RawCondition[] = [
      { condition: 'priority', operator: 'is_in', type: 'default', value: [1] },
      requestFor,
      { condition: 'responder_id', operator: 'is_in', value: [7] },
    ];
    const resolve = vi.fn(async (_name: string) => 42);

    const query = await composeQuery(explicit, { status: 2, priority: 4, assignee_name: 'Jane' }, resolve);

    expect(resolve).toHaveBeenCalledWith('Jane');
    expect(query).toEqual([
      { condition: 'priority', operator: 'is_in', type: 'default', value: [4] },
      requestFor,
      { condition: 'responder_id', operator: 'is_in', type: 'default', value: [42] },
      { condition: 'status', operator: 'is_in', type: 'default', value: [2] },
    ]);
  });

  it('collapses duplicate fields inside the explicit query', async () => {
    const query = await composeQuery(
      [{ ...status4, value: [2] }, requestFor, status4],
      {},
      noLookup,
    );

    expect(query).toEqual([status4, requestFor]);
  });

  it('adds custom field helpers', async () => {
    const query = await composeQuery(undefined, { custom_fields: { team_member: 'Dracarys' } }, noLookup);

    expect(query).toEqual([
      { condition: 'team_member', operator: 'is_in', type: 'custom_field', value: ['Dracarys'] },
    ]);
  });

  it('never produces duplicate fields', async () => {
    const explicit: RawCondition[] = [
      status4,
      { condition: 'priority', operator: 'is_in', value: 2 },
      { condition: 'responder_id', operator: 'is_in', value: [9] },
      requestFor,
    ];
    const helperSets: HelperParams[] = [
      {},
      { status: [2, 3] },
      { priority: 1, responder_id: 5 },
      { responder_id: 5, assignee_name: 'Jane' },
      { status: 2, priority: 3, custom_fields: { cf_request_for: 'HR', team_member: 'Dracarys' } },
    ];

    for (const helpers of helperSets) {
      const query = await composeQuery(explicit, helpers, async () => 42);
      const fields = query.map((c) => c.condition);
      expect(new Set(fields).size).toBe(fields.length);
    }
  });

  it('does not look up anyone without an assignee name', async () => {
    noLookup.mockClear();
    await composeQuery([status4], { priority: 2 }, noLookup);
    expect(noLookup).not.toHaveBeenCalled();
  });

  it('propagates resolution failures', async () => {
    const resolve = vi.fn(async (_name: string): Promise<number> => {
      throw new NotFoundError('Nobody');
    });

    await expect(composeQuery([], { assignee_name: 'Nobody' }, resolve)).rejects.toThrow(NotFoundError);
  });
});
