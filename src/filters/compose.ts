import { buildCondition, normalizeCondition } from './conditions.js';
import type { Condition, HelperParams, NumericHelper, Query, RawCondition } from './types.js';

/** Turns an agent name or email into a responder id. */
export type AssigneeResolver = (nameOrEmail: string) => Promise<number>;

const NUMERIC_HELPERS: readonly NumericHelper[] = ['status', 'priority', 'responder_id'];

/**
 * Inserts `condition` into `query`, replacing any condition on the same field.
 * A replaced condition keeps its original position.
 */
export function upsertCondition(query: Query, condition: Condition): Query {
  const index = query.findIndex((c) => c.condition === condition.condition);
  if (index === -1) {
    return [...query, condition];
  }
  const next = [...query];
  next[index] = condition;
  return next;
}

/**
 * Merges a native `query_hash` with helper parameters into one query.
 *
 * Helper parameters win over explicit conditions on the same field. The
 * assignee name, when given, is resolved last and becomes a `responder_id`
 * condition.
 */
export async function composeQuery(
  explicit: readonly RawCondition[] | undefined,
  helpers: HelperParams,
  resolveAssignee: AssigneeResolver,
): Promise<Query> {
  let query: Query = [];

  (explicit ?? []).forEach((raw, index) => {
    query = upsertCondition(query, normalizeCondition(raw, index));
  });

  for (const param of NUMERIC_HELPERS) {
    const value = helpers[param];
    if (value !== undefined) {
      query = upsertCondition(query, buildCondition(param, value));
    }
  }

  for (const [field, value] of Object.entries(helpers.custom_fields ?? {})) {
    query = upsertCondition(query, buildCondition({ customField: field }, value));
  }

  if (helpers.assignee_name !== undefined) {
    const responderId = await resolveAssignee(helpers.assignee_name);
    query = upsertCondition(query, buildCondition('responder_id', responderId));
  }

  return query;
}
