import { ValidationError } from '../errors.js';
import { normalizeCondition } from './conditions.js';
import type { ConditionScalar, Query } from './types.js';

export type QueryParams = Record<string, ConditionScalar>;

/**
 * Flattens a query into the bracketed form the Freshdesk filter endpoint
 * reads from the query string:
 *
 *   query_hash[0][condition]=status
 *   query_hash[0][operator]=is_in
 *   query_hash[0][type]=default
 *   query_hash[0][value][0]=2
 */
export function serializeQuery(query: Query): QueryParams {
  const params: QueryParams = {};

  query.forEach((c, i) => {
    params[`query_hash[${i}][condition]`] = c.condition;
    params[`query_hash[${i}][operator]`] = c.operator;
    params[`query_hash[${i}][type]`] = c.type;
    c.value.forEach((v, j) => {
      params[`query_hash[${i}][value][${j}]`] = v;
    });
  });

  return params;
}

const KEY_PATTERN = /^query_hash\[(\d+)\]\[(condition|operator|type|value)\](?:\[(\d+)\])?$/;

interface PartialCondition {
  condition?: string;
  operator?: string;
  type?: string;
  value: Map<number, ConditionScalar>;
}

/** Reads conditions back out of flattened params. Other keys are ignored. */
export function parseQueryParams(params: QueryParams): Query {
  const entries = new Map<number, PartialCondition>();

  for (const [key, raw] of Object.entries(params)) {
    const match = KEY_PATTERN.exec(key);
    if (!match) continue;

    const index = Number(match[1]);
    const entry = entries.get(index) ?? { value: new Map<number, ConditionScalar>() };
    entries.set(index, entry);

    switch (match[2]) {
      case 'value':
        if (match[3] === undefined) {
          throw new ValidationError(`${key}: value entries must be indexed`);
        }
        entry.value.set(Number(match[3]), raw);
        break;
      case 'condition':
        entry.condition = String(raw);
        break;
      case 'operator':
        entry.operator = String(raw);
        break;
      case 'type':
        entry.type = String(raw);
        break;
    }
  }

  return [...entries.entries()]
    .sort(([a], [b]) => a - b)
    .map(([index, entry]) => {
      if (entry.condition === undefined || entry.operator === undefined) {
        throw new ValidationError(`query_hash[${index}] is missing its condition or operator`);
      }
      const value = [...entry.value.entries()].sort(([a], [b]) => a - b).map(([, v]) => v);
      return normalizeCondition(
        { condition: entry.condition, operator: entry.operator, type: entry.type, value },
        index,
      );
    });
}
