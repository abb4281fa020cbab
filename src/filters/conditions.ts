import { InvalidParameterError, ValidationError } from '../errors.js';
import {
  CONDITION_OPERATORS,
  CONDITION_TYPES,
  type Condition,
  type ConditionScalar,
  type HelperValue,
  type NumericHelper,
  type RawCondition,
} from './types.js';

export type HelperParam = NumericHelper | { customField: string };

function paramName(param: HelperParam): string {
  return typeof param === 'string' ? param : param.customField;
}

function toValues(name: string, value: HelperValue): ConditionScalar[] {
  const values = Array.isArray(value) ? value : [value];
  if (values.length === 0) {
    throw new InvalidParameterError(name, 'at least one value is required');
  }
  return values;
}

/**
 * Numeric ids arrive from agents as numbers or as digit strings ("2"); both
 * are accepted, anything else is rejected.
 */
function toInteger(name: string, value: ConditionScalar): number {
  if (typeof value === 'number') {
    if (Number.isInteger(value)) return value;
  } else if (/^\d+$/.test(value.trim())) {
    return Number.parseInt(value, 10);
  }
  throw new InvalidParameterError(name, `expected an integer, got ${JSON.stringify(value)}`);
}

/**
 * Builds the single condition a helper parameter stands for. A scalar becomes
 * a one-element list; a list is kept in its given order.
 */
export function buildCondition(param: HelperParam, value: HelperValue): Condition {
  const name = paramName(param);
  const values = toValues(name, value);

  if (typeof param === 'string') {
    return {
      condition: param,
      operator: 'is_in',
      type: 'default',
      value: values.map((v) => toInteger(name, v)),
    };
  }

  if (!param.customField.trim()) {
    throw new InvalidParameterError('custom_field', 'field name must not be empty');
  }
  for (const v of values) {
    if (typeof v === 'string' && !v.trim()) {
      throw new InvalidParameterError(name, 'values must not be blank');
    }
  }
  return {
    condition: param.customField,
    operator: 'is_in',
    type: 'custom_field',
    value: values,
  };
}

/** Checks a caller-supplied `query_hash` entry and wraps a bare value. */
export function normalizeCondition(raw: RawCondition, index = 0): Condition {
  const where = `query_hash[${index}]`;
  const field = raw.condition.trim();
  if (!field) {
    throw new ValidationError(`${where}: condition must not be empty`);
  }

  const operator = CONDITION_OPERATORS.find((op) => op === raw.operator);
  if (!operator) {
    throw new ValidationError(
      `${where}: unsupported operator "${raw.operator}". Expected one of: ${CONDITION_OPERATORS.join(', ')}`,
    );
  }

  const type = CONDITION_TYPES.find((t) => t === (raw.type ?? 'default'));
  if (!type) {
    throw new ValidationError(`${where}: type must be "default" or "custom_field", got "${raw.type}"`);
  }

  const value = Array.isArray(raw.value) ? [...raw.value] : [raw.value];
  if (value.length === 0) {
    throw new ValidationError(`${where}: value must not be empty`);
  }

  return { condition: field, operator, type, value };
}
