export const CONDITION_OPERATORS = [
  'is_in',
  'is_not_in',
  'is',
  'is_not',
  'greater_than',
  'less_than',
  'during',
] as const;

export type ConditionOperator = (typeof CONDITION_OPERATORS)[number];

export const CONDITION_TYPES = ['default', 'custom_field'] as const;

export type ConditionType = (typeof CONDITION_TYPES)[number];

export type ConditionScalar = string | number;

/** One clause of a Freshdesk `query_hash`. */
export interface Condition {
  condition: string;
  operator: ConditionOperator;
  type: ConditionType;
  value: ConditionScalar[];
}

/** Ordered conditions; field names are unique once composed. */
export type Query = Condition[];

/** A native condition as a caller may send it: the value can still be a bare scalar. */
export interface RawCondition {
  condition: string;
  operator: string;
  type?: string;
  value: ConditionScalar | ConditionScalar[];
}

export type NumericHelper = 'status' | 'priority' | 'responder_id';

export type HelperValue = ConditionScalar | ConditionScalar[];

/** Helper parameters that are turned into conditions by the composer. */
export interface HelperParams {
  status?: HelperValue;
  priority?: HelperValue;
  responder_id?: HelperValue;
  /** Resolved to a responder id through the agents listing. */
  assignee_name?: string;
  /** Custom field name → value(s). */
  custom_fields?: Record<string, HelperValue>;
}
