import { describe, expect, it } from 'vitest';
import { InvalidParameterError, ValidationError } from '../../errors.js';
import { buildCondition, normalizeCondition } from '../conditions.js';

describe('buildCondition', () => {
  it('wraps a numeric scalar in a one-element list', () => {
    expect(buildCondition('status', 2)).toEqual({
      condition: 'status',
      operator: 'is_in',
      type: 'default',
      value: [2],
    });
  });

  it('passes a list through in order', () => {
    expect(buildCondition('status', [3, 2]).value).toEqual([3, 2]);
  });

  it('accepts digit strings for numeric fields', () => {
    expect(buildCondition('priority', '3').value).toEqual([3]);
  });

  it('rejects non-integer values for numeric fields', () => {
    expect(() => buildCondition('status', 'open')).toThrow(InvalidParameterError);
    expect(() => buildCondition('status', 2.5)).toThrow('Invalid value for status: expected an integer, got 2.5');
  });

  it('reports invalid parameters as validation errors', () => {
    expect(() => buildCondition('responder_id', [])).toThrow(ValidationError);
  });

  it('builds custom field conditions', () => {
    expect(buildCondition({ customField: 'cf_request_for' }, 'ITPM')).toEqual({
      condition: 'cf_request_for',
      operator: 'is_in',
      type: 'custom_field',
      value: ['ITPM'],
    });
  });

  it('rejects blank custom field values', () => {
    expect(() => buildCondition({ customField: 'team_member' }, ' ')).toThrow(
      'Invalid value for team_member: values must not be blank',
    );
  });
});

describe('normalizeCondition', () => {
  it('defaults the type and wraps a bare value', () => {
    expect(normalizeCondition({ condition: 'status', operator: 'is_in', value: 4 })).toEqual({
      condition: 'status',
      operator: 'is_in',
      type: 'default',
      value: [4],
    });
  });

  it('rejects unknown operators', () => {
    expect(() => normalizeCondition({ condition: 'status', operator: 'contains', value: [2] }, 1)).toThrow(
      'query_hash[1]: unsupported operator "contains"',
    );
  });

  it('rejects unknown types', () => {
    expect(() => normalizeCondition({ condition: 'status', operator: 'is_in', type: 'weird', value: [2] })).toThrow(
      ValidationError,
    );
  });

  it('rejects empty field names and values', () => {
    expect(() => normalizeCondition({ condition: '  ', operator: 'is_in', value: [2] })).toThrow(
      'query_hash[0]: condition must not be empty',
    );
    expect(() => normalizeCondition({ condition: 'status', operator: 'is_in', value: [] })).toThrow(
      'query_hash[0]: value must not be empty',
    );
  });
});
