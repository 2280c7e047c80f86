import type {PropsFilter} from './types';
import type {Attributes, AttributeValue} from '@opentelemetry/api';

import {isPlainObject} from '../utils';

/** @internal Checks for a valid attribute value: string, number, boolean or a homogeneous array of these. */
export function isAttributeValue(value: unknown): value is AttributeValue {
  if (value === null || value === undefined) {
    return false;
  }

  const t = typeof value;
  if (t === 'string' || t === 'number' || t === 'boolean') {
    return true;
  }

  if (Array.isArray(value)) {
    return value.every(item => {
      const it = typeof item;
      return item !== null && (it === 'string' || it === 'number' || it === 'boolean');
    });
  }

  return false;
}

function extractField(
  acc: Attributes,
  field: string,
  rule: boolean | string | ((key: string, value: unknown) => unknown),
  object: Record<string, unknown>,
  prefix: string,
): Attributes {
  let extracted: unknown;

  if (rule === true) {
    extracted = object[field];
  } else if (typeof rule === 'string') {
    extracted = object[rule];
  } else if (typeof rule === 'function') {
    extracted = rule(field, object[field]);
  } else {
    return acc;
  }

  if (isAttributeValue(extracted)) {
    acc[prefix + field] = extracted;
  }

  return acc;
}

/** @internal Picks fields allowed by `filter`, optionally prefixed (`props.id`). */
export function extractFields(object: unknown, filter: PropsFilter, prefix = ''): Attributes {
  if (!isPlainObject(object)) {
    return {};
  }

  prefix = prefix ? prefix + '.' : prefix;

  const rules = filter === '*' ? Object.fromEntries(Object.keys(object).map(key => [key, true])) : filter;

  return Object.keys(rules).reduce<Attributes>(
    (acc, key) => extractField(acc, key, rules[key], object, prefix),
    {},
  );
}

/**
 * @internal Result attributes: object results go through `extractFields`,
 * anything else is recorded as `value` (arrays by their length).
 */
export function extractResultFields(value: unknown, filter: PropsFilter): Attributes {
  if (isPlainObject(value)) {
    return extractFields(value, filter);
  }

  if (Array.isArray(value)) {
    return {length: value.length};
  }

  if (isAttributeValue(value)) {
    return {value};
  }

  return {value: String(value)};
}

export function extractMessage(error: unknown): string {
  if (!error) {
    return '';
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

export function extractStacktrace(error: unknown): string | undefined {
  if (error instanceof Error) {
    return error.stack;
  }

  return undefined;
}
