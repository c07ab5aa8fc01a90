/**
 * Request parameters as a tagged union, so field lookups pattern-match on
 * `kind` instead of probing the shape of whatever the body parser produced.
 */
export type ParamValue =
  | { kind: 'scalar'; value: string }
  | { kind: 'nested'; fields: ParamFields }
  | { kind: 'list'; items: readonly ParamValue[] };

export type ParamFields = Readonly<Record<string, ParamValue>>;

export function scalar(value: string): ParamValue {
  return { kind: 'scalar', value };
}

export function nested(fields: ParamFields): ParamValue {
  return { kind: 'nested', fields };
}

function toParamValue(input: unknown): ParamValue | undefined {
  switch (typeof input) {
    case 'string':
      return scalar(input);
    case 'number':
    case 'boolean':
    case 'bigint':
      return scalar(String(input));
    case 'object':
      if (input === null) return undefined;
      if (Array.isArray(input)) {
        const items: ParamValue[] = [];
        for (const item of input) {
          const value = toParamValue(item);
          if (value) items.push(value);
        }
        return { kind: 'list', items };
      }
      return nested(toParams(input));
    default:
      return undefined;
  }
}

/**
 * Convert a parsed request body (JSON or extended urlencoded) into
 * {@link ParamFields}. Nulls and non-data values are dropped; anything that
 * is not an object yields no fields.
 */
export function toParams(input: unknown): ParamFields {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) return {};
  const fields: Record<string, ParamValue> = {};
  for (const [key, raw] of Object.entries(input)) {
    // Prevent prototype pollution
    if (key === '__proto__' || key === 'constructor' || key === 'prototype') continue;
    const value = toParamValue(raw);
    if (value) fields[key] = value;
  }
  return fields;
}

export function scalarAt(fields: ParamFields, key: string): string | undefined {
  const value = Object.hasOwn(fields, key) ? fields[key] : undefined;
  return value?.kind === 'scalar' ? value.value : undefined;
}

export function nestedAt(fields: ParamFields, key: string): ParamFields | undefined {
  const value = Object.hasOwn(fields, key) ? fields[key] : undefined;
  return value?.kind === 'nested' ? value.fields : undefined;
}
