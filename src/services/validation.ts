import type { Dimensions, FieldError, Item, PackRequest } from '../types';

export type ValidationResult =
  | { ok: true; value: PackRequest }
  | { ok: false; errors: FieldError[] };

const DIMENSION_KEYS = ['length', 'width', 'height'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const INTEGER_STRING = /^[+-]?\d+$/;

// Integers, or strings holding one, as lax integer parsing takes them
function toInteger(value: unknown): { value: number } | Omit<FieldError, 'loc'> {
  if (typeof value === 'number') {
    if (Number.isInteger(value)) return { value };
    if (Number.isFinite(value)) {
      return { type: 'int_from_float', msg: 'Input should be a valid integer, got a number with a fractional part', input: value };
    }
  }
  if (typeof value === 'string' && INTEGER_STRING.test(value.trim())) {
    return { value: Number(value.trim()) };
  }
  if (typeof value === 'string') {
    return { type: 'int_parsing', msg: 'Input should be a valid integer, unable to parse string as an integer', input: value };
  }
  return { type: 'int_type', msg: 'Input should be a valid integer', input: value };
}

function validateDimensions(raw: unknown, loc: Array<string | number>, errors: FieldError[]): Dimensions | undefined {
  if (raw === undefined) {
    errors.push({ type: 'missing', loc, msg: 'Field required' });
    return undefined;
  }
  if (!isRecord(raw)) {
    errors.push({ type: 'model_type', loc, msg: 'Input should be an object', input: raw });
    return undefined;
  }

  const before = errors.length;
  const values: Partial<Dimensions> = {};

  for (const key of DIMENSION_KEYS) {
    const value = raw[key];
    const fieldLoc = [...loc, key];

    if (value === undefined) {
      errors.push({ type: 'missing', loc: fieldLoc, msg: 'Field required' });
      continue;
    }

    const parsed = toInteger(value);
    if (!('value' in parsed)) {
      errors.push({ ...parsed, loc: fieldLoc });
    } else if (parsed.value <= 0) {
      errors.push({ type: 'greater_than', loc: fieldLoc, msg: 'Input should be greater than 0', input: value });
    } else {
      values[key] = parsed.value;
    }
  }

  if (errors.length > before) return undefined;
  const { length, width, height } = values;
  if (length === undefined || width === undefined || height === undefined) return undefined;
  return { length, width, height };
}

function validateItem(raw: unknown, index: number, errors: FieldError[]): Item | undefined {
  const loc: Array<string | number> = ['items', index];

  if (!isRecord(raw)) {
    errors.push({ type: 'model_type', loc, msg: 'Input should be an object', input: raw });
    return undefined;
  }

  let sku: string | undefined;
  if (raw.sku === undefined) {
    errors.push({ type: 'missing', loc: [...loc, 'sku'], msg: 'Field required' });
  } else if (typeof raw.sku !== 'string') {
    errors.push({ type: 'string_type', loc: [...loc, 'sku'], msg: 'Input should be a valid string', input: raw.sku });
  } else if (raw.sku.length === 0) {
    errors.push({
      type: 'string_too_short',
      loc: [...loc, 'sku'],
      msg: 'String should have at least 1 character',
      input: raw.sku,
    });
  } else {
    sku = raw.sku;
  }

  const dimensions = validateDimensions(raw.dimensions, [...loc, 'dimensions'], errors);

  if (sku === undefined || dimensions === undefined) return undefined;
  return { sku, dimensions };
}

// Reports every problem found, not just the first.
export function validatePackRequest(body: unknown): ValidationResult {
  if (!isRecord(body)) {
    return { ok: false, errors: [{ type: 'model_type', loc: [], msg: 'Input should be an object', input: body }] };
  }

  const rawItems = body.items;
  if (rawItems === undefined) {
    return { ok: false, errors: [{ type: 'missing', loc: ['items'], msg: 'Field required' }] };
  }
  if (!Array.isArray(rawItems)) {
    return { ok: false, errors: [{ type: 'list_type', loc: ['items'], msg: 'Input should be a valid list', input: rawItems }] };
  }
  if (rawItems.length === 0) {
    return {
      ok: false,
      errors: [{ type: 'too_short', loc: ['items'], msg: 'List should have at least 1 item after validation, not 0', input: [] }],
    };
  }

  const errors: FieldError[] = [];
  const items: Item[] = [];

  rawItems.forEach((raw: unknown, index) => {
    const item = validateItem(raw, index, errors);
    if (item) items.push(item);
  });

  if (errors.length > 0) {
    return { ok: false, errors };
  }

  const skus = new Set(items.map(item => item.sku));
  if (skus.size !== items.length) {
    return {
      ok: false,
      errors: [{ type: 'value_error', loc: ['items'], msg: 'Value error, Duplicate sku values are not allowed.' }],
    };
  }

  return { ok: true, value: { items } };
}
