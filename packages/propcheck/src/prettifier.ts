/**
 * Rendering of argument values for failure reports.
 */

/**
 * Turns a value into display text.
 */
export type Prettifier = (value: unknown) => string;

const MAX_ARRAY_ITEMS = 10;

/**
 * Default rendering used in reports.
 */
export const defaultPrettifier: Prettifier = (value) =>
  formatValue(value, new Set());

function formatValue(value: unknown, seen: Set<object>): string {
  if (typeof value === 'string') {
    return JSON.stringify(value);
  } else if (typeof value === 'bigint') {
    return `${value}n`;
  } else if (typeof value === 'symbol') {
    return value.toString();
  } else if (typeof value === 'function') {
    return `[Function ${value.name || 'anonymous'}]`;
  } else if (typeof value !== 'object' || value === null) {
    return String(value);
  }

  if (seen.has(value)) {
    return '[Circular]';
  }
  seen.add(value);
  try {
    return formatObject(value, seen);
  } finally {
    seen.delete(value);
  }
}

function formatObject(value: object, seen: Set<object>): string {
  if (Array.isArray(value)) {
    if (value.length > MAX_ARRAY_ITEMS) {
      const preview = value
        .slice(0, MAX_ARRAY_ITEMS)
        .map((item) => formatValue(item, seen))
        .join(', ');
      return `[${preview}, ... (${value.length} items total)]`;
    }
    return `[${value.map((item) => formatValue(item, seen)).join(', ')}]`;
  } else if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  } else if (value instanceof Map) {
    const entries = [...value.entries()].map(
      ([key, item]) => `${formatValue(key, seen)} => ${formatValue(item, seen)}`
    );
    return `Map(${value.size}) {${entries.length > 0 ? ` ${entries.join(', ')} ` : ''}}`;
  } else if (value instanceof Set) {
    const items = [...value.values()].map((item) => formatValue(item, seen));
    return `Set(${value.size}) {${items.length > 0 ? ` ${items.join(', ')} ` : ''}}`;
  } else if (value instanceof Error) {
    return `${value.name}(${JSON.stringify(value.message)})`;
  }

  const fields = Object.entries(value).map(
    ([key, item]) => `${key}: ${formatValue(item, seen)}`
  );
  const body = fields.length > 0 ? `{ ${fields.join(', ')} }` : '{}';
  const className = classNameOf(value);
  return className === undefined ? body : `${className} ${body}`;
}

function classNameOf(value: object): string | undefined {
  const prototype: unknown = Object.getPrototypeOf(value);
  if (prototype === null || prototype === Object.prototype) {
    return undefined;
  }
  const name: unknown = value.constructor?.name;
  return typeof name === 'string' && name !== '' ? name : undefined;
}
