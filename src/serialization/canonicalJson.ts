import blake3 from 'blake3-wasm';

const textEncoder = new TextEncoder();

type CanonicalScalar = null | boolean | number | string;

type CanonicalValue = CanonicalScalar | CanonicalValue[] | { [key: string]: CanonicalValue };

export type CanonicalJsonWriteOptions = {
  indent?: number;
};

const bytesToHex = (bytes: Uint8Array): string => {
  let result = '';
  for (let i = 0; i < bytes.length; i++) {
    result += bytes[i].toString(16).padStart(2, '0');
  }
  return result;
};

const isPlainRecord = (value: unknown): value is Record<string, unknown> => {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

const normalizeNumber = (value: number): number => {
  if (!Number.isFinite(value)) {
    throw new TypeError(`Canonical JSON cannot encode non-finite numbers (received ${value})`);
  }
  return Object.is(value, -0) ? 0 : value;
};

/**
 * Sorts object keys, drops undefined fields, turns typed arrays into plain
 * arrays and -0 into 0. Anything else that JSON cannot carry is rejected.
 */
const normalizeValue = (value: unknown, inArray: boolean): CanonicalValue | undefined => {
  if (value === null) return null;
  if (value === undefined) return inArray ? null : undefined;
  if (typeof value === 'number') return normalizeNumber(value);
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (Array.isArray(value)) {
    return value.map((entry: unknown) => normalizeValue(entry, true) ?? null);
  }
  if (value instanceof Float64Array || value instanceof Float32Array) {
    return Array.from(value, normalizeNumber);
  }
  if (ArrayBuffer.isView(value)) {
    return Array.from(new Uint8Array(value.buffer, value.byteOffset, value.byteLength));
  }
  if (isPlainRecord(value)) {
    const result: { [key: string]: CanonicalValue } = {};
    for (const key of Object.keys(value).sort()) {
      const normalized = normalizeValue(value[key], false);
      if (normalized !== undefined) {
        result[key] = normalized;
      }
    }
    return result;
  }
  throw new TypeError(`Canonical JSON cannot encode values of type ${typeof value}`);
};

const stringifyValue = (value: CanonicalValue, indentUnit: string | undefined, depth: number): string => {
  if (value === null) return 'null';
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (typeof value === 'string') return JSON.stringify(value);

  let entries: [string | null, CanonicalValue][];
  if (Array.isArray(value)) {
    entries = value.map((entry): [string | null, CanonicalValue] => [null, entry]);
  } else {
    const record = value;
    entries = Object.keys(record).map((key): [string | null, CanonicalValue] => [key, record[key]]);
  }
  const [open, close] = Array.isArray(value) ? ['[', ']'] : ['{', '}'];
  if (entries.length === 0) {
    return `${open}${close}`;
  }
  const separator = indentUnit === undefined ? ':' : ': ';
  const parts = entries.map(([key, entry]) => {
    const body = stringifyValue(entry, indentUnit, depth + 1);
    return key === null ? body : `${JSON.stringify(key)}${separator}${body}`;
  });
  if (indentUnit === undefined) {
    return `${open}${parts.join(',')}${close}`;
  }
  const inner = indentUnit.repeat(depth + 1);
  const outer = indentUnit.repeat(depth);
  return `${open}\n${inner}${parts.join(`,\n${inner}`)}\n${outer}${close}`;
};

export const writeCanonicalJson = (
  value: unknown,
  options: CanonicalJsonWriteOptions = {},
): string => {
  const normalized = normalizeValue(value, false) ?? null;
  const indentUnit =
    typeof options.indent === 'number' && options.indent > 0
      ? ' '.repeat(Math.min(options.indent, 10))
      : undefined;
  return stringifyValue(normalized, indentUnit, 0);
};

export const hashBytes = (bytes: Uint8Array): string =>
  bytesToHex(blake3.createHash().update(bytes).digest());

export const hashCanonicalJsonString = (json: string): string =>
  hashBytes(textEncoder.encode(json));

export const hashCanonicalJson = (
  value: unknown,
  options: CanonicalJsonWriteOptions = {},
): { json: string; hash: string } => {
  const json = writeCanonicalJson(value, options);
  return { json, hash: hashCanonicalJsonString(json) };
};
