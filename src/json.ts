import { z } from 'zod';

import { SchemaError } from './errors.js';

export type JsonObject = Record<string, unknown>;

export function isObject(v: unknown): v is JsonObject {
  return !!v && typeof v === 'object' && !Array.isArray(v);
}

export function jsonKind(v: unknown): string {
  if (v === null) return 'null';
  if (Array.isArray(v)) return 'array';
  return typeof v;
}

function joinPath(base: string, segments: ReadonlyArray<string | number>): string {
  let out = base;
  for (const seg of segments) {
    if (typeof seg === 'number') out += `[${seg}]`;
    else out = out ? `${out}.${seg}` : seg;
  }
  return out;
}

export function childPath(base: string, key: string | number): string {
  return joinPath(base, [key]);
}

export function expectObject(value: unknown, path: string): JsonObject {
  if (!isObject(value)) {
    throw new SchemaError(path, `expected an object, got ${jsonKind(value)}`);
  }
  return value;
}

/**
 * Validate `value` against `schema`, reporting the first issue as a
 * {@link SchemaError} located relative to `path`.
 */
export function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown, path: string): z.infer<S> {
  const res = schema.safeParse(value);
  if (res.success) return res.data;

  const issue = res.error.issues[0];
  if (!issue) throw new SchemaError(path, 'invalid value');
  throw new SchemaError(joinPath(path, issue.path), issue.message);
}

export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new SchemaError('', `invalid JSON: ${(e as Error).message}`);
  }
}

/** Field names declared by an object schema. */
export function keysOf(schema: z.AnyZodObject, ...more: string[]): ReadonlySet<string> {
  return new Set([...Object.keys(schema.shape), ...more]);
}

/** Own-property write; a plain assignment to `__proto__` would set the prototype instead. */
function setOwn(target: JsonObject, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

/** Collect the keys of `raw` that are not in `known`; undefined when there are none. */
export function splitExtra(raw: JsonObject, known: ReadonlySet<string>): JsonObject | undefined {
  let extra: JsonObject | undefined;
  for (const [key, value] of Object.entries(raw)) {
    if (known.has(key)) continue;
    extra ??= {};
    setOwn(extra, key, value);
  }
  return extra;
}

/**
 * Flatten `extra` into `out` at the same level. Modeled fields win: an extra
 * entry whose key is in `known` is never emitted.
 */
export function mergeExtra(out: JsonObject, extra: JsonObject | undefined, known: ReadonlySet<string>): JsonObject {
  if (!extra) return out;
  for (const [key, value] of Object.entries(extra)) {
    if (!known.has(key)) setOwn(out, key, value);
  }
  return out;
}
