import { z } from 'zod';

import { childPath, expectObject, JsonObject, keysOf, mergeExtra, parseJson, parseWith, splitExtra } from './json.js';
import { decodeMessage, encodeMessage, Message } from './message.js';

/**
 * Token accounting. The two `*_details` objects are vendor data and are only
 * carried through.
 */
export interface Usage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
  prompt_tokens_details?: unknown;
  completion_tokens_details?: unknown;
  extra?: JsonObject;
}

export interface Choice {
  index: number;
  /** Always an assistant turn in practice, but any variant decodes. */
  message: Message;
  /** `"stop"`, `"length"`, ...; left open since providers add values. */
  finish_reason: string;
  logprobs?: unknown;
  extra?: JsonObject;
}

export interface ChatResponse {
  id: string;
  object: string;
  /** Unix seconds. */
  created: number;
  model: string;
  choices: Choice[];
  usage: Usage;
  system_fingerprint?: string | null;
  service_tier?: string | null;
  extra?: JsonObject;
}

const count = z.number().int().nonnegative();

const UsageFields = z.object({
  prompt_tokens: count,
  completion_tokens: count,
  total_tokens: count,
  prompt_tokens_details: z.unknown(),
  completion_tokens_details: z.unknown(),
});

const ChoiceFields = z.object({
  index: z.number().int().nonnegative(),
  message: z.unknown(),
  finish_reason: z.string(),
  logprobs: z.unknown(),
});

const ResponseFields = z.object({
  id: z.string(),
  object: z.string(),
  created: z.number().int(),
  model: z.string(),
  choices: z.array(z.unknown()),
  usage: z.unknown(),
  system_fingerprint: z.string().nullable().optional(),
  service_tier: z.string().nullable().optional(),
});

const USAGE_KEYS = keysOf(UsageFields);
const CHOICE_KEYS = keysOf(ChoiceFields);
const RESPONSE_KEYS = keysOf(ResponseFields);

export function decodeUsage(value: unknown, path = 'usage'): Usage {
  const raw = expectObject(value, path);
  const f = parseWith(UsageFields, raw, path);

  const usage: Usage = {
    prompt_tokens: f.prompt_tokens,
    completion_tokens: f.completion_tokens,
    total_tokens: f.total_tokens,
  };
  if (f.prompt_tokens_details !== undefined) usage.prompt_tokens_details = f.prompt_tokens_details;
  if (f.completion_tokens_details !== undefined) usage.completion_tokens_details = f.completion_tokens_details;

  const extra = splitExtra(raw, USAGE_KEYS);
  if (extra) usage.extra = extra;
  return usage;
}

export function decodeChoice(value: unknown, path = 'choice'): Choice {
  const raw = expectObject(value, path);
  const f = parseWith(ChoiceFields, raw, path);

  const choice: Choice = {
    index: f.index,
    message: decodeMessage(f.message, childPath(path, 'message')),
    finish_reason: f.finish_reason,
  };
  // `null` is a value here; only a missing key stays missing.
  if (f.logprobs !== undefined) choice.logprobs = f.logprobs;

  const extra = splitExtra(raw, CHOICE_KEYS);
  if (extra) choice.extra = extra;
  return choice;
}

export function decodeChatResponse(value: unknown): ChatResponse {
  const raw = expectObject(value, '');
  const f = parseWith(ResponseFields, raw, '');

  const resp: ChatResponse = {
    id: f.id,
    object: f.object,
    created: f.created,
    model: f.model,
    choices: f.choices.map((c, i) => decodeChoice(c, childPath('choices', i))),
    usage: decodeUsage(f.usage),
  };
  if (f.system_fingerprint !== undefined) resp.system_fingerprint = f.system_fingerprint;
  if (f.service_tier !== undefined) resp.service_tier = f.service_tier;

  const extra = splitExtra(raw, RESPONSE_KEYS);
  if (extra) resp.extra = extra;
  return resp;
}

export function encodeUsage(usage: Usage): JsonObject {
  const out: JsonObject = {
    prompt_tokens: usage.prompt_tokens,
    completion_tokens: usage.completion_tokens,
    total_tokens: usage.total_tokens,
  };
  if (usage.prompt_tokens_details !== undefined) out.prompt_tokens_details = usage.prompt_tokens_details;
  if (usage.completion_tokens_details !== undefined) out.completion_tokens_details = usage.completion_tokens_details;
  return mergeExtra(out, usage.extra, USAGE_KEYS);
}

export function encodeChoice(choice: Choice): JsonObject {
  const out: JsonObject = {
    index: choice.index,
    message: encodeMessage(choice.message),
    finish_reason: choice.finish_reason,
  };
  if (choice.logprobs !== undefined) out.logprobs = choice.logprobs;
  return mergeExtra(out, choice.extra, CHOICE_KEYS);
}

export function encodeChatResponse(resp: ChatResponse): JsonObject {
  const out: JsonObject = {
    id: resp.id,
    object: resp.object,
    created: resp.created,
    model: resp.model,
    choices: resp.choices.map(encodeChoice),
    usage: encodeUsage(resp.usage),
  };
  if (resp.system_fingerprint !== undefined) out.system_fingerprint = resp.system_fingerprint;
  if (resp.service_tier !== undefined) out.service_tier = resp.service_tier;
  return mergeExtra(out, resp.extra, RESPONSE_KEYS);
}

export function parseChatResponse(text: string): ChatResponse {
  return decodeChatResponse(parseJson(text));
}

/** Text of the first choice that carries plain-text content. */
export function firstText(resp: ChatResponse): string | undefined {
  for (const c of resp.choices) {
    if (typeof c.message.content === 'string') return c.message.content;
  }
  return undefined;
}
