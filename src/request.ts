import { z } from 'zod';

import { childPath, expectObject, JsonObject, keysOf, mergeExtra, parseJson, parseWith, splitExtra } from './json.js';
import { ChatMessage, decodeMessage, encodeMessage, Message } from './message.js';

export interface ChatRequest {
  model: string;
  /** Conversation order. */
  messages: Message[];
  max_tokens?: number | null;
  max_completion_tokens?: number | null;
  /** Absent or `null` means the provider default. */
  temperature?: number | null;
  stream?: boolean | null;
  /** Opaque end-user identifier. */
  user?: string | null;
  /** Top-level fields this model does not know, written back flat beside the known ones. */
  extra?: JsonObject;
}

export const ChatRequest = {
  create: (model: string, ...messages: Message[]): ChatRequest => ({ model, messages }),
  builder: (model: string): ChatRequestBuilder => new ChatRequestBuilder(ChatRequest.create(model)),
};

/**
 * Append a plain-text message built from a role label and return the same
 * request, so calls can be nested.
 *
 * @throws InvalidRole when `role` is not one of the six known roles.
 */
export function withMessage(request: ChatRequest, role: string, text: string, ref?: string): ChatRequest {
  request.messages.push(ChatMessage.fromRole(role, text, ref));
  return request;
}

const tokenLimit = z.number().int().positive();

const RequestFields = z.object({
  model: z.string().min(1),
  messages: z.array(z.unknown()),
  max_tokens: tokenLimit.nullable().optional(),
  max_completion_tokens: tokenLimit.nullable().optional(),
  temperature: z.number().nullable().optional(),
  stream: z.boolean().nullable().optional(),
  user: z.string().nullable().optional(),
});

const REQUEST_KEYS = keysOf(RequestFields);

export function decodeChatRequest(value: unknown): ChatRequest {
  const raw = expectObject(value, '');
  const f = parseWith(RequestFields, raw, '');

  const req: ChatRequest = {
    model: f.model,
    messages: f.messages.map((m, i) => decodeMessage(m, childPath('messages', i))),
  };
  if (f.max_tokens !== undefined) req.max_tokens = f.max_tokens;
  if (f.max_completion_tokens !== undefined) req.max_completion_tokens = f.max_completion_tokens;
  if (f.temperature !== undefined) req.temperature = f.temperature;
  if (f.stream !== undefined) req.stream = f.stream;
  if (f.user !== undefined) req.user = f.user;

  const extra = splitExtra(raw, REQUEST_KEYS);
  if (extra) req.extra = extra;
  return req;
}

export function encodeChatRequest(req: ChatRequest): JsonObject {
  const out: JsonObject = {
    model: req.model,
    messages: req.messages.map(encodeMessage),
  };
  if (req.max_tokens !== undefined) out.max_tokens = req.max_tokens;
  if (req.max_completion_tokens !== undefined) out.max_completion_tokens = req.max_completion_tokens;
  if (req.temperature !== undefined) out.temperature = req.temperature;
  if (req.stream !== undefined) out.stream = req.stream;
  if (req.user !== undefined) out.user = req.user;
  return mergeExtra(out, req.extra, REQUEST_KEYS);
}

export function parseChatRequest(text: string): ChatRequest {
  return decodeChatRequest(parseJson(text));
}

/** Left-to-right form of {@link withMessage}. */
export class ChatRequestBuilder {
  constructor(private readonly request: ChatRequest) {}

  /** @throws InvalidRole when `role` is not one of the six known roles. */
  with(role: string, text: string, ref?: string): this {
    withMessage(this.request, role, text, ref);
    return this;
  }

  build(): ChatRequest {
    return this.request;
  }
}
