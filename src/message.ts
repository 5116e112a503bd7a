import { z } from 'zod';

import { Content, ContentSchema, encodeContent } from './content.js';
import { InvalidRole, MissingContent, SchemaError, StructuredContent } from './errors.js';
import { childPath, expectObject, JsonObject, keysOf, mergeExtra, parseWith, splitExtra } from './json.js';

export const ROLES = ['developer', 'system', 'user', 'assistant', 'tool', 'function'] as const;

export type Role = (typeof ROLES)[number];

export function isRole(label: string): label is Role {
  return ROLES.some((r) => r === label);
}

export interface DeveloperMessage {
  role: 'developer';
  content: Content;
  name?: string | null;
}

export interface SystemMessage {
  role: 'system';
  content: Content;
  name?: string | null;
}

export interface UserMessage {
  role: 'user';
  content: Content;
  name?: string | null;
}

/**
 * Assistant turn. `content` is absent (or `null` on the wire) when the turn
 * only carries tool or function calls. Every key the model does not know,
 * such as `refusal` or `tool_calls`, lives in `extra` and is written back at
 * the top level of the message.
 */
export interface AssistantMessage {
  role: 'assistant';
  content?: Content | null;
  name?: string | null;
  extra?: JsonObject;
}

export interface ToolMessage {
  role: 'tool';
  content: Content;
  tool_call_id: string;
}

export interface FunctionMessage {
  role: 'function';
  content: Content;
  name: string;
}

export type Message =
  | DeveloperMessage
  | SystemMessage
  | UserMessage
  | AssistantMessage
  | ToolMessage
  | FunctionMessage;

export const ChatMessage = {
  developer: (content: Content, name?: string): DeveloperMessage =>
    name === undefined ? { role: 'developer', content } : { role: 'developer', content, name },
  system: (content: Content, name?: string): SystemMessage =>
    name === undefined ? { role: 'system', content } : { role: 'system', content, name },
  user: (content: Content, name?: string): UserMessage =>
    name === undefined ? { role: 'user', content } : { role: 'user', content, name },
  assistant: (content: Content, extra?: JsonObject): AssistantMessage =>
    extra === undefined ? { role: 'assistant', content } : { role: 'assistant', content, extra },
  tool: (content: Content, toolCallId: string): ToolMessage => ({ role: 'tool', content, tool_call_id: toolCallId }),
  fn: (content: Content, name: string): FunctionMessage => ({ role: 'function', content, name }),

  /**
   * Build a plain-text message from a role label.
   *
   * `ref` is the tool call id for `tool` and the function name for
   * `function`; other roles ignore it.
   */
  fromRole(role: string, text: string, ref = ''): Message {
    switch (role) {
      case 'developer':
        return ChatMessage.developer(text);
      case 'system':
        return ChatMessage.system(text);
      case 'user':
        return ChatMessage.user(text);
      case 'assistant':
        return ChatMessage.assistant(text);
      case 'tool':
        return ChatMessage.tool(text, ref);
      case 'function':
        return ChatMessage.fn(text, ref);
      default:
        throw new InvalidRole(role);
    }
  },
};

export function messageContent(message: Message): Content | undefined {
  return message.content ?? undefined;
}

/**
 * Plain text of a message.
 *
 * @throws MissingContent when the message carries no content.
 * @throws StructuredContent when the content is the multi-part array form.
 */
export function contentText(message: Message): string {
  const content = messageContent(message);
  if (content === undefined) {
    throw new MissingContent(`${message.role} message has no content`);
  }
  if (typeof content !== 'string') {
    throw new StructuredContent(content.length);
  }
  return content;
}

const RoleTag = z.object({ role: z.string() });

const NamedFields = z.object({
  content: ContentSchema,
  name: z.string().nullable().optional(),
});

const AssistantFields = z.object({
  content: ContentSchema.nullable().optional(),
  name: z.string().nullable().optional(),
});

const ToolFields = z.object({
  content: ContentSchema,
  tool_call_id: z.string(),
});

const FunctionFields = z.object({
  content: ContentSchema,
  name: z.string(),
});

const ASSISTANT_KEYS = keysOf(AssistantFields, 'role');

/**
 * Decode one wire message. The variant is chosen by `role`; unknown keys are
 * dropped except on `assistant`, where they are captured into `extra`.
 */
export function decodeMessage(value: unknown, path = 'message'): Message {
  const raw = expectObject(value, path);
  const { role } = parseWith(RoleTag, raw, path);

  switch (role) {
    case 'developer':
    case 'system':
    case 'user': {
      const f = parseWith(NamedFields, raw, path);
      return f.name === undefined ? { role, content: f.content } : { role, content: f.content, name: f.name };
    }
    case 'assistant': {
      const f = parseWith(AssistantFields, raw, path);
      const msg: AssistantMessage = { role };
      if (f.content !== undefined) msg.content = f.content;
      if (f.name !== undefined) msg.name = f.name;
      const extra = splitExtra(raw, ASSISTANT_KEYS);
      if (extra) msg.extra = extra;
      return msg;
    }
    case 'tool': {
      const f = parseWith(ToolFields, raw, path);
      return { role, content: f.content, tool_call_id: f.tool_call_id };
    }
    case 'function': {
      const f = parseWith(FunctionFields, raw, path);
      return { role, content: f.content, name: f.name };
    }
    default:
      throw new SchemaError(childPath(path, 'role'), `unknown role ${JSON.stringify(role)}`);
  }
}

export function encodeMessage(message: Message): JsonObject {
  switch (message.role) {
    case 'developer':
    case 'system':
    case 'user': {
      const out: JsonObject = { role: message.role, content: encodeContent(message.content) };
      if (message.name !== undefined) out.name = message.name;
      return out;
    }
    case 'assistant': {
      const out: JsonObject = { role: message.role };
      if (message.content !== undefined) {
        out.content = message.content === null ? null : encodeContent(message.content);
      }
      if (message.name !== undefined) out.name = message.name;
      return mergeExtra(out, message.extra, ASSISTANT_KEYS);
    }
    case 'tool':
      return { role: message.role, content: encodeContent(message.content), tool_call_id: message.tool_call_id };
    case 'function':
      return { role: message.role, content: encodeContent(message.content), name: message.name };
  }
}
