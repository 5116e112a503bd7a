import { describe, expect, it } from 'vitest';

import { MissingContent, SchemaError } from '../src/errors.js';
import { contentText } from '../src/message.js';
import { decodeChatResponse, encodeChatResponse, firstText, parseChatResponse } from '../src/response.js';
import { greetingResponse } from './fixtures.js';

function schemaPath(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (e) {
    if (e instanceof SchemaError) return e.path;
    throw e;
  }
  return undefined;
}

describe('response', () => {
  it('decodes a chat completion', () => {
    const resp = decodeChatResponse(greetingResponse);

    expect(resp.id).toBe('chatcmpl-test-001');
    expect(resp.object).toBe('chat.completion');
    expect(resp.created).toBe(1728933352);
    expect(resp.model).toBe('gpt-4o-2024-08-06');
    expect(resp.system_fingerprint).toBe('fp_test');
    expect(resp.service_tier).toBeUndefined();

    expect(resp.usage.prompt_tokens).toBe(19);
    expect(resp.usage.completion_tokens).toBe(10);
    expect(resp.usage.total_tokens).toBe(29);
    expect(resp.usage.total_tokens).toBe(resp.usage.prompt_tokens + resp.usage.completion_tokens);
    expect(resp.usage.prompt_tokens_details).toEqual({ cached_tokens: 0 });

    const [choice] = resp.choices;
    expect(choice.index).toBe(0);
    expect(choice.finish_reason).toBe('stop');
    expect('logprobs' in choice).toBe(true);
    expect(choice.logprobs).toBeNull();
    expect(choice.message).toEqual({
      role: 'assistant',
      content: 'Hi there! How can I assist you today?',
      extra: { refusal: null },
    });
    expect(contentText(choice.message)).toBe('Hi there! How can I assist you today?');
    expect(firstText(resp)).toBe('Hi there! How can I assist you today?');
  });

  it('re-encodes to the original payload', () => {
    expect(encodeChatResponse(decodeChatResponse(greetingResponse))).toEqual(greetingResponse);
  });

  it('keeps fields it does not model', () => {
    const wire = {
      ...greetingResponse,
      service_tier: 'default',
      provider_meta: { region: 'eu' },
      usage: { ...greetingResponse.usage, audio_tokens: 0 },
    };
    const resp = decodeChatResponse(wire);
    expect(resp.service_tier).toBe('default');
    expect(resp.extra).toEqual({ provider_meta: { region: 'eu' } });
    expect(resp.usage.extra).toEqual({ audio_tokens: 0 });
    expect(encodeChatResponse(resp)).toEqual(wire);
  });

  it('leaves a missing logprobs key missing', () => {
    const wire = {
      ...greetingResponse,
      choices: [{ index: 0, message: { role: 'assistant', content: 'ok' }, finish_reason: 'length' }],
    };
    const resp = decodeChatResponse(wire);
    expect('logprobs' in resp.choices[0]).toBe(false);
    expect(encodeChatResponse(resp)).toEqual(wire);
  });

  it('handles a tool-call-only choice', () => {
    const resp = decodeChatResponse({
      ...greetingResponse,
      choices: [
        {
          index: 0,
          message: { role: 'assistant', content: null, tool_calls: [] },
          logprobs: null,
          finish_reason: 'tool_calls',
        },
      ],
    });
    expect(resp.choices[0].finish_reason).toBe('tool_calls');
    expect(firstText(resp)).toBeUndefined();
    expect(() => contentText(resp.choices[0].message)).toThrow(MissingContent);
  });

  it('locates schema violations', () => {
    const { usage: _usage, ...noUsage } = greetingResponse;
    expect(schemaPath(() => decodeChatResponse(noUsage))).toBe('usage');
    expect(
      schemaPath(() => decodeChatResponse({ ...greetingResponse, usage: { ...greetingResponse.usage, total_tokens: 'x' } })),
    ).toBe('usage.total_tokens');
    expect(
      schemaPath(() => decodeChatResponse({ ...greetingResponse, choices: [{ index: 0, finish_reason: 'stop' }] })),
    ).toBe('choices[0].message');
    expect(schemaPath(() => decodeChatResponse({ ...greetingResponse, created: 'yesterday' }))).toBe('created');
  });

  it('parses JSON text', () => {
    const resp = parseChatResponse(JSON.stringify(greetingResponse));
    expect(resp.usage.total_tokens).toBe(29);
  });
});
