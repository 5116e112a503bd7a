import { ApiError, ChatWireError, DeserializationError, TransportError } from './errors.js';
import { ChatRequest, encodeChatRequest } from './request.js';
import { ChatResponse, parseChatResponse } from './response.js';

export const DEFAULT_BASE_URL = 'https://api.openai.com';
export const DEFAULT_CHAT_PATH = '/v1/chat/completions';

export interface ChatClientConfig {
  /** Provider origin. Defaults to {@link DEFAULT_BASE_URL}. */
  baseUrl?: string;
  /** Path for the chat-completions endpoint. */
  chatPath?: string;
  /** Additional headers. They cannot replace `authorization` or `content-type`. */
  headers?: Record<string, string>;
  /** Fetch implementation (defaults to global fetch). */
  fetchImpl?: typeof fetch;
}

export interface ChatCallOptions {
  /** Aborting drops the in-flight HTTP call; `chat` then rejects with a TransportError. */
  signal?: AbortSignal;
}

function joinUrl(base: string, path: string): string {
  const b = base.endsWith('/') ? base : `${base}/`;
  const p = path.startsWith('/') ? path.slice(1) : path;
  return new URL(p, b).toString();
}

function errorText(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Executes chat-completion calls against one endpoint.
 *
 * Holds only the credential and the fetch handle, so a single instance can
 * serve concurrent callers.
 */
export class ChatClient {
  readonly chatUrl: string;
  // ES private: kept out of JSON.stringify and util.inspect output.
  readonly #apiKey: string;
  readonly #fetchImpl: typeof fetch;

  constructor(apiKey: string, public readonly config: ChatClientConfig = {}) {
    if (!apiKey) {
      throw new ChatWireError('API key must not be empty');
    }
    this.#apiKey = apiKey;
    this.chatUrl = joinUrl(config.baseUrl ?? DEFAULT_BASE_URL, config.chatPath ?? DEFAULT_CHAT_PATH);
    this.#fetchImpl = config.fetchImpl ?? fetch;
  }

  async chat(request: ChatRequest, options: ChatCallOptions = {}): Promise<ChatResponse> {
    const headers = new Headers({ accept: 'application/json' });
    for (const [name, value] of Object.entries(this.config.headers ?? {})) {
      headers.set(name, value);
    }
    headers.set('content-type', 'application/json');
    headers.set('authorization', `Bearer ${this.#apiKey}`);

    let resp: Response;
    try {
      resp = await this.#fetchImpl(this.chatUrl, {
        method: 'POST',
        headers,
        body: JSON.stringify(encodeChatRequest(request)),
        signal: options.signal,
      });
    } catch (e) {
      throw new TransportError(`POST ${this.chatUrl} failed: ${errorText(e)}`, { cause: e });
    }

    let text: string;
    try {
      text = await resp.text();
    } catch (e) {
      throw new TransportError(`failed to read response body (HTTP ${resp.status}): ${errorText(e)}`, { cause: e });
    }

    if (!resp.ok) {
      throw new ApiError(resp.status, text);
    }

    try {
      return parseChatResponse(text);
    } catch (e) {
      throw new DeserializationError(`unexpected chat completion body (HTTP ${resp.status}): ${errorText(e)}`, {
        cause: e,
      });
    }
  }
}
