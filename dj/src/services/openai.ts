import OpenAI from 'openai';
import { createChildLogger } from '@autodj/logger';
import { UpstreamUnavailable } from '../errors.js';
import type { CompletionBackend, CompletionOptions } from '../recommendation/engine.js';
import { renderPrompt, type PromptKey, type PromptTemplates, type PromptVariables } from '../recommendation/prompts.js';

const log = createChildLogger({ component: 'recommendation' });

export interface ChatRequest {
  model: string;
  messages: OpenAI.Chat.ChatCompletionMessageParam[];
  temperature?: number;
}

export interface ChatResponse {
  choices: Array<{ message: { content: string | null } }>;
}

/** The slice of the OpenAI SDK the backend calls. */
export interface ChatClient {
  create(request: ChatRequest, options?: { signal?: AbortSignal }): Promise<ChatResponse>;
}

export interface CompletionExchange {
  key: PromptKey;
  prompt: string;
  response: string;
}

export interface OpenAiBackendOptions {
  model: string;
  templates: PromptTemplates;
  systemPrompt?: string;
  temperature?: number;
  onResponse?: (exchange: CompletionExchange) => void;
}

export interface OpenAiClientSettings {
  apiKey?: string;
  /** OpenAI-compatible server, e.g. a local LLM. */
  baseURL?: string;
}

export function createChatClient(settings: OpenAiClientSettings): ChatClient {
  const client = new OpenAI({
    // Local servers accept any key.
    apiKey: settings.apiKey ?? 'local',
    baseURL: settings.baseURL,
    maxRetries: 0,
    timeout: 60_000,
  });
  return {
    create: (request, options) => client.chat.completions.create(request, options),
  };
}

function toUpstream(error: unknown): UpstreamUnavailable {
  if (error instanceof OpenAI.APIError) {
    return new UpstreamUnavailable(`Recommendation backend error: ${error.message}`, 'recommendation', error.status);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new UpstreamUnavailable(`Recommendation backend unreachable: ${message}`, 'recommendation');
}

/**
 * Chat-completion backend: renders a prompt template and returns the raw
 * reply text. Works against OpenAI or any compatible local server.
 */
export class OpenAiCompletionBackend implements CompletionBackend {
  constructor(
    private readonly client: ChatClient,
    private readonly options: OpenAiBackendOptions,
  ) {}

  async complete(key: PromptKey, variables: PromptVariables, options: CompletionOptions = {}): Promise<string> {
    const prompt = renderPrompt(this.options.templates[key], variables);
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (this.options.systemPrompt) {
      messages.push({ role: 'system', content: this.options.systemPrompt });
    }
    messages.push({ role: 'user', content: prompt });

    const startedAt = Date.now();
    let response: ChatResponse;
    try {
      response = await this.client.create(
        { model: this.options.model, messages, temperature: this.options.temperature ?? 0.9 },
        { signal: options.signal },
      );
    } catch (error) {
      throw toUpstream(error);
    }

    const text = response.choices[0]?.message.content?.trim() ?? '';
    log.debug({ key, model: this.options.model, durationMs: Date.now() - startedAt }, 'Completion received');
    this.options.onResponse?.({ key, prompt, response: text });
    return text;
  }
}
