import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { LlmError } from '../shared/errors.js';
import type { Config } from '../shared/config.js';

export interface LlmMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LlmResponse {
  content: string;
  model: string;
  token_count: number;
}

// OpenAI-compatible chat completions API response shape (partial)
const OpenAIResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullish() }).optional() }))
    .optional(),
  model: z.string().optional(),
  usage: z.object({ total_tokens: z.number().optional() }).optional(),
});

export interface ChatClient {
  chat(messages: LlmMessage[]): Promise<LlmResponse>;
  isConfigured(): boolean;
}

export class LlmClient implements ChatClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly timeoutMs: number;

  constructor(config: Config['llm']) {
    this.baseUrl = config.base_url || 'https://api.openai.com/v1';
    this.apiKey = config.api_key;
    this.model = config.model;
    this.maxTokens = config.max_tokens;
    this.temperature = config.temperature;
    this.timeoutMs = config.timeout_ms;
  }

  async chat(messages: LlmMessage[]): Promise<LlmResponse> {
    if (!this.isConfigured()) {
      throw new LlmError('LLM API key is not configured (llm.api_key)');
    }

    const url = `${this.baseUrl.replace(/\/+$/, '')}/chat/completions`;
    const body = JSON.stringify({
      model: this.model,
      messages,
      max_tokens: this.maxTokens,
      temperature: this.temperature,
    });

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body,
        signal: controller.signal,
      });
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new LlmError(`LLM request timed out after ${this.timeoutMs}ms`, { url });
      }
      throw new LlmError(`LLM request failed: ${err instanceof Error ? err.message : String(err)}`, {
        url,
        model: this.model,
      });
    } finally {
      clearTimeout(timer);
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new LlmError(`LLM API error: ${response.status} ${response.statusText}`, {
        status: response.status,
        body: text.slice(0, 500),
        url,
      });
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      throw new LlmError('LLM response is not valid JSON', { url });
    }

    const parsed = OpenAIResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new LlmError('Unexpected LLM response shape', { issues: parsed.error.issues.slice(0, 3) });
    }
    const data = parsed.data;

    const content = data.choices?.[0]?.message?.content;
    if (!content) {
      throw new LlmError('LLM returned empty content', {
        response: JSON.stringify(data).slice(0, 200),
      });
    }

    const tokenCount = data.usage?.total_tokens ?? 0;
    logger.debug({ model: data.model, tokens: tokenCount }, 'LLM call completed');

    return {
      content,
      model: data.model ?? this.model,
      token_count: tokenCount,
    };
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }
}
