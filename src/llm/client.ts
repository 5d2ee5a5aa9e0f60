import { logger } from '../shared/logger.js';
import { LlmError, errorMessage } from '../shared/errors.js';
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
interface OpenAIResponse {
  choices?: Array<{ message?: { content?: string | null } }>;
  model?: string;
  usage?: { total_tokens?: number };
}

export class LlmClient {
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
    const url = `${this.baseUrl.replace(/\/+$/, '')}/chat/completions`;

    const body = JSON.stringify({
      model: this.model,
      messages,
      max_tokens: this.maxTokens,
      temperature: this.temperature,
    });

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new LlmError(`LLM request timed out after ${this.timeoutMs}ms`, { url, model: this.model }));
      }, this.timeoutMs);
    });

    let response: Response;
    try {
      response = await Promise.race([
        fetch(url, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.apiKey}`,
          },
          body,
          signal: controller.signal,
        }),
        timeoutPromise,
      ]);
    } catch (err) {
      if (err instanceof LlmError) throw err;
      throw new LlmError(`LLM request failed: ${errorMessage(err)}`, { url, model: this.model });
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

    let data: OpenAIResponse;
    try {
      data = (await response.json()) as OpenAIResponse;
    } catch {
      throw new LlmError('LLM response is not valid JSON', { url });
    }

    const content = data.choices?.[0]?.message?.content?.trim();
    if (!content) {
      throw new LlmError('LLM returned empty content', { response: JSON.stringify(data).slice(0, 200) });
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
