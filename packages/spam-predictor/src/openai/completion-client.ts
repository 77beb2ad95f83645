import { HttpClient, HttpError, type HttpEffects } from '@spamcheck/http';
import { getLogger, type Logger } from '@spamcheck/logger';
import { down, type DependencyStatus, up } from '@spamcheck/resilience';
import { err, ok, type Result } from 'neverthrow';

import { type ClassifierError, classifierErrorFromHttp, classifyCompletionFailure } from '../errors.js';

import { ChatCompletionResponseSchema, type ChatCompletionRequest, type ChatMessage } from './openai.schemas.js';

/**
 * The API drops the matched stop sequence from the returned text, so only a
 * line break ends the answer; the verdict word itself must come back.
 */
export const VERDICT_STOP_SEQUENCES = ['\n'];

export interface CompletionClientConfig {
  apiKey: string;
  baseUrl: string;
  healthCheckTimeoutMs: number;
  healthModel: string;
  organization?: string | undefined;
  retries: number;
  timeoutMs: number;
}

export interface CompletionParams {
  maxTokens: number;
  messages: ChatMessage[];
  model: string;
  stop?: string[] | undefined;
  temperature: number;
}

/**
 * Thin chat-completions client. Retries 408, 429 and 5xx with jittered
 * exponential backoff starting at 100ms.
 */
export class OpenAiCompletionClient {
  private readonly httpClient: HttpClient;
  private readonly logger: Logger;

  constructor(
    private readonly config: CompletionClientConfig,
    httpEffects?: Partial<HttpEffects>
  ) {
    this.logger = getLogger('OpenAiCompletionClient');

    const headers: Record<string, string> = { Authorization: `Bearer ${config.apiKey}` };
    if (config.organization) {
      headers['OpenAI-Organization'] = config.organization;
    }

    this.httpClient = new HttpClient(
      {
        backoff: { baseDelayMs: 100, jitter: true, maxDelayMs: 10_000 },
        baseUrl: config.baseUrl,
        defaultHeaders: headers,
        providerName: 'openai',
        retries: config.retries,
        timeout: config.timeoutMs,
      },
      httpEffects
    );
  }

  /**
   * Returns the trimmed content of the first choice.
   */
  async complete(params: CompletionParams, signal?: AbortSignal): Promise<Result<string, ClassifierError>> {
    const body: ChatCompletionRequest = {
      max_tokens: params.maxTokens,
      messages: params.messages,
      model: params.model,
      stop: params.stop,
      temperature: params.temperature,
    };

    const result = await this.httpClient.post('/chat/completions', body, {
      schema: ChatCompletionResponseSchema,
      signal,
    });

    if (result.isErr()) {
      const error = classifierErrorFromHttp(result.error);
      if (error.kind === 'unauthorized') {
        this.logger.error({ statusCode: error.statusCode }, 'OpenAI rejected the API key; check OPENAI_API_KEY');
      }
      return err(error);
    }

    const { choices, usage } = result.value;
    if (usage) {
      this.logger.debug(
        { completionTokens: usage.completion_tokens, promptTokens: usage.prompt_tokens, totalTokens: usage.total_tokens },
        'Token usage statistics'
      );
    }

    // The schema guarantees at least one choice
    const content = choices[0]?.message.content ?? '';
    return ok(content.trim());
  }

  /**
   * One-token completion against the health model. A 400 still proves the API answered.
   */
  async healthCheck(signal?: AbortSignal): Promise<DependencyStatus> {
    const result = await this.httpClient.post(
      '/chat/completions',
      {
        max_tokens: 1,
        messages: [{ content: 'test', role: 'user' }],
        model: this.config.healthModel,
      },
      { retries: 1, signal, timeout: this.config.healthCheckTimeoutMs }
    );

    if (result.isOk()) {
      return up();
    }

    const error = result.error;
    if (error instanceof HttpError && error.statusCode === 400) {
      return up();
    }

    const kind = classifyCompletionFailure(error);
    if (kind === 'unauthorized') {
      this.logger.error('OpenAI health check failed: Authentication failed');
      return down(kind, 'Authentication failed');
    }

    const reason = error instanceof HttpError ? `API returned status ${error.statusCode}` : error.message;
    this.logger.warn(`OpenAI health check failed: ${reason}`);
    return down(kind, reason);
  }

  async close(): Promise<void> {
    await this.httpClient.close();
  }
}
