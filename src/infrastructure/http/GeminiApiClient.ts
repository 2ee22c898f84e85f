import { GoogleGenAI, type Part } from '@google/genai';
import { IModelClient, ModelClientFactory } from '../../core/interfaces/IModelClient.js';
import { ModelInfo, ModelRequest, RawModelResponse, RequestPart } from '../../core/entities/Model.js';
import {
  withRetry,
  CircuitBreaker,
  DEFAULT_RETRY_CONFIG,
  RetryConfig,
  createErrorLog,
  isRetryableError,
} from '../../utils/retry.js';

export interface GeminiClientOptions {
  circuitBreaker?: CircuitBreaker;
  retryConfig?: RetryConfig;
}

/**
 * Gemini API client implementation on top of @google/genai
 */
export class GeminiApiClient implements IModelClient {
  private ai: GoogleGenAI;
  private circuitBreaker: CircuitBreaker;
  private retryConfig: RetryConfig;

  constructor(apiKey: string, options: GeminiClientOptions = {}) {
    this.retryConfig = options.retryConfig ?? DEFAULT_RETRY_CONFIG;
    this.circuitBreaker = options.circuitBreaker ?? new CircuitBreaker(5, 60000);
    this.ai = new GoogleGenAI({
      apiKey,
      httpOptions: { timeout: this.retryConfig.timeoutMs },
    });
  }

  async generate(request: ModelRequest): Promise<RawModelResponse> {
    return this.circuitBreaker.execute(() =>
      withRetry(
        () =>
          this.ai.models.generateContent({
            model: request.model,
            contents: [{ role: 'user', parts: request.parts.map(toGeminiPart) }],
            config: {
              systemInstruction: request.systemPrompt || undefined,
              temperature: request.generationConfig.temperature,
              topP: request.generationConfig.topP,
              maxOutputTokens: request.generationConfig.maxOutputTokens,
            },
          }),
        this.retryConfig,
        (log) => {
          if (!log.success) {
            console.error(
              JSON.stringify(
                createErrorLog(log.timestamp, log.attempt, request.model, log.error ?? 'unknown', log.nextRetryInMs)
              )
            );
          }
        },
        isRetryableError
      )
    );
  }

  async listModels(): Promise<ModelInfo[]> {
    const pager = await withRetry(
      () => this.ai.models.list(),
      { ...this.retryConfig, maxAttempts: 2 },
      undefined,
      isRetryableError
    );

    const models: ModelInfo[] = [];
    for await (const model of pager) {
      models.push({
        name: model.name ?? '(unnamed)',
        supportedActions: model.supportedActions ?? [],
      });
    }
    return models;
  }
}

/**
 * Text parts pass through; media becomes base64 inline data
 */
export function toGeminiPart(part: RequestPart): Part {
  if (part.kind === 'text') {
    return { text: part.text };
  }
  return {
    inlineData: {
      mimeType: part.mimeType,
      data: Buffer.from(part.bytes).toString('base64'),
    },
  };
}

/**
 * One client per API key, all sharing a single circuit breaker
 */
export function createGeminiClientFactory(options: GeminiClientOptions = {}): ModelClientFactory {
  const circuitBreaker = options.circuitBreaker ?? new CircuitBreaker(5, 60000);
  let cached: { apiKey: string; client: GeminiApiClient } | null = null;

  return (apiKey: string) => {
    if (!cached || cached.apiKey !== apiKey) {
      cached = { apiKey, client: new GeminiApiClient(apiKey, { ...options, circuitBreaker }) };
    }
    return cached.client;
  };
}
