import { ModelClientFactory } from '../../core/interfaces/IModelClient.js';
import { BuiltRequest, GenerationConfig, ModelInfo } from '../../core/entities/Model.js';
import { API_KEY_ENV, GENERATION_CONFIG } from '../../core/constants.js';
import { ConfigurationError, ProviderError, describeError } from '../../core/errors.js';
import { decodeResponse, DecodedReply } from '../../core/request/ResponseDecoder.js';

export type GatewayResult =
  | { ok: true; text: string; model: string; source: DecodedReply['source'] }
  | { ok: false; text: string; model: string; error: ProviderError };

/**
 * Anything that turns a built request into reply text
 */
export interface ReplyGateway {
  generate(systemPrompt: string, request: BuiltRequest): Promise<GatewayResult>;
}

export interface ApiGatewayOptions {
  textModel: string;
  multimodalModel: string;
  generationConfig?: GenerationConfig;
  apiKey?: () => string | undefined;
  debugLog?: (message: string) => void;
}

/**
 * Sends built requests to the model provider.
 * A missing API key throws ConfigurationError before any call; provider
 * failures never throw and come back as an "Error: ..." reply.
 */
export class ApiGateway implements ReplyGateway {
  private readonly readApiKey: () => string | undefined;
  private readonly generationConfig: GenerationConfig;

  constructor(
    private clientFactory: ModelClientFactory,
    private options: ApiGatewayOptions
  ) {
    this.readApiKey = options.apiKey ?? (() => process.env[API_KEY_ENV]);
    this.generationConfig = options.generationConfig ?? { ...GENERATION_CONFIG };
  }

  async generate(systemPrompt: string, request: BuiltRequest): Promise<GatewayResult> {
    const apiKey = this.requireApiKey();
    const model = this.modelFor(request);

    this.options.debugLog?.(`Generating with ${model} (${request.parts.length} part(s))`);

    try {
      const response = await this.clientFactory(apiKey).generate({
        model,
        systemPrompt,
        generationConfig: this.generationConfig,
        parts: request.parts,
      });
      const decoded = decodeResponse(response);
      this.options.debugLog?.(`Reply decoded from ${decoded.source}`);
      return { ok: true, text: decoded.text, model, source: decoded.source };
    } catch (error) {
      const providerError = new ProviderError(describeError(error), model, { cause: error });

      console.error(
        JSON.stringify({
          timestamp: new Date().toISOString(),
          model,
          error: providerError.message,
          severity: providerError.message.includes('Circuit breaker is OPEN') ? 'HIGH' : 'MEDIUM',
        })
      );

      return { ok: false, text: providerError.toReply(), model, error: providerError };
    }
  }

  async listModels(): Promise<ModelInfo[]> {
    return this.clientFactory(this.requireApiKey()).listModels();
  }

  modelFor(request: BuiltRequest): string {
    return request.variant === 'multimodal' ? this.options.multimodalModel : this.options.textModel;
  }

  isConfigured(): boolean {
    return Boolean(this.readApiKey());
  }

  private requireApiKey(): string {
    const apiKey = this.readApiKey();
    if (!apiKey) {
      throw new ConfigurationError(`Missing ${API_KEY_ENV} environment variable. Set it in your terminal.`);
    }
    return apiKey;
  }
}
