/**
 * Model request/response domain entities
 */
export type ModelVariant = 'text' | 'multimodal';

export type RequestPart =
  | { kind: 'text'; text: string }
  | { kind: 'media'; mimeType: string; bytes: Uint8Array };

export interface GenerationConfig {
  temperature: number;
  topP: number;
  maxOutputTokens: number;
}

/**
 * Provider-agnostic payload produced by the request builder
 */
export interface BuiltRequest {
  variant: ModelVariant;
  parts: RequestPart[];
}

/**
 * Fully resolved request handed to a model client
 */
export interface ModelRequest {
  model: string;
  systemPrompt: string;
  generationConfig: GenerationConfig;
  parts: RequestPart[];
}

/**
 * The subset of a provider response the decoder looks at.
 * The shape varies by model and mode, so every field is optional.
 */
export interface RawModelResponse {
  readonly text?: string;
  readonly candidates?: ReadonlyArray<{
    readonly content?: {
      readonly parts?: ReadonlyArray<{ readonly text?: string }>;
    };
  }>;
}

export interface ModelInfo {
  name: string;
  supportedActions: string[];
}
