import { ModelInfo, ModelRequest, RawModelResponse } from '../entities/Model.js';

/**
 * Interface for a hosted generative model client
 */
export interface IModelClient {
  /**
   * Generate a reply for a fully resolved request
   */
  generate(request: ModelRequest): Promise<RawModelResponse>;

  /**
   * List models visible to the credential
   */
  listModels(): Promise<ModelInfo[]>;
}

/**
 * Creates a client bound to an API key. Called with the key read at call time.
 */
export type ModelClientFactory = (apiKey: string) => IModelClient;
