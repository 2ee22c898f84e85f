/**
 * Error taxonomy for the chat session
 */
export type ChatErrorCode =
  | 'CONFIGURATION'
  | 'PROVIDER'
  | 'SYNTHESIS_UNAVAILABLE'
  | 'VALIDATION';

export abstract class ChatError extends Error {
  abstract readonly code: ChatErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Missing or unusable configuration, e.g. no API key. Not retried.
 */
export class ConfigurationError extends ChatError {
  readonly code = 'CONFIGURATION' as const;
}

/**
 * Any failure raised by the model provider call
 */
export class ProviderError extends ChatError {
  readonly code = 'PROVIDER' as const;

  constructor(message: string, readonly model: string, options?: { cause?: unknown }) {
    super(message, options);
  }

  /** Text recorded as the assistant turn when the call fails */
  toReply(): string {
    return `Error: ${this.message}`;
  }
}

/**
 * Speech synthesis not provisioned, or it failed
 */
export class SynthesisUnavailable extends ChatError {
  readonly code = 'SYNTHESIS_UNAVAILABLE' as const;
}

export type ValidationReason = 'empty_input' | 'busy' | 'unknown_persona';

export class ValidationError extends ChatError {
  readonly code = 'VALIDATION' as const;

  constructor(message: string, readonly reason: ValidationReason) {
    super(message);
  }
}

/**
 * Message of an unknown thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
