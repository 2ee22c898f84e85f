import { GenerationConfig } from './entities/Model.js';

/**
 * Generation parameters sent with every chat request
 */
export const GENERATION_CONFIG: Readonly<GenerationConfig> = {
  temperature: 0.9,
  topP: 0.95,
  maxOutputTokens: 512,
};

/**
 * Sent in place of the user text when the text is empty
 */
export const FALLBACK_GREETING = 'Say hello!';

export const EMPTY_SEND_WARNING = 'Type a message or attach media before sending.';

/**
 * Environment variable holding the Gemini API key. The key is read at call
 * time and never stored in Config.
 */
export const API_KEY_ENV = 'GOOGLE_API_KEY';
