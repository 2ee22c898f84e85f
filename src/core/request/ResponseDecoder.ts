import { RawModelResponse } from '../entities/Model.js';

/**
 * Where the reply text was found
 */
export type DecodedReply =
  | { source: 'text'; text: string }
  | { source: 'candidate'; text: string }
  | { source: 'raw'; text: string };

interface DecodeRule {
  source: 'text' | 'candidate';
  extract(response: RawModelResponse): string | undefined;
}

/**
 * Ordered rules; the first one that yields non-empty text wins
 */
const RULES: readonly DecodeRule[] = [
  {
    source: 'text',
    extract: (response) => response.text,
  },
  {
    source: 'candidate',
    extract: (response) => response.candidates?.[0]?.content?.parts?.[0]?.text,
  },
];

export function decodeResponse(response: RawModelResponse): DecodedReply {
  for (const rule of RULES) {
    let text: string | undefined;
    try {
      text = rule.extract(response);
    } catch {
      // SDK accessors can throw on unexpected shapes; try the next rule
      text = undefined;
    }
    if (text) {
      return { source: rule.source, text };
    }
  }

  return { source: 'raw', text: renderRaw(response) };
}

function renderRaw(response: RawModelResponse): string {
  try {
    return JSON.stringify(response) ?? String(response);
  } catch {
    return String(response);
  }
}
