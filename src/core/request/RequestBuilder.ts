import { Attachment } from '../entities/Attachment.js';
import { BuiltRequest, ModelVariant, RequestPart } from '../entities/Model.js';
import { FALLBACK_GREETING } from '../constants.js';

export interface RequestInput {
  text: string;
  images: readonly Attachment[];
  audio?: Attachment | null;
}

/**
 * Multimodal when any media is attached, text-only otherwise
 */
export function selectVariant(input: RequestInput): ModelVariant {
  return input.images.length > 0 || input.audio != null ? 'multimodal' : 'text';
}

/**
 * Convert the current input into ordered request parts:
 * the text as typed (or the fallback greeting when empty), then images, then audio.
 * Pure: no I/O, and the parts list is never empty.
 */
export function buildRequest(input: RequestInput): BuiltRequest {
  const parts: RequestPart[] = [
    { kind: 'text', text: input.text.length > 0 ? input.text : FALLBACK_GREETING },
  ];

  for (const image of input.images) {
    parts.push({ kind: 'media', mimeType: image.mimeType, bytes: image.bytes });
  }

  if (input.audio) {
    parts.push({ kind: 'media', mimeType: input.audio.mimeType, bytes: input.audio.bytes });
  }

  return {
    variant: selectVariant(input),
    parts,
  };
}
