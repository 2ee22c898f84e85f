/**
 * Binary media sent along with a user turn.
 * Never stored in history: only a textual summary is kept.
 */
export interface Attachment {
  mimeType: string;
  bytes: Uint8Array;
}

export const DEFAULT_IMAGE_MIME_TYPE = 'image/png';
export const DEFAULT_AUDIO_MIME_TYPE = 'audio/wav';

/**
 * Everything the user submits in one send
 */
export interface ChatInput {
  text: string;
  images?: Attachment[];
  audio?: Attachment | null;
}
