import { ISpeechSynthesizer, SynthesizedAudio } from '../../core/interfaces/ISpeechSynthesizer.js';
import { ChatMessage } from '../../core/entities/Message.js';
import { SynthesisUnavailable } from '../../core/errors.js';

export type SpeakResult =
  | { kind: 'audio'; audio: SynthesizedAudio }
  | { kind: 'notice'; notice: string; error?: SynthesisUnavailable };

export const NOT_PROVISIONED_NOTICE = 'Speech synthesis is not enabled.';
export const SYNTHESIS_FAILED_NOTICE = 'Could not synthesize speech (speech synthesis unavailable or failed).';
export const NO_REPLY_NOTICE = 'There is no assistant reply to read yet.';

/**
 * Best-effort speech for assistant replies. Never throws; every failure
 * becomes a notice.
 */
export class SpeechService {
  constructor(private synthesizer: ISpeechSynthesizer | null) {}

  get available(): boolean {
    return this.synthesizer !== null;
  }

  async speak(message: ChatMessage | undefined): Promise<SpeakResult> {
    if (!this.synthesizer) {
      return {
        kind: 'notice',
        notice: NOT_PROVISIONED_NOTICE,
        error: new SynthesisUnavailable(NOT_PROVISIONED_NOTICE),
      };
    }

    if (!message || !message.content.trim()) {
      return { kind: 'notice', notice: NO_REPLY_NOTICE };
    }

    let audio: SynthesizedAudio | null;
    try {
      audio = await this.synthesizer.synthesize(message.content);
    } catch (error) {
      console.error('[Speech] Synthesizer threw:', error instanceof Error ? error.message : error);
      audio = null;
    }

    if (!audio) {
      return {
        kind: 'notice',
        notice: SYNTHESIS_FAILED_NOTICE,
        error: new SynthesisUnavailable(SYNTHESIS_FAILED_NOTICE),
      };
    }

    return { kind: 'audio', audio };
  }
}

/**
 * Decide once at startup whether speech is available
 */
export function resolveSpeechCapability(
  enabled: boolean,
  createSynthesizer: () => ISpeechSynthesizer
): SpeechService {
  return new SpeechService(enabled ? createSynthesizer() : null);
}
