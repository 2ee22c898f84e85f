/**
 * Interface for text-to-speech synthesis
 */
export interface SynthesizedAudio {
  mimeType: string;
  bytes: Uint8Array;
}

export interface ISpeechSynthesizer {
  /**
   * Returns null on any synthesis failure
   */
  synthesize(text: string): Promise<SynthesizedAudio | null>;
}
