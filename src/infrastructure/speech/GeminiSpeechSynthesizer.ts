import { GoogleGenAI, Modality } from '@google/genai';
import { ISpeechSynthesizer, SynthesizedAudio } from '../../core/interfaces/ISpeechSynthesizer.js';
import { GEMINI_TTS_PCM, parsePcmRate, pcmToWav } from '../../utils/wav.js';
import { withTimeout } from '../../utils/retry.js';

export interface GeminiSpeechOptions {
  model: string;
  voice: string;
  timeoutMs: number;
  apiKey: () => string | undefined;
}

/**
 * Text-to-speech through a Gemini TTS model. Output is wrapped as WAV so
 * browsers can play it directly.
 */
export class GeminiSpeechSynthesizer implements ISpeechSynthesizer {
  constructor(private options: GeminiSpeechOptions) {}

  async synthesize(text: string): Promise<SynthesizedAudio | null> {
    const apiKey = this.options.apiKey();
    if (!apiKey) {
      console.error('[Speech] API key missing, cannot synthesize');
      return null;
    }

    try {
      const ai = new GoogleGenAI({ apiKey });
      const response = await withTimeout(
        ai.models.generateContent({
          model: this.options.model,
          contents: [{ role: 'user', parts: [{ text }] }],
          config: {
            responseModalities: [Modality.AUDIO],
            speechConfig: {
              voiceConfig: { prebuiltVoiceConfig: { voiceName: this.options.voice } },
            },
          },
        }),
        this.options.timeoutMs
      );

      const inline = response.candidates?.[0]?.content?.parts?.[0]?.inlineData;
      if (!inline?.data) {
        console.error('[Speech] No audio in synthesis response');
        return null;
      }

      const pcm = Buffer.from(inline.data, 'base64');
      const sampleRate = parsePcmRate(inline.mimeType) ?? GEMINI_TTS_PCM.sampleRate;
      return {
        mimeType: 'audio/wav',
        bytes: pcmToWav(pcm, { ...GEMINI_TTS_PCM, sampleRate }),
      };
    } catch (error) {
      console.error('[Speech] Synthesis failed:', error instanceof Error ? error.message : error);
      return null;
    }
  }
}
