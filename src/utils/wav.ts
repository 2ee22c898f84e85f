export interface PcmFormat {
  sampleRate: number;
  channels: number;
  bitsPerSample: number;
}

// Gemini TTS returns 16-bit little-endian mono PCM at 24 kHz
export const GEMINI_TTS_PCM: PcmFormat = {
  sampleRate: 24000,
  channels: 1,
  bitsPerSample: 16,
};

/**
 * Prefix raw PCM samples with a 44-byte RIFF/WAVE header
 */
export function pcmToWav(pcm: Uint8Array, format: PcmFormat = GEMINI_TTS_PCM): Buffer {
  const blockAlign = (format.channels * format.bitsPerSample) / 8;
  const byteRate = format.sampleRate * blockAlign;
  const header = Buffer.alloc(44);

  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16); // fmt chunk size
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(format.channels, 22);
  header.writeUInt32LE(format.sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(format.bitsPerSample, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(pcm.length, 40);

  return Buffer.concat([header, pcm]);
}

/**
 * Sample rate from a mime type such as "audio/L16;codec=pcm;rate=24000"
 */
export function parsePcmRate(mimeType: string | undefined): number | undefined {
  const match = mimeType?.match(/rate=(\d+)/);
  return match ? parseInt(match[1], 10) : undefined;
}
