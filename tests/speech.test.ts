/**
 * Tests for speech playback and WAV wrapping
 */

import {
  SpeechService,
  resolveSpeechCapability,
  NOT_PROVISIONED_NOTICE,
  NO_REPLY_NOTICE,
  SYNTHESIS_FAILED_NOTICE,
} from '../src/application/services/SpeechService.js';
import { ISpeechSynthesizer } from '../src/core/interfaces/ISpeechSynthesizer.js';
import { ChatMessage } from '../src/core/entities/Message.js';
import { SynthesisUnavailable } from '../src/core/errors.js';
import { pcmToWav, parsePcmRate, GEMINI_TTS_PCM } from '../src/utils/wav.js';

const reply: ChatMessage = { role: 'assistant', content: 'Hello there', timestamp: '2024-01-02 03:04:05' };

function synthesizer(synthesize: ISpeechSynthesizer['synthesize']): ISpeechSynthesizer {
  return { synthesize };
}

describe('SpeechService', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should return audio from the synthesizer', async () => {
    const audio = { mimeType: 'audio/wav', bytes: new Uint8Array([1, 2, 3]) };
    const synthesize = jest.fn().mockResolvedValue(audio);
    const service = new SpeechService(synthesizer(synthesize));

    await expect(service.speak(reply)).resolves.toEqual({ kind: 'audio', audio });
    expect(synthesize).toHaveBeenCalledWith('Hello there');
  });

  it('should report when speech is not provisioned', async () => {
    const service = new SpeechService(null);
    const result = await service.speak(reply);

    expect(service.available).toBe(false);
    expect(result.kind).toBe('notice');
    if (result.kind === 'notice') {
      expect(result.notice).toBe(NOT_PROVISIONED_NOTICE);
      expect(result.error).toBeInstanceOf(SynthesisUnavailable);
    }
  });

  it('should not synthesize when there is no reply', async () => {
    const synthesize = jest.fn();
    const service = new SpeechService(synthesizer(synthesize));

    await expect(service.speak(undefined)).resolves.toEqual({ kind: 'notice', notice: NO_REPLY_NOTICE });
    await expect(service.speak({ ...reply, content: '  ' })).resolves.toEqual({
      kind: 'notice',
      notice: NO_REPLY_NOTICE,
    });
    expect(synthesize).not.toHaveBeenCalled();
  });

  it('should turn a missing result into a notice', async () => {
    const service = new SpeechService(synthesizer(jest.fn().mockResolvedValue(null)));
    const result = await service.speak(reply);

    expect(result).toMatchObject({ kind: 'notice', notice: SYNTHESIS_FAILED_NOTICE });
  });

  it('should never throw when the synthesizer does', async () => {
    const service = new SpeechService(synthesizer(jest.fn().mockRejectedValue(new Error('engine crashed'))));
    const result = await service.speak(reply);

    expect(result).toMatchObject({ kind: 'notice', notice: SYNTHESIS_FAILED_NOTICE });
  });

  it('should only build a synthesizer when speech is enabled', () => {
    const create = jest.fn(() => synthesizer(jest.fn()));

    expect(resolveSpeechCapability(false, create).available).toBe(false);
    expect(create).not.toHaveBeenCalled();
    expect(resolveSpeechCapability(true, create).available).toBe(true);
    expect(create).toHaveBeenCalledTimes(1);
  });
});

describe('pcmToWav', () => {
  it('should prefix the samples with a 44-byte header', () => {
    const wav = pcmToWav(new Uint8Array([1, 2, 3, 4]));

    expect(wav).toHaveLength(48);
    expect(wav.toString('ascii', 0, 4)).toBe('RIFF');
    expect(wav.readUInt32LE(4)).toBe(40);
    expect(wav.toString('ascii', 8, 12)).toBe('WAVE');
    expect(wav.toString('ascii', 12, 16)).toBe('fmt ');
    expect(wav.readUInt32LE(16)).toBe(16);
    expect(wav.readUInt16LE(20)).toBe(1);
    expect(wav.readUInt16LE(22)).toBe(1);
    expect(wav.readUInt32LE(24)).toBe(24000);
    expect(wav.readUInt32LE(28)).toBe(48000);
    expect(wav.readUInt16LE(32)).toBe(2);
    expect(wav.readUInt16LE(34)).toBe(16);
    expect(wav.toString('ascii', 36, 40)).toBe('data');
    expect(wav.readUInt32LE(40)).toBe(4);
    expect(Array.from(wav.subarray(44))).toEqual([1, 2, 3, 4]);
  });

  it('should honour a custom format', () => {
    const wav = pcmToWav(new Uint8Array(8), { ...GEMINI_TTS_PCM, sampleRate: 16000, channels: 2 });

    expect(wav.readUInt16LE(22)).toBe(2);
    expect(wav.readUInt32LE(24)).toBe(16000);
    expect(wav.readUInt32LE(28)).toBe(64000);
    expect(wav.readUInt16LE(32)).toBe(4);
  });
});

describe('parsePcmRate', () => {
  it('should read the rate parameter', () => {
    expect(parsePcmRate('audio/L16;codec=pcm;rate=16000')).toBe(16000);
  });

  it('should return undefined without one', () => {
    expect(parsePcmRate('audio/L16')).toBeUndefined();
    expect(parsePcmRate(undefined)).toBeUndefined();
  });
});
