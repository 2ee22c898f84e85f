/**
 * Tests for the HTTP API, served in-process on an ephemeral port
 */

import { WebServer } from '../src/infrastructure/web/WebServer.js';
import { SessionController } from '../src/application/services/SessionController.js';
import { GatewayResult, ReplyGateway } from '../src/application/services/ApiGateway.js';
import { SpeechService, NOT_PROVISIONED_NOTICE } from '../src/application/services/SpeechService.js';
import { ChatSession } from '../src/application/session/ChatSession.js';
import { BuiltRequest } from '../src/core/entities/Model.js';
import { CircuitBreaker } from '../src/utils/retry.js';

const NOW = new Date(2024, 0, 2, 3, 4, 5);
const STAMP = '2024-01-02 03:04:05';

interface Harness {
  server: WebServer;
  controller: SessionController;
  generate: jest.Mock<Promise<GatewayResult>, [string, BuiltRequest]>;
  base: string;
}

async function startServer(speech?: SpeechService): Promise<Harness> {
  const generate = jest
    .fn<Promise<GatewayResult>, [string, BuiltRequest]>()
    .mockResolvedValue({ ok: true, text: 'Hi!', model: 'text-model', source: 'text' });
  const gateway: ReplyGateway = { generate };
  const controller = new SessionController(new ChatSession(), gateway, speech, () => NOW);
  const breaker = new CircuitBreaker();
  const server = new WebServer(controller, { apiKeyConfigured: () => true, circuitStats: () => breaker.getStats() }, 0);

  await server.start();
  const base = server.url();
  if (!base) {
    throw new Error('server is not listening');
  }
  return { server, controller, generate, base };
}

function postJson(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

describe('WebServer HTTP API', () => {
  let harness: Harness;

  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await harness.server.stop();
    jest.restoreAllMocks();
  });

  describe('POST /api/messages', () => {
    it('should answer 400 for an empty send', async () => {
      harness = await startServer();

      const res = await postJson(`${harness.base}/api/messages`, { text: '' });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        success: false,
        error: 'Type a message or attach media before sending.',
        reason: 'empty_input',
      });
      expect(harness.generate).not.toHaveBeenCalled();
    });

    it('should answer 400 for a malformed body', async () => {
      harness = await startServer();

      const res = await postJson(`${harness.base}/api/messages`, { text: 'Hi', images: 'not-a-list' });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ success: false, error: 'images: Expected array, received string' });
    });

    it('should answer 200 with the appended pair', async () => {
      harness = await startServer();

      const res = await postJson(`${harness.base}/api/messages`, { text: 'Hello' });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        success: true,
        data: {
          status: 'replied',
          user: { role: 'user', content: 'Hello', timestamp: STAMP },
          assistant: { role: 'assistant', content: 'Hi!', timestamp: STAMP },
        },
      });
    });

    it('should apply a prompt sent along with the message', async () => {
      harness = await startServer();

      const res = await postJson(`${harness.base}/api/messages`, { text: 'Hello', prompt: 'Only answer in haiku.' });

      expect(res.status).toBe(200);
      expect(harness.generate.mock.calls[0][0]).toBe('Only answer in haiku.');
      expect(harness.controller.snapshot().activePrompt).toBe('Only answer in haiku.');
    });

    it('should answer malformed JSON with a JSON error', async () => {
      harness = await startServer();

      const res = await fetch(`${harness.base}/api/messages`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"text": ',
      });

      expect(res.status).toBe(400);
      expect(res.headers.get('content-type')).toBe('application/json; charset=utf-8');
      expect(await res.json()).toEqual({ success: false, error: expect.any(String) });
      expect(harness.generate).not.toHaveBeenCalled();
    });

    it('should give untyped uploads the default image mime type', async () => {
      harness = await startServer();

      const res = await postJson(`${harness.base}/api/messages`, {
        text: 'what is this',
        images: [{ mimeType: '', data: 'data:application/octet-stream;base64,aGk=' }],
      });

      expect(res.status).toBe(200);
      const request = harness.generate.mock.calls[0][1];
      expect(request.variant).toBe('multimodal');
      expect(request.parts[1]).toEqual({ kind: 'media', mimeType: 'image/png', bytes: Buffer.from('hi') });
    });

    it('should forward a microphone recording as the audio part', async () => {
      harness = await startServer();

      const res = await postJson(`${harness.base}/api/messages`, {
        text: 'Transcribe this',
        audio: { mimeType: 'audio/ogg', data: 'data:audio/ogg;base64,aGk=' },
      });

      expect(res.status).toBe(200);
      expect(harness.generate.mock.calls[0][1].parts[1]).toEqual({
        kind: 'media',
        mimeType: 'audio/ogg',
        bytes: Buffer.from('hi'),
      });
      expect(harness.controller.messages()[0].content).toBe('Transcribe this\n\n🎙️ audio attached');
    });

    it('should give untyped audio the default audio mime type', async () => {
      harness = await startServer();

      await postJson(`${harness.base}/api/messages`, {
        text: '',
        audio: { data: 'data:application/octet-stream;base64,aGk=' },
      });

      expect(harness.generate.mock.calls[0][1].parts).toEqual([
        { kind: 'text', text: 'Say hello!' },
        { kind: 'media', mimeType: 'audio/wav', bytes: Buffer.from('hi') },
      ]);
    });
  });

  describe('while a reply is pending', () => {
    it('should answer 409 to sends and clears', async () => {
      harness = await startServer();
      let resolveReply: (result: GatewayResult) => void = () => undefined;
      harness.generate.mockReturnValueOnce(
        new Promise<GatewayResult>((resolve) => {
          resolveReply = resolve;
        })
      );
      const pending = harness.controller.send({ text: 'First' });

      const send = await postJson(`${harness.base}/api/messages`, { text: 'Second' });
      expect(send.status).toBe(409);
      expect(await send.json()).toMatchObject({ success: false, reason: 'busy' });

      const clear = await fetch(`${harness.base}/api/messages`, { method: 'DELETE' });
      expect(clear.status).toBe(409);
      expect(await clear.json()).toEqual({
        success: false,
        error: 'Cannot clear history while a reply is pending.',
        reason: 'busy',
      });

      resolveReply({ ok: true, text: 'Done', model: 'text-model', source: 'text' });
      await pending;
      expect(harness.controller.messages().map((m) => m.content)).toEqual(['First', 'Done']);
    });
  });

  describe('DELETE /api/messages', () => {
    it('should clear the history when idle', async () => {
      harness = await startServer();
      await harness.controller.send({ text: 'Hello' });

      const res = await fetch(`${harness.base}/api/messages`, { method: 'DELETE' });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ success: true, message: 'History cleared.' });
      expect(harness.controller.messages()).toEqual([]);
    });
  });

  describe('exports', () => {
    it('should download the text export', async () => {
      harness = await startServer();
      await harness.controller.send({ text: 'Hello' });

      const res = await fetch(`${harness.base}/api/export/text`);

      expect(res.headers.get('content-type')).toBe('text/plain; charset=utf-8');
      expect(res.headers.get('content-disposition')).toBe('attachment; filename="chat_history.txt"');
      expect(await res.text()).toBe(`[${STAMP}] USER: Hello\n[${STAMP}] ASSISTANT: Hi!`);
    });

    it('should download the JSON export', async () => {
      harness = await startServer();
      await harness.controller.send({ text: 'Hello' });

      const res = await fetch(`${harness.base}/api/export/json`);

      expect(res.headers.get('content-type')).toBe('application/json; charset=utf-8');
      expect(res.headers.get('content-disposition')).toBe('attachment; filename="chat_history.json"');
      expect(await res.json()).toEqual([
        { role: 'user', content: 'Hello', time: STAMP },
        { role: 'assistant', content: 'Hi!', time: STAMP },
      ]);
    });

    it('should export an empty history after a clear', async () => {
      harness = await startServer();
      await harness.controller.send({ text: 'Hello' });
      await fetch(`${harness.base}/api/messages`, { method: 'DELETE' });

      expect(await (await fetch(`${harness.base}/api/export/text`)).text()).toBe('');
      expect(await (await fetch(`${harness.base}/api/export/json`)).text()).toBe('[]');
    });
  });

  describe('POST /api/speech/last', () => {
    it('should answer with a notice when speech is not enabled', async () => {
      harness = await startServer();

      const res = await fetch(`${harness.base}/api/speech/last`, { method: 'POST' });

      expect(res.headers.get('content-type')).toBe('application/json; charset=utf-8');
      expect(await res.json()).toEqual({ success: true, data: { notice: NOT_PROVISIONED_NOTICE } });
    });

    it('should answer with audio bytes when synthesis succeeds', async () => {
      const synthesize = jest.fn().mockResolvedValue({ mimeType: 'audio/wav', bytes: new Uint8Array([1, 2, 3]) });
      harness = await startServer(new SpeechService({ synthesize }));
      await harness.controller.send({ text: 'Hello' });

      const res = await fetch(`${harness.base}/api/speech/last`, { method: 'POST' });

      expect(res.headers.get('content-type')).toBe('audio/wav');
      expect(Array.from(new Uint8Array(await res.arrayBuffer()))).toEqual([1, 2, 3]);
      expect(synthesize).toHaveBeenCalledWith('Hi!');
    });
  });

  describe('GET /api/health', () => {
    it('should report the credential, breaker and session', async () => {
      harness = await startServer();

      const res = await fetch(`${harness.base}/api/health`);
      expect(await res.json()).toMatchObject({
        success: true,
        data: {
          status: 'healthy',
          apiKeyConfigured: true,
          circuitBreaker: { state: 'closed', failureCount: 0, lastFailureTime: null, recentTransitions: [] },
          speechAvailable: false,
          sessionState: 'idle',
          messageCount: 0,
        },
      });
    });
  });
});
