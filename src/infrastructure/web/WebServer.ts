import express, { Express, NextFunction, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import cors from 'cors';
import path from 'path';
import { z } from 'zod';
import type { SessionController, SendOutcome, SessionEvent } from '../../application/services/SessionController.js';
import { JSON_EXPORT, TEXT_EXPORT } from '../../application/services/ExportService.js';
import { Attachment } from '../../core/entities/Attachment.js';
import { ChatError, ValidationError } from '../../core/errors.js';
import { CircuitStats, summarizeCircuit } from '../../utils/retry.js';

const PUBLIC_DIR = path.join(__dirname, '../../../public');

const AttachmentSchema = z.object({
  mimeType: z.string().optional(),
  data: z.string().min(1, 'Attachment data must not be empty'),
});

const SendMessageSchema = z.object({
  text: z.string().default(''),
  // The page sends its prompt field along so an unsaved edit applies to this send
  prompt: z.string().optional(),
  images: z.array(AttachmentSchema).max(16).default([]),
  audio: AttachmentSchema.nullish(),
});

const SelectPersonaSchema = z.object({
  name: z.string().min(1),
});

const SetPromptSchema = z.object({
  prompt: z.string(),
});

export type AttachmentPayload = z.infer<typeof AttachmentSchema>;

// Browsers report files of unknown type this way; such attachments get the per-kind default
const UNKNOWN_MIME_TYPE = 'application/octet-stream';

function knownMimeType(mimeType: string | undefined): string {
  return mimeType && mimeType !== UNKNOWN_MIME_TYPE ? mimeType : '';
}

/**
 * Accepts plain base64 or a data URL; a data URL supplies the mime type.
 * An unknown type comes back empty.
 */
export function decodeAttachment(payload: AttachmentPayload): Attachment {
  const match = payload.data.match(/^data:(.*?);base64,(.*)$/s);
  const mimeType = knownMimeType(payload.mimeType) || knownMimeType(match ? match[1] : undefined);
  const base64 = match ? match[2] : payload.data;
  return { mimeType, bytes: Buffer.from(base64, 'base64') };
}

/**
 * HTTP status for a send outcome
 */
export function statusForOutcome(outcome: SendOutcome): number {
  if (outcome.status !== 'rejected') return 200;
  return outcome.error.reason === 'busy' ? 409 : 400;
}

function httpStatusOf(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return 500;
}

export interface WebServerHealth {
  apiKeyConfigured: () => boolean;
  circuitStats: () => CircuitStats;
}

export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Set<WebSocket> = new Set();
  private unsubscribe: (() => void) | null = null;

  constructor(
    private controller: SessionController,
    private health: WebServerHealth,
    private port: number = 8501,
    private debugLog: (message: string) => void = () => undefined
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandler();
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    // Attachments travel as base64 inside JSON
    this.app.use(express.json({ limit: '25mb' }));
    this.app.use(express.static(PUBLIC_DIR));
  }

  private setupRoutes(): void {
    this.app.get('/', (req: Request, res: Response) => {
      res.sendFile(path.join(PUBLIC_DIR, 'index.html'));
    });

    // API: Current session state
    this.app.get('/api/session', (req: Request, res: Response) => {
      res.json({ success: true, data: this.controller.snapshot() });
    });

    // API: Select a persona (resets the active prompt to its default)
    this.app.post('/api/personas/select', (req: Request, res: Response) => {
      const parsed = SelectPersonaSchema.safeParse(req.body);
      if (!parsed.success) {
        this.badRequest(res, parsed.error);
        return;
      }
      try {
        const prompt = this.controller.selectPersona(parsed.data.name);
        res.json({ success: true, data: { persona: parsed.data.name, prompt } });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    // API: Override the active system prompt
    this.app.put('/api/prompt', (req: Request, res: Response) => {
      const parsed = SetPromptSchema.safeParse(req.body);
      if (!parsed.success) {
        this.badRequest(res, parsed.error);
        return;
      }
      this.controller.setActivePrompt(parsed.data.prompt);
      res.json({ success: true, data: { prompt: parsed.data.prompt } });
    });

    // API: Send a message
    this.app.post('/api/messages', async (req: Request, res: Response) => {
      const parsed = SendMessageSchema.safeParse(req.body);
      if (!parsed.success) {
        this.badRequest(res, parsed.error);
        return;
      }

      try {
        const prompt = parsed.data.prompt;
        const idle = this.controller.getState() === 'idle';
        if (prompt !== undefined && idle && prompt !== this.controller.snapshot().activePrompt) {
          this.controller.setActivePrompt(prompt);
        }

        const outcome = await this.controller.send({
          text: parsed.data.text,
          images: parsed.data.images.map(decodeAttachment),
          audio: parsed.data.audio ? decodeAttachment(parsed.data.audio) : null,
        });

        this.debugLog(`[WebServer] Send finished with status ${outcome.status}`);

        if (outcome.status === 'rejected') {
          res.status(statusForOutcome(outcome)).json({
            success: false,
            error: outcome.error.message,
            reason: outcome.error.reason,
          });
          return;
        }

        res.json({
          success: true,
          data: {
            status: outcome.status,
            user: outcome.user,
            assistant: outcome.assistant,
            blocking: outcome.status === 'configuration_error' ? outcome.error.message : undefined,
          },
        });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    // API: Clear chat history
    this.app.delete('/api/messages', (req: Request, res: Response) => {
      try {
        this.controller.clear();
        res.json({ success: true, message: 'History cleared.' });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    // API: Downloads
    this.app.get('/api/export/text', (req: Request, res: Response) => {
      res.attachment(TEXT_EXPORT.fileName);
      res.type(`${TEXT_EXPORT.mimeType}; charset=utf-8`);
      res.send(this.controller.toPlainText());
    });

    this.app.get('/api/export/json', (req: Request, res: Response) => {
      res.attachment(JSON_EXPORT.fileName);
      res.type(`${JSON_EXPORT.mimeType}; charset=utf-8`);
      res.send(this.controller.toJSON());
    });

    // API: Read the last assistant reply aloud
    this.app.post('/api/speech/last', async (req: Request, res: Response) => {
      try {
        const result = await this.controller.speakLastReply();
        if (result.kind === 'audio') {
          res.type(result.audio.mimeType);
          res.send(Buffer.from(result.audio.bytes));
          return;
        }
        res.json({ success: true, data: { notice: result.notice } });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    // API: Health
    this.app.get('/api/health', (req: Request, res: Response) => {
      const snapshot = this.controller.snapshot();
      res.json({
        success: true,
        data: {
          timestamp: new Date().toISOString(),
          status: this.health.apiKeyConfigured() ? 'healthy' : 'degraded',
          apiKeyConfigured: this.health.apiKeyConfigured(),
          circuitBreaker: summarizeCircuit(this.health.circuitStats()),
          speechAvailable: snapshot.speechAvailable,
          sessionState: snapshot.state,
          messageCount: snapshot.messages.length,
        },
      });
    });
  }

  // Body-parser failures (malformed JSON, 413 over the size limit) answer in JSON too
  private setupErrorHandler(): void {
    this.app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        next(error);
        return;
      }
      const status = httpStatusOf(error);
      if (status >= 500) {
        console.error('[WebServer] Unhandled error:', error);
      }
      res.status(status).json({
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    });
  }

  private badRequest(res: Response, error: z.ZodError): void {
    res.status(400).json({
      success: false,
      error: error.errors.map((e) => `${e.path.join('.') || 'body'}: ${e.message}`).join('; '),
    });
  }

  private sendError(res: Response, error: unknown): void {
    if (error instanceof ValidationError) {
      res.status(error.reason === 'busy' ? 409 : 400).json({
        success: false,
        error: error.message,
        reason: error.reason,
      });
      return;
    }

    console.error('[WebServer] Request failed:', error);
    res.status(500).json({
      success: false,
      error: error instanceof Error ? error.message : 'Unknown error',
      code: error instanceof ChatError ? error.code : undefined,
    });
  }

  private setupWebSocket(): void {
    if (!this.httpServer) return;

    this.wss = new WebSocketServer({ server: this.httpServer });

    this.wss.on('connection', (ws: WebSocket) => {
      this.debugLog('[WebServer] New WebSocket client connected');
      this.clients.add(ws);

      ws.on('close', () => {
        this.debugLog('[WebServer] WebSocket client disconnected');
        this.clients.delete(ws);
      });

      ws.on('error', (error) => {
        console.error('[WebServer] WebSocket error:', error);
        this.clients.delete(ws);
      });

      ws.send(JSON.stringify({ type: 'connected', timestamp: new Date().toISOString() }));
    });

    this.unsubscribe = this.controller.onEvent((event) => this.broadcast(event));
  }

  /**
   * Base URL once listening, e.g. http://127.0.0.1:8501
   */
  public url(): string | null {
    const address = this.httpServer?.address();
    return address && typeof address === 'object' ? `http://127.0.0.1:${address.port}` : null;
  }

  public broadcast(event: SessionEvent): void {
    const payload = JSON.stringify({ ...event, timestamp: new Date().toISOString() });
    this.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    });
  }

  public start(): Promise<void> {
    return new Promise((resolve, reject) => {
      try {
        this.httpServer = this.app.listen(this.port, () => {
          console.error(`[WebServer] Chat UI available at ${this.url() ?? `http://localhost:${this.port}`}`);
          this.setupWebSocket();
          resolve();
        });

        this.httpServer.on('error', (error) => {
          console.error('[WebServer] Server error:', error);
          reject(error);
        });
      } catch (error) {
        reject(error);
      }
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve) => {
      this.unsubscribe?.();
      this.unsubscribe = null;

      this.clients.forEach((client) => {
        client.close();
      });
      this.clients.clear();

      if (this.wss) {
        this.wss.close(() => {
          this.debugLog('[WebServer] WebSocket server closed');
        });
        this.wss = null;
      }

      if (this.httpServer) {
        this.httpServer.closeIdleConnections();
        this.httpServer.close(() => {
          console.error('[WebServer] HTTP server closed');
          resolve();
        });
        this.httpServer = null;
      } else {
        resolve();
      }
    });
  }

  public isRunning(): boolean {
    return this.httpServer !== null;
  }
}
