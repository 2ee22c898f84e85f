import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Config } from '../config.js';
import { API_KEY_ENV } from '../core/constants.js';
import { ChatSession } from '../application/session/ChatSession.js';
import { ApiGateway } from '../application/services/ApiGateway.js';
import { SessionController } from '../application/services/SessionController.js';
import { resolveSpeechCapability } from '../application/services/SpeechService.js';
import { createGeminiClientFactory } from '../infrastructure/http/GeminiApiClient.js';
import { GeminiSpeechSynthesizer } from '../infrastructure/speech/GeminiSpeechSynthesizer.js';
import { WebServer } from '../infrastructure/web/WebServer.js';
import { CircuitBreaker, DEFAULT_RETRY_CONFIG } from '../utils/retry.js';
import { registerSendMessageTool } from './tools/SendMessageTool.js';
import { registerManageConversationTool } from './tools/ManageConversationTool.js';
import { registerHealthCheckTool } from './tools/HealthCheckTool.js';

/**
 * Wires the chat session to its surfaces: the web UI and, optionally, MCP over stdio
 */
export class ChatServer {
  private session: ChatSession;
  private gateway: ApiGateway;
  private controller: SessionController;
  private circuitBreaker: CircuitBreaker;
  private webServer: WebServer | null = null;
  private mcpServer: McpServer | null = null;
  private debugLog: (message: string) => void;

  constructor(private config: Config) {
    this.debugLog = (message: string) => {
      if (config.server.debug) {
        console.error(`[DEBUG] ${message}`);
      }
    };

    this.circuitBreaker = new CircuitBreaker(5, 60000);
    const retryConfig = {
      ...DEFAULT_RETRY_CONFIG,
      maxAttempts: config.gemini.retryAttempts,
      timeoutMs: config.gemini.timeoutMs,
    };

    this.gateway = new ApiGateway(
      createGeminiClientFactory({ circuitBreaker: this.circuitBreaker, retryConfig }),
      {
        textModel: config.gemini.textModel,
        multimodalModel: config.gemini.multimodalModel,
        debugLog: this.debugLog,
      }
    );

    const speech = resolveSpeechCapability(
      config.speech.enabled,
      () =>
        new GeminiSpeechSynthesizer({
          model: config.speech.model,
          voice: config.speech.voice,
          timeoutMs: config.gemini.timeoutMs,
          apiKey: () => process.env[API_KEY_ENV],
        })
    );

    this.session = new ChatSession();
    this.controller = new SessionController(this.session, this.gateway, speech);
    this.debugLog(`Session ${this.session.id} created`);

    if (config.webUI.enabled) {
      this.webServer = new WebServer(
        this.controller,
        {
          apiKeyConfigured: () => this.gateway.isConfigured(),
          circuitStats: () => this.circuitBreaker.getStats(),
        },
        config.webUI.port,
        this.debugLog
      );
    }

    if (config.mcp.enabled) {
      this.mcpServer = new McpServer({
        name: config.server.name,
        version: config.server.version,
      });
      this.registerTools(this.mcpServer);
    }
  }

  private registerTools(server: McpServer) {
    registerSendMessageTool(server, this.controller, this.debugLog);
    registerManageConversationTool(server, this.controller);
    registerHealthCheckTool(server, this.controller, this.gateway, () => this.circuitBreaker.getStats());
  }

  async start() {
    if (this.webServer) {
      await this.webServer.start();
    }

    if (this.mcpServer) {
      const transport = new StdioServerTransport();

      process.stdin.on('error', (error) => {
        console.error('⚠️ stdin error (non-fatal):', error.message);
      });

      process.stdin.on('end', () => {
        console.error('⚠️ stdin ended - client may have disconnected');
      });

      await this.mcpServer.connect(transport);
      console.error('\n✅ Chat MCP tools available on stdio');
    }

    if (!this.webServer && !this.mcpServer) {
      console.error('⚠️ Both the web UI and MCP are disabled; nothing to serve');
    }
  }

  async shutdown() {
    console.error('\n👋 Shutting down gracefully...');

    if (this.webServer && this.webServer.isRunning()) {
      await this.webServer.stop();
    }

    if (this.mcpServer) {
      await this.mcpServer.close();
    }
  }
}
