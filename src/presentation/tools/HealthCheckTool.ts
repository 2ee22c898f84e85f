import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { SessionController } from '../../application/services/SessionController.js';
import { ApiGateway } from '../../application/services/ApiGateway.js';
import { CircuitStats, summarizeCircuit } from '../../utils/retry.js';

/**
 * Register the health-check tool
 */
export function registerHealthCheckTool(
  server: McpServer,
  controller: SessionController,
  gateway: ApiGateway,
  circuitStats: () => CircuitStats
) {
  server.tool(
    'health-check',
    'Check the chat service: API key presence, model reachability, circuit breaker state and speech availability',
    {},
    async () => {
      const snapshot = controller.snapshot();
      const health = {
        timestamp: new Date().toISOString(),
        status: 'healthy',
        components: {
          credential: { configured: gateway.isConfigured() },
          gemini: { status: 'unknown', message: '' },
          circuitBreaker: summarizeCircuit(circuitStats()),
          session: { state: snapshot.state, messages: snapshot.messages.length },
          speech: { available: snapshot.speechAvailable },
        },
      };

      try {
        const models = await gateway.listModels();
        health.components.gemini = {
          status: 'healthy',
          message: `Gemini reachable with ${models.length} models available`,
        };
      } catch (error) {
        health.components.gemini = {
          status: 'error',
          message: error instanceof Error ? error.message : String(error),
        };
        health.status = 'degraded';
      }

      return {
        content: [
          {
            type: 'text',
            text: `# System Health Check\n\n\`\`\`json\n${JSON.stringify(health, null, 2)}\n\`\`\``,
          },
        ],
      };
    }
  );
}
