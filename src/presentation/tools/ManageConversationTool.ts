import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { SessionController } from '../../application/services/SessionController.js';

/**
 * Register the manage-conversation tool
 */
export function registerManageConversationTool(server: McpServer, controller: SessionController) {
  server.tool(
    'manage-conversation',
    'Manage the chat session - view or clear history, export it, or change the persona / system prompt',
    {
      action: z
        .enum(['view', 'clear', 'export-text', 'export-json', 'select-persona', 'set-prompt'])
        .describe(
          "Action to perform: 'view' history, 'clear' it, 'export-text' / 'export-json', 'select-persona' by name, 'set-prompt' to override the system prompt"
        ),
      value: z
        .string()
        .optional()
        .describe("Persona name for 'select-persona', prompt text for 'set-prompt'"),
    },
    async ({ action, value }) => {
      try {
        if (action === 'view') {
          const snapshot = controller.snapshot();
          if (snapshot.messages.length === 0) {
            return { content: [{ type: 'text', text: 'No conversation history yet.' }] };
          }

          const historyText = snapshot.messages
            .map((msg, idx) => {
              const role = msg.role === 'user' ? '👤 User' : '🤖 Assistant';
              return `${idx + 1}. **${role}** _(${msg.timestamp})_\n${msg.content}\n`;
            })
            .join('\n---\n\n');

          return {
            content: [
              {
                type: 'text',
                text: `# Conversation History\n\n*Persona: ${snapshot.selectedPersona}*\n\n${historyText}`,
              },
            ],
          };
        }

        if (action === 'clear') {
          controller.clear();
          return { content: [{ type: 'text', text: '✓ Conversation history cleared' }] };
        }

        if (action === 'export-text') {
          return { content: [{ type: 'text', text: controller.toPlainText() }] };
        }

        if (action === 'export-json') {
          return { content: [{ type: 'text', text: controller.toJSON() }] };
        }

        if (action === 'select-persona') {
          if (!value) {
            return { isError: true, content: [{ type: 'text', text: 'A persona name is required' }] };
          }
          const prompt = controller.selectPersona(value);
          return { content: [{ type: 'text', text: `✓ Persona "${value}" selected\n\n${prompt}` }] };
        }

        controller.setActivePrompt(value ?? '');
        return { content: [{ type: 'text', text: '✓ System prompt updated' }] };
      } catch (error) {
        console.error('Error managing conversation:', error);
        return {
          isError: true,
          content: [
            {
              type: 'text',
              text: `Error managing conversation: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
        };
      }
    }
  );
}
