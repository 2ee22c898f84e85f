import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { SessionController } from '../../application/services/SessionController.js';
import { decodeAttachment } from '../../infrastructure/web/WebServer.js';

const attachmentShape = z.object({
  mimeType: z.string().optional().describe('Media type, e.g. image/png or audio/wav'),
  data: z.string().describe('Base64 bytes or a data URL'),
});

/**
 * Register the send-message tool
 */
export function registerSendMessageTool(
  server: McpServer,
  controller: SessionController,
  debugLog: (message: string) => void
) {
  server.tool(
    'send-message',
    'Send a message (with optional images and one audio clip) to the chat session and get the assistant reply',
    {
      text: z.string().default('').describe('Message text; may be empty when media is attached'),
      images: z.array(attachmentShape).optional().describe('Images to attach'),
      audio: attachmentShape.optional().describe('One audio clip to attach'),
    },
    async ({ text, images, audio }) => {
      try {
        const outcome = await controller.send({
          text,
          images: (images ?? []).map(decodeAttachment),
          audio: audio ? decodeAttachment(audio) : null,
        });

        debugLog(`[send-message] ${outcome.status}`);

        if (outcome.status === 'rejected') {
          return {
            isError: true,
            content: [{ type: 'text', text: `⚠️ ${outcome.error.message}` }],
          };
        }

        return {
          isError: outcome.status === 'configuration_error',
          content: [{ type: 'text', text: outcome.assistant.content }],
        };
      } catch (error) {
        console.error('Error sending message:', error);
        return {
          isError: true,
          content: [
            {
              type: 'text',
              text: `Error sending message: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
        };
      }
    }
  );
}
