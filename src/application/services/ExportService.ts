import { ChatMessage, ExportedMessage } from '../../core/entities/Message.js';

export const TEXT_EXPORT = { fileName: 'chat_history.txt', mimeType: 'text/plain' } as const;
export const JSON_EXPORT = { fileName: 'chat_history.json', mimeType: 'application/json' } as const;

/**
 * One line per message: [timestamp] ROLE: content
 */
export function toPlainText(messages: readonly ChatMessage[]): string {
  return messages
    .map((m) => `[${m.timestamp}] ${m.role.toUpperCase()}: ${m.content}`)
    .join('\n');
}

/**
 * Pretty-printed array of { role, content, time }. Non-ASCII stays literal.
 */
export function toJSON(messages: readonly ChatMessage[]): string {
  const exported: ExportedMessage[] = messages.map((m) => ({
    role: m.role,
    content: m.content,
    time: m.timestamp,
  }));
  return JSON.stringify(exported, null, 2);
}
