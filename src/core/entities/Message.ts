/**
 * Chat message domain entity
 */
export type MessageRole = 'user' | 'assistant';

export interface ChatMessage {
  readonly role: MessageRole;
  readonly content: string;
  readonly timestamp: string; // local time, YYYY-MM-DD HH:mm:ss
}

/**
 * Shape of one entry in the JSON export
 */
export interface ExportedMessage {
  role: MessageRole;
  content: string;
  time: string;
}
