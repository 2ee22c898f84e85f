import { ChatMessage, MessageRole } from '../entities/Message.js';

/**
 * Interface for the ordered chat history of one session
 */
export interface IMessageStore {
  append(message: ChatMessage): void;

  clear(): void;

  /**
   * Ordered, read-only view for rendering and export
   */
  all(): readonly ChatMessage[];

  size(): number;

  lastByRole(role: MessageRole): ChatMessage | undefined;
}
