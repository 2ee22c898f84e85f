import { IMessageStore } from '../../core/interfaces/IMessageStore.js';
import { ChatMessage, MessageRole } from '../../core/entities/Message.js';

/**
 * In-memory implementation of the message store.
 * History lives for the process lifetime only.
 */
export class InMemoryMessageStore implements IMessageStore {
  private messages: ChatMessage[] = [];

  append(message: ChatMessage): void {
    if (!message.role) {
      throw new Error('Message role must not be empty');
    }
    this.messages.push(Object.freeze({ ...message }));
  }

  clear(): void {
    this.messages = [];
  }

  all(): readonly ChatMessage[] {
    return this.messages.slice();
  }

  size(): number {
    return this.messages.length;
  }

  lastByRole(role: MessageRole): ChatMessage | undefined {
    for (let i = this.messages.length - 1; i >= 0; i--) {
      if (this.messages[i].role === role) {
        return this.messages[i];
      }
    }
    return undefined;
  }
}
