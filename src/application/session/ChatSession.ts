import { randomUUID } from 'crypto';
import { IMessageStore } from '../../core/interfaces/IMessageStore.js';
import { PersonaConfig } from '../../core/personas/PersonaConfig.js';
import { InMemoryMessageStore } from '../../infrastructure/memory/InMemoryMessageStore.js';

/**
 * One chat session: its history and its persona settings.
 * Lives in memory until cleared or the process exits.
 */
export class ChatSession {
  readonly id: string;
  readonly createdAt: Date;

  constructor(
    readonly store: IMessageStore = new InMemoryMessageStore(),
    readonly personas: PersonaConfig = new PersonaConfig(),
    id: string = randomUUID()
  ) {
    this.id = id;
    this.createdAt = new Date();
  }
}
