import { ChatSession } from '../session/ChatSession.js';
import { ReplyGateway } from './ApiGateway.js';
import { SpeechService, SpeakResult } from './SpeechService.js';
import { toJSON, toPlainText } from './ExportService.js';
import { ChatMessage } from '../../core/entities/Message.js';
import { Persona } from '../../core/entities/Persona.js';
import {
  Attachment,
  ChatInput,
  DEFAULT_AUDIO_MIME_TYPE,
  DEFAULT_IMAGE_MIME_TYPE,
} from '../../core/entities/Attachment.js';
import { EMPTY_SEND_WARNING } from '../../core/constants.js';
import { buildRequest } from '../../core/request/RequestBuilder.js';
import {
  ConfigurationError,
  ProviderError,
  ValidationError,
  describeError,
} from '../../core/errors.js';
import { formatTimestamp } from '../../utils/time.js';

export type SessionState = 'idle' | 'awaiting_response';

export type SendOutcome =
  | { status: 'rejected'; error: ValidationError }
  | { status: 'replied'; user: ChatMessage; assistant: ChatMessage; model: string }
  | { status: 'provider_error'; user: ChatMessage; assistant: ChatMessage; error: ProviderError }
  | { status: 'configuration_error'; user: ChatMessage; assistant: ChatMessage; error: ConfigurationError };

export type SessionEvent =
  | { type: 'message_appended'; message: ChatMessage }
  | { type: 'state_changed'; state: SessionState }
  | { type: 'history_cleared' }
  | { type: 'persona_changed'; persona: string; prompt: string };

export interface SessionSnapshot {
  sessionId: string;
  createdAt: string;
  state: SessionState;
  messages: readonly ChatMessage[];
  personas: Persona[];
  selectedPersona: string;
  activePrompt: string;
  speechAvailable: boolean;
}

/**
 * Human-readable stand-in for the user turn: the raw text plus a note per
 * kind of attachment. Attachment bytes are never stored.
 */
export function composePreview(text: string, imageCount: number, hasAudio: boolean): string {
  let preview = text;
  if (imageCount > 0) {
    preview += `\n\n🖼️ ${imageCount} image(s) attached`;
  }
  if (hasAudio) {
    preview += '\n\n🎙️ audio attached';
  }
  return preview.trim();
}

function withMimeType(attachment: Attachment, fallback: string): Attachment {
  return { mimeType: attachment.mimeType || fallback, bytes: attachment.bytes };
}

/**
 * Chat session state machine: Idle -> AwaitingResponse -> Idle per send.
 * Every accepted send leaves a user turn followed by an assistant turn.
 */
export class SessionController {
  private state: SessionState = 'idle';
  private listeners = new Set<(event: SessionEvent) => void>();

  constructor(
    private session: ChatSession,
    private gateway: ReplyGateway,
    private speech: SpeechService = new SpeechService(null),
    private clock: () => Date = () => new Date()
  ) {}

  getState(): SessionState {
    return this.state;
  }

  onEvent(listener: (event: SessionEvent) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async send(input: ChatInput): Promise<SendOutcome> {
    const images = (input.images ?? []).map((image) => withMimeType(image, DEFAULT_IMAGE_MIME_TYPE));
    const audio = input.audio ? withMimeType(input.audio, DEFAULT_AUDIO_MIME_TYPE) : null;

    if (this.state === 'awaiting_response') {
      return {
        status: 'rejected',
        error: new ValidationError('A reply is still pending. Wait for it before sending again.', 'busy'),
      };
    }

    if (input.text.length === 0 && images.length === 0 && !audio) {
      return { status: 'rejected', error: new ValidationError(EMPTY_SEND_WARNING, 'empty_input') };
    }

    const user = this.append('user', composePreview(input.text, images.length, audio !== null));
    this.setState('awaiting_response');

    try {
      const request = buildRequest({ text: input.text, images, audio });
      const result = await this.gateway.generate(this.session.personas.activePrompt(), request);
      const assistant = this.append('assistant', result.text);

      return result.ok
        ? { status: 'replied', user, assistant, model: result.model }
        : { status: 'provider_error', user, assistant, error: result.error };
    } catch (error) {
      if (error instanceof ConfigurationError) {
        const assistant = this.append('assistant', `Error: ${error.message}`);
        return { status: 'configuration_error', user, assistant, error };
      }

      const providerError =
        error instanceof ProviderError ? error : new ProviderError(describeError(error), 'unknown', { cause: error });
      const assistant = this.append('assistant', providerError.toReply());
      return { status: 'provider_error', user, assistant, error: providerError };
    } finally {
      this.setState('idle');
    }
  }

  /**
   * Empty the history. Not allowed while a reply is pending.
   */
  clear(): void {
    if (this.state === 'awaiting_response') {
      throw new ValidationError('Cannot clear history while a reply is pending.', 'busy');
    }
    this.session.store.clear();
    this.emit({ type: 'history_cleared' });
  }

  selectPersona(name: string): string {
    const prompt = this.session.personas.selectPersona(name);
    this.emit({ type: 'persona_changed', persona: name, prompt });
    return prompt;
  }

  setActivePrompt(text: string): void {
    this.session.personas.setActivePrompt(text);
    this.emit({
      type: 'persona_changed',
      persona: this.session.personas.selectedPersona().name,
      prompt: text,
    });
  }

  messages(): readonly ChatMessage[] {
    return this.session.store.all();
  }

  toPlainText(): string {
    return toPlainText(this.session.store.all());
  }

  toJSON(): string {
    return toJSON(this.session.store.all());
  }

  speakLastReply(): Promise<SpeakResult> {
    return this.speech.speak(this.session.store.lastByRole('assistant'));
  }

  snapshot(): SessionSnapshot {
    const personas = this.session.personas;
    return {
      sessionId: this.session.id,
      createdAt: this.session.createdAt.toISOString(),
      state: this.state,
      messages: this.session.store.all(),
      personas: personas.list(),
      selectedPersona: personas.selectedPersona().name,
      activePrompt: personas.activePrompt(),
      speechAvailable: this.speech.available,
    };
  }

  private append(role: ChatMessage['role'], content: string): ChatMessage {
    const message: ChatMessage = { role, content, timestamp: formatTimestamp(this.clock()) };
    this.session.store.append(message);
    this.emit({ type: 'message_appended', message });
    return message;
  }

  private setState(state: SessionState): void {
    this.state = state;
    this.emit({ type: 'state_changed', state });
  }

  private emit(event: SessionEvent): void {
    this.listeners.forEach((listener) => {
      try {
        listener(event);
      } catch (error) {
        console.error('[SessionController] Event listener failed:', error);
      }
    });
  }
}
