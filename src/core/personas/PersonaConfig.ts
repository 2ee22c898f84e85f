import { Persona } from '../entities/Persona.js';
import { ValidationError } from '../errors.js';

export const DEFAULT_PERSONAS: readonly Persona[] = [
  { name: 'General (default)', systemPrompt: 'You are a helpful, concise assistant.' },
  { name: 'Friendly Tutor', systemPrompt: 'You are a patient tutor who explains step-by-step with examples.' },
  { name: 'Strict Interviewer', systemPrompt: 'You ask probing, concise questions and challenge assumptions.' },
  { name: 'Creative Writer', systemPrompt: 'You write with flair, vivid imagery, but stay on brief.' },
  { name: 'Code Assistant', systemPrompt: 'You are a senior developer; offer clear, runnable code and best practices.' },
];

/**
 * Named system-prompt presets plus the free-text prompt actually sent.
 * Selecting a persona resets the active prompt to its default; setActivePrompt
 * overrides it. Last write wins.
 */
export class PersonaConfig {
  private readonly personas: Map<string, Persona>;
  private selected: Persona;
  private prompt: string;

  constructor(personas: readonly Persona[] = DEFAULT_PERSONAS) {
    if (personas.length === 0) {
      throw new Error('PersonaConfig needs at least one persona');
    }
    this.personas = new Map(personas.map((p) => [p.name, p]));
    this.selected = personas[0];
    this.prompt = personas[0].systemPrompt;
  }

  selectPersona(name: string): string {
    const persona = this.personas.get(name);
    if (!persona) {
      throw new ValidationError(`Unknown persona: ${name}`, 'unknown_persona');
    }
    this.selected = persona;
    this.prompt = persona.systemPrompt;
    return persona.systemPrompt;
  }

  setActivePrompt(text: string): void {
    this.prompt = text;
  }

  activePrompt(): string {
    return this.prompt;
  }

  selectedPersona(): Persona {
    return this.selected;
  }

  /**
   * True when the active prompt differs from the selected persona's default
   */
  isOverridden(): boolean {
    return this.prompt !== this.selected.systemPrompt;
  }

  list(): Persona[] {
    return Array.from(this.personas.values());
  }
}
