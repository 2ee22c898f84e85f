/**
 * Persona domain entity: a named preset system instruction
 */
export interface Persona {
  readonly name: string;
  readonly systemPrompt: string;
}
