import { ChatCompletionsProvider } from './chatCompletions.provider';

// Groq serves an OpenAI-compatible endpoint; text input only.
export class GroqProvider extends ChatCompletionsProvider {
  readonly name = 'groq';
  readonly supportsFileUpload = false;
  protected readonly textConfidence = 0.85;
}
