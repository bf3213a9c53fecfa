import { EnvConfig } from '../config/env';
import { LLM_PROVIDERS, LlmProvider, ProviderAvailability } from '../config/processing.config';
import { AnthropicProvider } from './anthropic.provider';
import { GroqProvider } from './groq.provider';
import { OpenAiProvider } from './openai.provider';
import { ResumeExtractionProvider } from './types';

export class ProviderRegistry {
  private readonly providers = new Map<LlmProvider, ResumeExtractionProvider>();

  constructor(providers: ResumeExtractionProvider[]) {
    for (const provider of providers) {
      this.providers.set(provider.name, provider);
    }
  }

  get(name: LlmProvider): ResumeExtractionProvider | undefined {
    return this.providers.get(name);
  }

  isAvailable(name: LlmProvider): boolean {
    return this.providers.get(name)?.isAvailable() ?? false;
  }

  availability(): ProviderAvailability {
    return {
      openai: this.isAvailable('openai'),
      groq: this.isAvailable('groq'),
      anthropic: this.isAvailable('anthropic')
    };
  }

  availableNames(): LlmProvider[] {
    return LLM_PROVIDERS.filter(name => this.isAvailable(name));
  }
}

export function createProviderRegistry(env: EnvConfig): ProviderRegistry {
  return new ProviderRegistry([
    new OpenAiProvider({
      apiKey: env.OPENAI_API_KEY,
      textModel: env.OPENAI_TEXT_MODEL,
      fileModel: env.OPENAI_FILE_MODEL
    }),
    new GroqProvider({
      apiKey: env.GROQ_API_KEY,
      textModel: env.GROQ_MODEL,
      baseURL: env.GROQ_BASE_URL
    }),
    new AnthropicProvider({
      apiKey: env.ANTHROPIC_API_KEY,
      model: env.ANTHROPIC_MODEL
    })
  ]);
}
