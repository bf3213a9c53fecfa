import OpenAI from 'openai';
import { LlmProvider } from '../config/processing.config';
import { logger } from '../utils/logger';
import { parseResumeJson } from './modelJson';
import { SYSTEM_PROMPT, buildTextExtractionPrompt } from './prompts';
import {
  LlmProviderError,
  ProviderExtraction,
  ResumeExtractionProvider,
  ResumeFile
} from './types';

export const MAX_OUTPUT_TOKENS = 4000;
export const TEMPERATURE = 0.1;

// Resume text beyond this is cut before prompting
export const MAX_PROMPT_CHARS = 50000;

export interface ChatCompletionReply {
  choices: Array<{ message: { content: string | null } }>;
  usage?: { total_tokens: number };
}

// The part of the OpenAI client the providers call
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletionReply>;
    };
  };
}

export interface ChatCompletionsProviderOptions {
  apiKey?: string;
  textModel: string;
  baseURL?: string;
  client?: ChatCompletionsClient;
}

/**
 * Text extraction over the chat completions API. Shared by every provider
 * that speaks the OpenAI wire format.
 */
export abstract class ChatCompletionsProvider implements ResumeExtractionProvider {
  abstract readonly name: LlmProvider;
  abstract readonly supportsFileUpload: boolean;
  protected abstract readonly textConfidence: number;

  protected readonly client: ChatCompletionsClient | null;
  protected readonly textModel: string;

  constructor(options: ChatCompletionsProviderOptions) {
    this.textModel = options.textModel;
    if (options.client) {
      this.client = options.client;
    } else if (options.apiKey) {
      this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });
    } else {
      this.client = null;
    }
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  acceptsFile(_mimeType: string): boolean {
    return false;
  }

  async extractFromText(text: string): Promise<ProviderExtraction> {
    const prompt = buildTextExtractionPrompt(text.slice(0, MAX_PROMPT_CHARS));
    const content = await this.complete(this.textModel, [
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: prompt }
    ]);

    return {
      data: this.parse(content),
      confidence: this.textConfidence,
      method: 'text_extraction'
    };
  }

  async extractFromFile(_file: ResumeFile): Promise<ProviderExtraction> {
    throw new LlmProviderError(this.name, 'Direct file upload is not supported');
  }

  protected requireClient(): ChatCompletionsClient {
    if (!this.client) {
      throw new LlmProviderError(this.name, 'Client not initialized, API key missing');
    }
    return this.client;
  }

  protected async complete(
    model: string,
    messages: OpenAI.Chat.Completions.ChatCompletionMessageParam[]
  ): Promise<string> {
    const client = this.requireClient();
    const startedAt = Date.now();

    let completion: ChatCompletionReply;
    try {
      completion = await client.chat.completions.create({
        model,
        messages,
        temperature: TEMPERATURE,
        max_tokens: MAX_OUTPUT_TOKENS
      });
    } catch (error) {
      throw new LlmProviderError(this.name, `API error: ${error instanceof Error ? error.message : String(error)}`, error);
    }

    const content = completion.choices[0]?.message?.content;
    if (!content) {
      throw new LlmProviderError(this.name, 'Model returned empty response');
    }

    logger.info('LLM call completed', {
      provider: this.name,
      model,
      latencyMs: Date.now() - startedAt,
      totalTokens: completion.usage?.total_tokens
    });
    return content;
  }

  protected parse(content: string) {
    try {
      return parseResumeJson(content);
    } catch (error) {
      throw new LlmProviderError(this.name, error instanceof Error ? error.message : String(error), error);
    }
  }
}
