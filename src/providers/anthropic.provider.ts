import Anthropic from '@anthropic-ai/sdk';
import { describeError, logger } from '../utils/logger';
import { MAX_OUTPUT_TOKENS, MAX_PROMPT_CHARS, TEMPERATURE } from './chatCompletions.provider';
import { parseResumeJson } from './modelJson';
import { SYSTEM_PROMPT, buildFileExtractionPrompt, buildTextExtractionPrompt } from './prompts';
import {
  LlmProviderError,
  PDF_MIME_TYPE,
  ProviderExtraction,
  ResumeExtractionProvider,
  ResumeFile
} from './types';

export interface AnthropicReply {
  content: Array<{ type: string; text?: string }>;
  usage: { input_tokens: number; output_tokens: number };
}

// The part of the Anthropic client the provider calls
export interface AnthropicMessagesClient {
  messages: {
    create(body: Anthropic.MessageCreateParamsNonStreaming): Promise<AnthropicReply>;
  };
}

export interface AnthropicProviderOptions {
  apiKey?: string;
  model: string;
  client?: AnthropicMessagesClient;
}

export class AnthropicProvider implements ResumeExtractionProvider {
  readonly name = 'anthropic';
  readonly supportsFileUpload = true;
  private readonly client: AnthropicMessagesClient | null;
  private readonly model: string;

  constructor(options: AnthropicProviderOptions) {
    this.model = options.model;
    if (options.client) {
      this.client = options.client;
    } else if (options.apiKey) {
      this.client = new Anthropic({ apiKey: options.apiKey });
    } else {
      this.client = null;
    }
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  // Document blocks take PDFs; other formats go through text extraction
  acceptsFile(mimeType: string): boolean {
    return mimeType === PDF_MIME_TYPE;
  }

  async extractFromText(text: string): Promise<ProviderExtraction> {
    const content = await this.send([
      { type: 'text', text: buildTextExtractionPrompt(text.slice(0, MAX_PROMPT_CHARS)) }
    ]);
    return { data: this.parse(content), confidence: 0.9, method: 'text_extraction' };
  }

  async extractFromFile(file: ResumeFile): Promise<ProviderExtraction> {
    if (!this.acceptsFile(file.mimeType)) {
      throw new LlmProviderError(this.name, `Unsupported document type for direct upload: ${file.mimeType}`);
    }

    const content = await this.send([
      {
        type: 'document',
        source: {
          type: 'base64',
          media_type: PDF_MIME_TYPE,
          data: file.buffer.toString('base64')
        }
      },
      { type: 'text', text: buildFileExtractionPrompt() }
    ]);
    return { data: this.parse(content), confidence: 0.95, method: 'direct_file' };
  }

  private async send(content: Anthropic.ContentBlockParam[]): Promise<string> {
    if (!this.client) {
      throw new LlmProviderError(this.name, 'Client not initialized, API key missing');
    }

    const startedAt = Date.now();
    let message: AnthropicReply;
    try {
      message = await this.client.messages.create({
        model: this.model,
        max_tokens: MAX_OUTPUT_TOKENS,
        temperature: TEMPERATURE,
        system: SYSTEM_PROMPT,
        messages: [{ role: 'user', content }]
      });
    } catch (error) {
      throw new LlmProviderError(this.name, `API error: ${describeError(error)}`, error);
    }

    const text = message.content
      .flatMap(block => (block.type === 'text' && block.text ? [block.text] : []))
      .join('');
    if (!text) {
      throw new LlmProviderError(this.name, 'Model returned empty response');
    }

    logger.info('LLM call completed', {
      provider: this.name,
      model: this.model,
      latencyMs: Date.now() - startedAt,
      inputTokens: message.usage.input_tokens,
      outputTokens: message.usage.output_tokens
    });
    return text;
  }

  private parse(content: string) {
    try {
      return parseResumeJson(content);
    } catch (error) {
      throw new LlmProviderError(this.name, describeError(error), error);
    }
  }
}
