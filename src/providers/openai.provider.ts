import { ChatCompletionsProvider, ChatCompletionsProviderOptions } from './chatCompletions.provider';
import { SYSTEM_PROMPT, buildFileExtractionPrompt } from './prompts';
import { PDF_MIME_TYPE, ProviderExtraction, ResumeFile } from './types';

export interface OpenAiProviderOptions extends ChatCompletionsProviderOptions {
  fileModel: string;
}

export class OpenAiProvider extends ChatCompletionsProvider {
  readonly name = 'openai';
  readonly supportsFileUpload = true;
  protected readonly textConfidence = 0.9;
  private readonly fileModel: string;

  constructor(options: OpenAiProviderOptions) {
    super(options);
    this.fileModel = options.fileModel;
  }

  acceptsFile(mimeType: string): boolean {
    return mimeType === PDF_MIME_TYPE;
  }

  async extractFromFile(file: ResumeFile): Promise<ProviderExtraction> {
    const content = await this.complete(this.fileModel, [
      { role: 'system', content: SYSTEM_PROMPT },
      {
        role: 'user',
        content: [
          { type: 'text', text: buildFileExtractionPrompt() },
          {
            type: 'file',
            file: {
              filename: file.fileName,
              file_data: `data:${file.mimeType};base64,${file.buffer.toString('base64')}`
            }
          }
        ]
      }
    ]);

    return {
      data: this.parse(content),
      confidence: 0.95,
      method: 'direct_file'
    };
  }
}
