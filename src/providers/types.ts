import { LlmProvider } from '../config/processing.config';
import { ResumeData } from '../interfaces/domain/ResumeData';

export interface ResumeFile {
  buffer: Buffer;
  fileName: string;
  mimeType: string;
}

export type ExtractionMethod = 'direct_file' | 'text_extraction';

export interface ProviderExtraction {
  data: ResumeData;
  confidence: number;
  method: ExtractionMethod;
}

export interface ResumeExtractionProvider {
  readonly name: LlmProvider;
  readonly supportsFileUpload: boolean;
  isAvailable(): boolean;
  acceptsFile(mimeType: string): boolean;
  extractFromText(text: string): Promise<ProviderExtraction>;
  extractFromFile(file: ResumeFile): Promise<ProviderExtraction>;
}

export class LlmProviderError extends Error {
  constructor(public readonly provider: LlmProvider, message: string, cause?: unknown) {
    super(`${provider}: ${message}`, { cause });
    this.name = 'LlmProviderError';
  }
}

export const PDF_MIME_TYPE = 'application/pdf';
export const DOCX_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';
