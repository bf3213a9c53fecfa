import mammoth from 'mammoth';
import { fileExtensionOf } from '../config/processing.config';
import { logger } from './logger';

export const SUPPORTED_UPLOAD_EXTENSIONS = ['.pdf', '.docx'];

export interface TextExtractor {
  extractText(buffer: Buffer, fileName: string): Promise<string>;
}

async function extractPdfText(buffer: Buffer): Promise<string> {
  // Loaded on first use so importing this module does not load the PDF engine
  const pdfParse = (await import('pdf-parse')).default;
  const result = await pdfParse(buffer);
  return result.text;
}

async function extractDocxText(buffer: Buffer): Promise<string> {
  const result = await mammoth.extractRawText({ buffer });
  return result.value;
}

export class DocumentTextExtractor implements TextExtractor {
  async extractText(buffer: Buffer, fileName: string): Promise<string> {
    const extension = fileExtensionOf(fileName);

    let text: string;
    if (extension === '.pdf') {
      text = await extractPdfText(buffer);
    } else if (extension === '.docx') {
      text = await extractDocxText(buffer);
    } else {
      throw new Error(`Unsupported file type: ${extension || 'unknown'}`);
    }

    const cleaned = text.replace(/\u0000/g, '').trim();
    logger.debug('Document text extracted', { fileName, chars: cleaned.length });
    return cleaned;
  }
}
