import { LlmProvider, ProcessingMode } from '../../config/processing.config';
import { ResumeData } from '../../interfaces/domain/ResumeData';
import { ProviderRegistry } from '../../providers/registry';
import {
  ExtractionMethod,
  LlmProviderError,
  ProviderExtraction,
  ResumeExtractionProvider,
  ResumeFile
} from '../../providers/types';
import { AppError } from '../../utils/errorHandler';
import { describeError, logger } from '../../utils/logger';
import { TextExtractor } from '../../utils/textParser';

export interface ExtractionRequest {
  file: ResumeFile;
  // Text already extracted locally, if any
  text: string | null;
  mode: ProcessingMode;
  provider: LlmProvider;
  autoFallback: boolean;
  priority: LlmProvider[];
}

export interface ExtractionOutcome {
  data: ResumeData;
  provider: LlmProvider;
  method: ExtractionMethod;
  confidence: number;
  attemptedProviders: LlmProvider[];
  text: string | null;
}

type TextResult = { ok: true; text: string } | { ok: false; reason: string };

class TextRequiredError extends Error {}

/**
 * Runs structured extraction against the selected provider, falling back to
 * the rest of the priority list when auto fallback is on.
 */
export class ResumeExtractionService {
  constructor(
    private readonly providers: ProviderRegistry,
    private readonly textExtractor: TextExtractor
  ) {}

  async extract(request: ExtractionRequest): Promise<ExtractionOutcome> {
    const text = new LazyText(this.textExtractor, request.file, request.text);
    const candidates = this.candidateOrder(request);
    const attemptedProviders: LlmProvider[] = [];
    let lastError: unknown = null;

    for (const name of candidates) {
      attemptedProviders.push(name);
      try {
        const result = await this.attempt(name, request.mode, request.file, text);
        logger.info('Resume extracted', {
          provider: name,
          method: result.method,
          attempts: attemptedProviders.length
        });
        return {
          ...result,
          provider: name,
          attemptedProviders,
          text: text.current()
        };
      } catch (error) {
        if (error instanceof TextRequiredError && name === request.provider) {
          throw new AppError(error.message, 500);
        }
        lastError = error;
        logger.warn('Provider extraction failed', { provider: name, reason: describeError(error) });
        if (!request.autoFallback) {
          throw new AppError(`LLM extraction failed: ${describeError(error)}`, 500);
        }
      }
    }

    logger.error('All LLM providers failed', {
      attemptedProviders,
      lastError: lastError === null ? undefined : describeError(lastError)
    });
    throw new AppError('All LLM providers failed', 500);
  }

  private candidateOrder(request: ExtractionRequest): LlmProvider[] {
    if (!request.autoFallback) {
      return [request.provider];
    }
    const rest = request.priority.filter(
      name => name !== request.provider && this.providers.isAvailable(name)
    );
    return [request.provider, ...rest];
  }

  private async attempt(
    name: LlmProvider,
    mode: ProcessingMode,
    file: ResumeFile,
    text: LazyText
  ): Promise<ProviderExtraction> {
    const provider = this.requireProvider(name);

    if (mode === 'complete_llm' && provider.acceptsFile(file.mimeType)) {
      try {
        return await provider.extractFromFile(file);
      } catch (error) {
        const fallbackText = await text.get();
        if (!fallbackText.ok) {
          throw error;
        }
        logger.warn('Direct file extraction failed, retrying with extracted text', {
          provider: name,
          reason: describeError(error)
        });
        return provider.extractFromText(fallbackText.text);
      }
    }

    const resolved = await text.get();
    if (!resolved.ok) {
      throw new TextRequiredError(
        `Provider ${name} requires text but text extraction failed: ${resolved.reason}`
      );
    }
    return provider.extractFromText(resolved.text);
  }

  private requireProvider(name: LlmProvider): ResumeExtractionProvider {
    const provider = this.providers.get(name);
    if (!provider || !provider.isAvailable()) {
      throw new LlmProviderError(name, 'Provider is not available');
    }
    return provider;
  }
}

// Extracts document text at most once per request.
class LazyText {
  private result: TextResult | null;

  constructor(
    private readonly extractor: TextExtractor,
    private readonly file: ResumeFile,
    initial: string | null
  ) {
    this.result = initial && initial.trim() ? { ok: true, text: initial } : null;
  }

  current(): string | null {
    const result = this.result;
    return result && result.ok ? result.text : null;
  }

  async get(): Promise<TextResult> {
    if (this.result) {
      return this.result;
    }
    let result: TextResult;
    try {
      const text = await this.extractor.extractText(this.file.buffer, this.file.fileName);
      result = text ? { ok: true, text } : { ok: false, reason: 'Text extraction failed' };
    } catch (error) {
      result = { ok: false, reason: describeError(error) };
    }
    this.result = result;
    return result;
  }
}
