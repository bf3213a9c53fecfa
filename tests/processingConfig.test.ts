import {
  CONFIG_PRESETS,
  estimateFileComplexity,
  evaluateFileRules,
  parseProviderPriority
} from '../src/config/processing.config';

const KB = 1024;
const MB = 1024 * 1024;

describe('parseProviderPriority', () => {
  it('trims and lower-cases names', () => {
    expect(parseProviderPriority(' Groq , OPENAI ')).toEqual(['groq', 'openai']);
  });

  it('expands auto in place and drops duplicates', () => {
    expect(parseProviderPriority('openai,auto')).toEqual(['openai', 'groq', 'anthropic']);
    expect(parseProviderPriority('groq,groq')).toEqual(['groq']);
  });

  it('rejects unknown providers', () => {
    expect(() => parseProviderPriority('groq,gemini')).toThrow(
      "Invalid provider 'gemini'. Valid options: openai, groq, anthropic, auto"
    );
  });

  it('rejects an empty list', () => {
    expect(() => parseProviderPriority(' , ')).toThrow('Provider priority cannot be empty');
  });
});

describe('estimateFileComplexity', () => {
  it('grades by size first', () => {
    expect(estimateFileComplexity('cv.docx', 6 * MB)).toBe('high');
    expect(estimateFileComplexity('cv.docx', 3 * MB)).toBe('medium');
  });

  it('treats small PDFs as medium and other small files as low', () => {
    expect(estimateFileComplexity('cv.PDF', 200 * KB)).toBe('medium');
    expect(estimateFileComplexity('cv.docx', 200 * KB)).toBe('low');
  });
});

describe('evaluateFileRules', () => {
  it('prefers the large file rule over the extension rules', () => {
    expect(evaluateFileRules('cv.docx', 6 * MB)?.name).toBe('large_files');
  });

  it('matches by extension', () => {
    expect(evaluateFileRules('cv.pdf', 300 * KB)?.name).toBe('pdf_files');
    expect(evaluateFileRules('cv.docx', 300 * KB)?.name).toBe('docx_files');
  });

  it('requires both conditions of the small text rule', () => {
    expect(evaluateFileRules('cv.txt', 50 * KB)?.name).toBe('small_text_files');
    expect(evaluateFileRules('cv.txt', 3 * MB)).toBeNull();
  });

  it('treats a 5 MB file as not large', () => {
    expect(evaluateFileRules('cv.docx', 5 * MB)?.name).toBe('docx_files');
  });
});

describe('CONFIG_PRESETS', () => {
  it('defines the dev preset without anthropic', () => {
    expect(CONFIG_PRESETS.dev).toEqual({
      processingMode: 'hybrid',
      providerPriority: ['groq', 'openai'],
      costOptimization: true,
      autoFallback: true
    });
  });
});
