import { ProcessingSelectionService } from '../src/models/shared/processingSelection.service';
import { RuntimeConfigService } from '../src/models/shared/runtimeConfig.service';
import { FakeProvider, registryOf } from './support/fakes';

const KB = 1024;
const MB = 1024 * 1024;
const PDF_REASON = 'Rule-based: PDF files often need the document understanding of advanced LLMs';

function selectionWith(
  source: NodeJS.ProcessEnv,
  unavailable: string[] = []
): { service: ProcessingSelectionService; config: RuntimeConfigService } {
  const config = new RuntimeConfigService({ source });
  const registry = registryOf(
    new FakeProvider('openai', { available: !unavailable.includes('openai') }),
    new FakeProvider('groq', { available: !unavailable.includes('groq') }),
    new FakeProvider('anthropic', { available: !unavailable.includes('anthropic') })
  );
  return { service: new ProcessingSelectionService(config, registry), config };
}

const NO_COST = { ENABLE_COST_OPTIMIZATION: 'false' };

describe('ProcessingSelectionService.selectStrategy', () => {
  it('applies the matching rule and its preferred provider', () => {
    const { service } = selectionWith(NO_COST);

    const strategy = service.selectStrategy('cv.pdf', 300 * KB);

    expect(strategy.mode).toBe('complete_llm');
    expect(strategy.provider).toBe('openai');
    expect(strategy.rule?.name).toBe('pdf_files');
    expect(strategy.reasoning).toBe(PDF_REASON);
  });

  it('switches a premium pick to the free tier under cost optimization', () => {
    const { service } = selectionWith({});

    const strategy = service.selectStrategy('cv.pdf', 300 * KB);

    expect(strategy.provider).toBe('groq');
    expect(strategy.mode).toBe('complete_llm');
    expect(strategy.reasoning).toBe(`${PDF_REASON} | Cost optimization: switched to Groq`);
  });

  it('keeps a free-tier pick under cost optimization', () => {
    const { service } = selectionWith({});

    const strategy = service.selectStrategy('notes.txt', 3 * MB);

    expect(strategy.mode).toBe('hybrid');
    expect(strategy.provider).toBe('groq');
    expect(strategy.rule).toBeNull();
    expect(strategy.reasoning).toBe('Default configuration applied | Already using cost-effective provider');
  });

  it('reports when no free-tier provider is available', () => {
    const { service } = selectionWith({}, ['groq']);

    const strategy = service.selectStrategy('cv.pdf', 300 * KB);

    expect(strategy.provider).toBe('openai');
    expect(strategy.reasoning).toBe(`${PDF_REASON} | No cost-effective alternatives available`);
  });

  it('bypasses rules when the mode is set explicitly', () => {
    const { service } = selectionWith({
      ...NO_COST,
      DEFAULT_PROCESSING_MODE: 'complete_llm',
      PROVIDER_PRIORITY: 'anthropic,openai'
    });

    const strategy = service.selectStrategy('cv.docx', 300 * KB);

    expect(strategy).toEqual({
      mode: 'complete_llm',
      provider: 'anthropic',
      reasoning: 'Explicit configuration: complete_llm mode (rules bypassed)',
      rule: null
    });
  });

  it('falls back to the configured priority when no preferred provider is available', () => {
    const { service } = selectionWith(NO_COST, ['openai', 'anthropic']);

    expect(service.selectStrategy('cv.pdf', 300 * KB).provider).toBe('groq');
  });

  it('fails with 503 when no provider is available', () => {
    const { service } = selectionWith({}, ['openai', 'groq', 'anthropic']);

    let caught: unknown;
    try {
      service.selectStrategy('cv.pdf', 300 * KB);
    } catch (error) {
      caught = error;
    }

    expect(caught).toMatchObject({ statusCode: 503, message: 'No LLM providers are currently available' });
  });

  it('honours a forced provider for the session', () => {
    const { service, config } = selectionWith({});
    config.forceProvider('session-1', 'anthropic');

    const strategy = service.selectStrategy('cv.pdf', 300 * KB, { sessionId: 'session-1' });

    expect(strategy.provider).toBe('anthropic');
    expect(strategy.reasoning).toBe(
      `${PDF_REASON} | Cost optimization: switched to Groq | Session override: anthropic`
    );
    expect(service.selectStrategy('cv.pdf', 300 * KB, { sessionId: 'session-2' }).provider).toBe('groq');
  });

  it('ignores a forced provider that is unavailable', () => {
    const { service, config } = selectionWith(NO_COST, ['anthropic']);
    config.forceProvider('session-1', 'anthropic');

    const strategy = service.selectStrategy('cv.pdf', 300 * KB, { sessionId: 'session-1' });

    expect(strategy.provider).toBe('openai');
    expect(strategy.reasoning).toBe(`${PDF_REASON} | Session override ignored: anthropic unavailable`);
  });
});

describe('ProcessingSelectionService.explain', () => {
  it('describes the file, rule and provider', () => {
    const { service } = selectionWith(NO_COST);

    const explanation = service.explain('cv.docx', 1536000);

    expect(explanation.selectedStrategy).toEqual({
      processingMode: 'hybrid',
      llmProvider: 'groq',
      providerName: 'Groq'
    });
    expect(explanation.ruleApplied).toEqual({
      name: 'docx_files',
      description: 'DOCX files extract well with libraries, hybrid is efficient'
    });
    expect(explanation.fileAnalysis).toEqual({
      name: 'cv.docx',
      sizeMb: 1.46,
      extension: 'docx',
      estimatedComplexity: 'low'
    });
    expect(explanation.providerCapabilities.costTier).toBe('free');
    expect(explanation.configuration).toEqual({
      costOptimization: false,
      autoFallback: true,
      defaultMode: 'hybrid'
    });
  });
});

describe('ProcessingSelectionService.testConfiguration', () => {
  it('runs the selection over every sample file', () => {
    const { service } = selectionWith({});

    const report = service.testConfiguration();

    expect(Object.keys(report.testResults)).toEqual([
      'small_resume.docx',
      'large_resume.pdf',
      'simple_resume.txt',
      'complex_resume.pdf'
    ]);
    expect(report.testResults['large_resume.pdf']).toEqual({
      success: true,
      mode: 'complete_llm',
      provider: 'groq',
      reasoning: 'Rule-based: Large files (>5MB) benefit from direct LLM processing | Cost optimization: switched to Groq'
    });
    expect(report.availableProviders).toEqual({ openai: true, groq: true, anthropic: true });
  });

  it('records failures per sample', () => {
    const { service } = selectionWith({}, ['openai', 'groq', 'anthropic']);

    const report = service.testConfiguration();

    expect(report.testResults['small_resume.docx']).toEqual({
      success: false,
      error: 'No LLM providers are currently available'
    });
  });
});

describe('ProcessingSelectionService.simulateSwitches', () => {
  it('picks the first available provider for the mode with auto', () => {
    const { service } = selectionWith({});

    expect(service.simulateSwitches('complete_llm', 'auto')).toEqual({
      status: 'success',
      configuration: {
        processingMode: 'complete_llm',
        llmProviderRequested: 'auto',
        llmProviderSelected: 'openai',
        autoSelection: true
      },
      capabilities: { directFileUpload: true, textProcessing: true, recommendedForMode: true },
      warnings: ['Complete LLM mode may be more expensive'],
      recommendation: 'Good choice!'
    });
  });

  it('warns about a forced provider that does not suit the mode', () => {
    const { service } = selectionWith({});

    const result = service.simulateSwitches('complete_llm', 'groq');

    expect(result.status).toBe('success');
    if (result.status === 'success') {
      expect(result.capabilities.directFileUpload).toBe(false);
      expect(result.warnings).toEqual([
        "Groq doesn't support direct file upload - will use text fallback",
        'Complete LLM mode may be more expensive',
        "Provider 'groq' forced - may not be optimal for complete_llm mode"
      ]);
      expect(result.recommendation).toBe("Consider using 'auto' provider selection for complete_llm mode");
    }
  });

  it('rejects an unavailable provider', () => {
    const { service } = selectionWith({}, ['anthropic']);

    expect(service.simulateSwitches('hybrid', 'anthropic')).toEqual({
      status: 'error',
      message: "Provider 'anthropic' is not available",
      availableProviders: ['openai', 'groq']
    });
  });
});
