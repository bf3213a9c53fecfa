import {
  DEFAULT_PROVIDER_PRIORITY,
  FileComplexity,
  LLM_PROVIDERS,
  LlmProvider,
  PROVIDER_PROFILES,
  ProcessingMode,
  ProcessingRule,
  ProviderAvailability,
  ProviderPreference,
  bytesToMb,
  estimateFileComplexity,
  evaluateFileRules,
  fileExtensionOf
} from '../../config/processing.config';
import { ProviderRegistry } from '../../providers/registry';
import { AppError } from '../../utils/errorHandler';
import { logger } from '../../utils/logger';
import { RuntimeConfigService, RuntimeConfigSnapshot } from './runtimeConfig.service';

export interface ProcessingStrategy {
  mode: ProcessingMode;
  provider: LlmProvider;
  reasoning: string;
  rule: ProcessingRule | null;
}

export interface StrategyOptions {
  sessionId?: string;
}

export interface ProcessingExplanation {
  selectedStrategy: {
    processingMode: ProcessingMode;
    llmProvider: LlmProvider;
    providerName: string;
  };
  reasoning: string;
  ruleApplied: {
    name: string;
    description: string;
  };
  providerCapabilities: {
    strengths: string[];
    bestFor: string[];
    costTier: string;
  };
  fileAnalysis: {
    name: string;
    sizeMb: number;
    extension: string;
    estimatedComplexity: FileComplexity;
  };
  configuration: {
    costOptimization: boolean;
    autoFallback: boolean;
    defaultMode: ProcessingMode;
  };
}

export type SampleSelection =
  | { success: true; mode: ProcessingMode; provider: LlmProvider; reasoning: string }
  | { success: false; error: string };

export interface ConfigurationTestReport {
  testResults: Record<string, SampleSelection>;
  configuration: RuntimeConfigSnapshot;
  availableProviders: ProviderAvailability;
}

export type SwitchSimulation =
  | {
      status: 'error';
      message: string;
      availableProviders: LlmProvider[];
    }
  | {
      status: 'success';
      configuration: {
        processingMode: ProcessingMode;
        llmProviderRequested: ProviderPreference;
        llmProviderSelected: LlmProvider | null;
        autoSelection: boolean;
      };
      capabilities: {
        directFileUpload: boolean;
        textProcessing: boolean;
        recommendedForMode: boolean;
      };
      warnings: string[];
      recommendation: string;
    };

export const SAMPLE_FILES: ReadonlyArray<[string, number]> = [
  ['small_resume.docx', 1024 * 500],
  ['large_resume.pdf', 1024 * 1024 * 6],
  ['simple_resume.txt', 1024 * 50],
  ['complex_resume.pdf', 1024 * 1024 * 2]
];

const RECOMMENDED_BY_MODE: Record<ProcessingMode, LlmProvider[]> = {
  complete_llm: ['openai', 'anthropic'],
  hybrid: ['groq', 'openai']
};

const AUTO_ORDER_BY_MODE: Record<ProcessingMode, LlmProvider[]> = {
  complete_llm: ['openai', 'anthropic', 'groq'],
  hybrid: ['groq', 'openai', 'anthropic']
};

export class ProcessingSelectionService {
  constructor(
    private readonly runtimeConfig: RuntimeConfigService,
    private readonly providers: ProviderRegistry
  ) {}

  selectStrategy(fileName: string, sizeBytes: number, options: StrategyOptions = {}): ProcessingStrategy {
    const config = this.runtimeConfig.snapshot();

    let mode: ProcessingMode;
    let preferred: LlmProvider[];
    let reasoning: string;
    let rule: ProcessingRule | null = null;

    if (config.explicitMode) {
      mode = config.processingMode;
      preferred = config.providerPriority;
      reasoning = `Explicit configuration: ${mode} mode (rules bypassed)`;
    } else {
      rule = evaluateFileRules(fileName, sizeBytes);
      if (rule) {
        mode = rule.mode;
        preferred = rule.preferredProviders;
        reasoning = `Rule-based: ${rule.description}`;
      } else {
        mode = config.processingMode;
        preferred = config.providerPriority;
        reasoning = 'Default configuration applied';
      }
    }

    const availability = this.providers.availability();
    let provider = this.selectBestProvider(preferred, config.providerPriority, availability);

    if (config.costOptimization) {
      const optimized = this.applyCostOptimization(provider, availability, mode);
      provider = optimized.provider;
      reasoning += ` | ${optimized.reason}`;
    }

    const forced = this.runtimeConfig.getForcedProvider(options.sessionId);
    if (forced) {
      if (availability[forced]) {
        provider = forced;
        reasoning += ` | Session override: ${forced}`;
      } else {
        logger.warn('Forced provider unavailable, ignoring session override', {
          sessionId: options.sessionId,
          provider: forced
        });
        reasoning += ` | Session override ignored: ${forced} unavailable`;
      }
    }

    logger.info('Processing strategy selected', { fileName, sizeBytes, mode, provider, reasoning });
    return { mode, provider, reasoning, rule };
  }

  explain(fileName: string, sizeBytes: number): ProcessingExplanation {
    const strategy = this.selectStrategy(fileName, sizeBytes);
    const profile = PROVIDER_PROFILES[strategy.provider];
    const config = this.runtimeConfig.snapshot();

    return {
      selectedStrategy: {
        processingMode: strategy.mode,
        llmProvider: strategy.provider,
        providerName: profile.name
      },
      reasoning: strategy.reasoning,
      ruleApplied: strategy.rule
        ? { name: strategy.rule.name, description: strategy.rule.description }
        : { name: 'default', description: 'No specific rule matched, using defaults' },
      providerCapabilities: {
        strengths: profile.strengths,
        bestFor: profile.bestFor,
        costTier: profile.costTier
      },
      fileAnalysis: {
        name: fileName,
        sizeMb: Math.round(bytesToMb(sizeBytes) * 100) / 100,
        extension: fileExtensionOf(fileName).replace('.', ''),
        estimatedComplexity: estimateFileComplexity(fileName, sizeBytes)
      },
      configuration: {
        costOptimization: config.costOptimization,
        autoFallback: config.autoFallback,
        defaultMode: config.processingMode
      }
    };
  }

  testConfiguration(): ConfigurationTestReport {
    const testResults: Record<string, SampleSelection> = {};
    for (const [fileName, size] of SAMPLE_FILES) {
      try {
        const { mode, provider, reasoning } = this.selectStrategy(fileName, size);
        testResults[fileName] = { success: true, mode, provider, reasoning };
      } catch (error) {
        testResults[fileName] = {
          success: false,
          error: error instanceof Error ? error.message : String(error)
        };
      }
    }

    return {
      testResults,
      configuration: this.runtimeConfig.snapshot(),
      availableProviders: this.providers.availability()
    };
  }

  /** Previews a manual mode/provider pick without processing a file. */
  simulateSwitches(mode: ProcessingMode, requested: ProviderPreference): SwitchSimulation {
    const availability = this.providers.availability();

    if (requested !== 'auto' && !availability[requested]) {
      return {
        status: 'error',
        message: `Provider '${requested}' is not available`,
        availableProviders: this.providers.availableNames()
      };
    }

    const selected = requested === 'auto'
      ? AUTO_ORDER_BY_MODE[mode].find(name => availability[name]) ?? null
      : requested;

    const directFileUpload = selected ? PROVIDER_PROFILES[selected].supportsFileUpload : false;
    const recommendedForMode = selected ? RECOMMENDED_BY_MODE[mode].includes(selected) : false;

    const warnings: string[] = [];
    if (selected === 'groq' && mode === 'complete_llm') {
      warnings.push("Groq doesn't support direct file upload - will use text fallback");
    }
    if (mode === 'complete_llm') {
      warnings.push('Complete LLM mode may be more expensive');
    }
    if (requested !== 'auto' && !recommendedForMode) {
      warnings.push(`Provider '${requested}' forced - may not be optimal for ${mode} mode`);
    }

    return {
      status: 'success',
      configuration: {
        processingMode: mode,
        llmProviderRequested: requested,
        llmProviderSelected: selected,
        autoSelection: requested === 'auto'
      },
      capabilities: {
        directFileUpload,
        textProcessing: true,
        recommendedForMode
      },
      warnings,
      recommendation: recommendedForMode
        ? 'Good choice!'
        : `Consider using 'auto' provider selection for ${mode} mode`
    };
  }

  private selectBestProvider(
    preferred: LlmProvider[],
    configured: LlmProvider[],
    availability: ProviderAvailability
  ): LlmProvider {
    const candidates = [...preferred, ...configured, ...DEFAULT_PROVIDER_PRIORITY, ...LLM_PROVIDERS];
    const provider = candidates.find(name => availability[name]);
    if (!provider) {
      throw new AppError('No LLM providers are currently available', 503);
    }
    return provider;
  }

  private applyCostOptimization(
    current: LlmProvider,
    availability: ProviderAvailability,
    mode: ProcessingMode
  ): { provider: LlmProvider; reason: string } {
    if (PROVIDER_PROFILES[current].costTier === 'free') {
      return { provider: current, reason: 'Already using cost-effective provider' };
    }

    for (const name of LLM_PROVIDERS) {
      const profile = PROVIDER_PROFILES[name];
      if (!availability[name] || profile.costTier !== 'free') {
        continue;
      }
      if (mode === 'hybrid' || profile.strengths.includes('text_processing')) {
        return { provider: name, reason: `Cost optimization: switched to ${profile.name}` };
      }
    }

    return { provider: current, reason: 'No cost-effective alternatives available' };
  }
}
