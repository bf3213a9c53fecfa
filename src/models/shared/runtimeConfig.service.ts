import {
  CONFIG_PRESETS,
  DEFAULT_PROCESSING_MODE,
  DEFAULT_PROVIDER_PRIORITY,
  LlmProvider,
  PresetName,
  ProcessingSettings,
  isProcessingMode,
  parseProviderPriority
} from '../../config/processing.config';
import { upsertEnvValues } from '../../utils/envFile';
import { AppError } from '../../utils/errorHandler';
import { describeError, logger } from '../../utils/logger';

export interface RuntimeConfigSnapshot extends ProcessingSettings {
  explicitMode: boolean;
}

export interface RuntimeConfigOptions {
  source?: NodeJS.ProcessEnv;
  // dotenv file that receives changes; null keeps them in memory only
  envFilePath?: string | null;
}

export type EnvironmentView = Record<
  'DEFAULT_PROCESSING_MODE' | 'PROVIDER_PRIORITY' | 'ENABLE_COST_OPTIMIZATION' | 'ENABLE_AUTO_FALLBACK',
  string
>;

function readFlag(source: NodeJS.ProcessEnv, name: string): boolean {
  return (source[name] ?? 'true').trim().toLowerCase() === 'true';
}

function sessionKey(sessionId: string): string {
  return `SESSION_${sessionId}_FORCED_PROVIDER`;
}

export class RuntimeConfigService {
  private settings: ProcessingSettings;
  private explicitMode: boolean;
  private readonly sessionOverrides = new Map<string, LlmProvider>();
  private readonly envFilePath: string | null;

  constructor(options: RuntimeConfigOptions = {}) {
    const source = options.source ?? process.env;
    this.envFilePath = options.envFilePath ?? null;

    const rawMode = source.DEFAULT_PROCESSING_MODE?.trim().toLowerCase();
    let processingMode = DEFAULT_PROCESSING_MODE;
    if (rawMode && isProcessingMode(rawMode)) {
      processingMode = rawMode;
    } else if (rawMode) {
      logger.warn('Invalid processing mode in environment, using default', {
        value: rawMode,
        fallback: DEFAULT_PROCESSING_MODE
      });
    }

    let providerPriority = [...DEFAULT_PROVIDER_PRIORITY];
    const rawPriority = source.PROVIDER_PRIORITY;
    if (rawPriority) {
      try {
        providerPriority = parseProviderPriority(rawPriority);
      } catch (error) {
        logger.warn('Invalid provider priority in environment, using default', {
          value: rawPriority,
          reason: describeError(error)
        });
      }
    }

    this.settings = {
      processingMode,
      providerPriority,
      costOptimization: readFlag(source, 'ENABLE_COST_OPTIMIZATION'),
      autoFallback: readFlag(source, 'ENABLE_AUTO_FALLBACK')
    };
    this.explicitMode = source.DEFAULT_PROCESSING_MODE !== undefined;
  }

  snapshot(): RuntimeConfigSnapshot {
    return {
      ...this.settings,
      providerPriority: [...this.settings.providerPriority],
      explicitMode: this.explicitMode
    };
  }

  environmentView(): EnvironmentView {
    return {
      DEFAULT_PROCESSING_MODE: this.settings.processingMode,
      PROVIDER_PRIORITY: this.settings.providerPriority.join(','),
      ENABLE_COST_OPTIMIZATION: String(this.settings.costOptimization),
      ENABLE_AUTO_FALLBACK: String(this.settings.autoFallback)
    };
  }

  /**
   * Applies the given settings and returns one line per changed field.
   * Takes effect for the next upload.
   */
  async update(changes: Partial<ProcessingSettings>): Promise<string[]> {
    const changed: string[] = [];
    const persisted: Partial<EnvironmentView> = {};

    if (changes.processingMode !== undefined) {
      this.settings.processingMode = changes.processingMode;
      this.explicitMode = true;
      persisted.DEFAULT_PROCESSING_MODE = changes.processingMode;
      changed.push(`processing_mode → ${changes.processingMode}`);
    }

    if (changes.providerPriority !== undefined) {
      if (changes.providerPriority.length === 0) {
        throw new AppError('Provider priority cannot be empty', 400);
      }
      this.settings.providerPriority = [...changes.providerPriority];
      persisted.PROVIDER_PRIORITY = changes.providerPriority.join(',');
      changed.push(`provider_priority → ${persisted.PROVIDER_PRIORITY}`);
    }

    if (changes.costOptimization !== undefined) {
      this.settings.costOptimization = changes.costOptimization;
      persisted.ENABLE_COST_OPTIMIZATION = String(changes.costOptimization);
      changed.push(`cost_optimization → ${changes.costOptimization}`);
    }

    if (changes.autoFallback !== undefined) {
      this.settings.autoFallback = changes.autoFallback;
      persisted.ENABLE_AUTO_FALLBACK = String(changes.autoFallback);
      changed.push(`auto_fallback → ${changes.autoFallback}`);
    }

    if (changed.length === 0) {
      throw new AppError('No configuration changes provided', 400);
    }

    await this.persist(persisted);
    logger.info('Runtime configuration updated', { changes: changed });
    return changed;
  }

  async applyPreset(preset: PresetName): Promise<string[]> {
    const settings = CONFIG_PRESETS[preset];
    this.settings = { ...settings, providerPriority: [...settings.providerPriority] };
    this.explicitMode = true;

    const view = this.environmentView();
    await this.persist(view);
    logger.info('Configuration preset applied', { preset });
    return Object.entries(view).map(([key, value]) => `${key} → ${value}`);
  }

  forceProvider(sessionId: string, provider: LlmProvider): void {
    this.sessionOverrides.set(sessionId, provider);
    logger.info('Provider forced for session', { sessionId, provider });
  }

  getForcedProvider(sessionId: string | undefined): LlmProvider | undefined {
    return sessionId === undefined ? undefined : this.sessionOverrides.get(sessionId);
  }

  clearSessionOverrides(sessionId: string): string[] {
    if (!this.sessionOverrides.delete(sessionId)) {
      return [];
    }
    return [sessionKey(sessionId)];
  }

  private async persist(values: Partial<EnvironmentView>): Promise<void> {
    if (!this.envFilePath) {
      return;
    }
    const entries = Object.fromEntries(
      Object.entries(values).filter((entry): entry is [string, string] => entry[1] !== undefined)
    );
    await upsertEnvValues(this.envFilePath, entries);
  }
}
