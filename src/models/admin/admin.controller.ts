import { Request, Response, NextFunction } from 'express';
import { isLlmProvider, LLM_PROVIDERS, ProcessingSettings } from '../../config/processing.config';
import { applyPresetSchema, updateConfigSchema } from '../../interfaces/dto/AdminConfigDto';
import { ProviderRegistry } from '../../providers/registry';
import { AppError } from '../../utils/errorHandler';
import { ProcessingSelectionService } from '../shared/processingSelection.service';
import { RuntimeConfigService } from '../shared/runtimeConfig.service';

const DEFAULT_SESSION_ID = 'default';

function sessionIdOf(req: Request): string {
  const header = req.headers['session-id'];
  const value = Array.isArray(header) ? header[0] : header;
  return value || DEFAULT_SESSION_ID;
}

export class AdminController {
  constructor(
    private readonly runtimeConfig: RuntimeConfigService,
    private readonly selection: ProcessingSelectionService,
    private readonly providers: ProviderRegistry
  ) {}

  async getCurrentConfig(req: Request, res: Response, next: NextFunction) {
    try {
      res.json({
        status: 'success',
        runtimeConfig: this.runtimeConfig.snapshot(),
        environmentVariables: this.runtimeConfig.environmentView(),
        availableProviders: this.providers.availability(),
        updateMethods: {
          api: 'POST /api/v1/admin/update_config',
          preset: 'POST /api/v1/admin/apply_preset',
          script: 'npm run config -- <command>'
        }
      });
    } catch (error) {
      next(error);
    }
  }

  async updateConfig(req: Request, res: Response, next: NextFunction) {
    try {
      const dto = updateConfigSchema.parse(req.body ?? {});

      const changes: Partial<ProcessingSettings> = {};
      if (dto.processing_mode !== undefined) changes.processingMode = dto.processing_mode;
      if (dto.provider_priority !== undefined) changes.providerPriority = dto.provider_priority;
      if (dto.cost_optimization !== undefined) changes.costOptimization = dto.cost_optimization;
      if (dto.auto_fallback !== undefined) changes.autoFallback = dto.auto_fallback;

      const changed = await this.runtimeConfig.update(changes);

      res.json({
        status: 'success',
        message: 'Configuration updated successfully',
        changes: changed,
        note: 'Changes take effect immediately for new uploads'
      });
    } catch (error) {
      next(error);
    }
  }

  async applyPreset(req: Request, res: Response, next: NextFunction) {
    try {
      const { preset } = applyPresetSchema.parse(req.body ?? {});
      const changes = await this.runtimeConfig.applyPreset(preset);

      res.json({
        status: 'success',
        message: `${preset.charAt(0).toUpperCase()}${preset.slice(1)} preset applied successfully`,
        preset,
        changes,
        note: 'Configuration changes take effect immediately'
      });
    } catch (error) {
      next(error);
    }
  }

  async testConfig(req: Request, res: Response, next: NextFunction) {
    try {
      const report = this.selection.testConfiguration();
      res.json({
        status: 'success',
        message: 'Configuration test completed',
        ...report
      });
    } catch (error) {
      next(error);
    }
  }

  async forceProvider(req: Request, res: Response, next: NextFunction) {
    try {
      const { provider } = req.params;
      if (!isLlmProvider(provider)) {
        throw new AppError(`Invalid provider '${provider}'. Valid options: ${LLM_PROVIDERS.join(', ')}`, 400);
      }

      const sessionId = sessionIdOf(req);
      this.runtimeConfig.forceProvider(sessionId, provider);

      res.json({
        status: 'success',
        message: `Provider '${provider}' forced for session ${sessionId}`,
        provider,
        sessionId,
        note: 'This override lasts until server restart'
      });
    } catch (error) {
      next(error);
    }
  }

  async clearSessionOverrides(req: Request, res: Response, next: NextFunction) {
    try {
      const sessionId = sessionIdOf(req);
      const cleared = this.runtimeConfig.clearSessionOverrides(sessionId);

      res.json({
        status: 'success',
        message: `Cleared ${cleared.length} session overrides`,
        clearedKeys: cleared,
        sessionId
      });
    } catch (error) {
      next(error);
    }
  }
}
