import express, { Express } from 'express';
import cors from 'cors';
import { EnvConfig } from './config/env';
import { errorMiddleware, notFoundHandler } from './middleware/error.middleware';
import { AdminAuthOptions } from './middleware/adminAuth.middleware';
import { createAdminRoutes } from './models/admin/admin.routes';
import { createResumeRoutes } from './models/resume/resume.routes';
import { ResumeService, ResumeServiceSettings } from './models/resume/resume.service';
import { ProcessingSelectionService } from './models/shared/processingSelection.service';
import { ResumeExtractionService } from './models/shared/resumeExtraction.service';
import { RuntimeConfigService } from './models/shared/runtimeConfig.service';
import { ProviderRegistry } from './providers/registry';
import { ResumeStore } from './repositories/resumeStore';
import { FileStorage } from './utils/s3Storage';
import { TextExtractor } from './utils/textParser';

export const SERVICE_NAME = 'Resume Intake API';
export const SERVICE_VERSION = '1.0.0';

export interface AppContext {
  store: ResumeStore;
  fileStorage: FileStorage;
  textExtractor: TextExtractor;
  providers: ProviderRegistry;
  runtimeConfig: RuntimeConfigService;
  auth: AdminAuthOptions;
  settings: ResumeServiceSettings & { uploadsPerMinute: number; trustProxyHops: number };
}

export type AppSettings = AppContext['settings'];

export function settingsFromEnv(config: EnvConfig): AppSettings {
  return {
    maxUploadBytes: config.MAX_UPLOAD_BYTES,
    sessionTtlHours: config.SESSION_TTL_HOURS,
    presignedUrlTtlSeconds: config.PRESIGNED_URL_TTL_SECONDS,
    uploadsPerMinute: config.UPLOAD_RATE_LIMIT_PER_MINUTE,
    trustProxyHops: config.TRUST_PROXY_HOPS
  };
}

export function createApp(context: AppContext): Express {
  const app = express();

  const selection = new ProcessingSelectionService(context.runtimeConfig, context.providers);
  const extraction = new ResumeExtractionService(context.providers, context.textExtractor);
  const resumeService = new ResumeService({
    store: context.store,
    fileStorage: context.fileStorage,
    textExtractor: context.textExtractor,
    providers: context.providers,
    runtimeConfig: context.runtimeConfig,
    selection,
    extraction,
    settings: context.settings
  });

  // Reverse proxies in front of the service; decides what req.ip reports
  if (context.settings.trustProxyHops > 0) {
    app.set('trust proxy', context.settings.trustProxyHops);
  }

  // Basic middleware
  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json({ limit: '10mb' }));
  app.use(express.urlencoded({ extended: true, limit: '10mb' }));

  app.get('/', (req, res) => {
    res.json({
      message: SERVICE_NAME,
      version: SERVICE_VERSION,
      features: [
        'Rule-based processing mode selection',
        'OpenAI, Groq and Anthropic extraction with automatic fallback',
        'Runtime configuration presets',
        'S3 file storage'
      ],
      docs: '/api/v1/processing_options'
    });
  });

  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      providers: context.providers.availability(),
      s3Enabled: context.fileStorage.enabled
    });
  });

  // Routes
  app.use('/api/v1/admin', createAdminRoutes({
    runtimeConfig: context.runtimeConfig,
    selection,
    providers: context.providers,
    auth: context.auth
  }));
  app.use('/api/v1', createResumeRoutes(resumeService, {
    maxUploadBytes: context.settings.maxUploadBytes,
    uploadsPerMinute: context.settings.uploadsPerMinute
  }));

  // Error handling
  app.use('*', notFoundHandler);
  app.use(errorMiddleware);

  return app;
}
