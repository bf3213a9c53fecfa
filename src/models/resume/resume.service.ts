import { v4 as uuidv4 } from 'uuid';
import {
  PRESET_NAMES,
  ProcessingMode,
  ProviderAvailability,
  ProviderPreference,
  fileExtensionOf
} from '../../config/processing.config';
import { JobLevel, ResumeRecord, StorageDetails, UserRecord } from '../../interfaces/domain/Records';
import { ResumeData } from '../../interfaces/domain/ResumeData';
import { ResumeValidationResult } from '../../interfaces/domain/ResumeValidation';
import { ProviderRegistry } from '../../providers/registry';
import { DOCX_MIME_TYPE, ExtractionMethod, PDF_MIME_TYPE } from '../../providers/types';
import { DuplicateUserError, ResumeStore } from '../../repositories/resumeStore';
import { extractEmails } from '../../utils/emailExtractor';
import { AppError } from '../../utils/errorHandler';
import { describeError, logger } from '../../utils/logger';
import { FileStorage, StoredFileInfo } from '../../utils/s3Storage';
import { SUPPORTED_UPLOAD_EXTENSIONS, TextExtractor } from '../../utils/textParser';
import {
  ProcessingExplanation,
  ProcessingSelectionService,
  SampleSelection,
  SwitchSimulation
} from '../shared/processingSelection.service';
import { ResumeExtractionService } from '../shared/resumeExtraction.service';
import { ResumeSection, missingSections, validateResumeData } from '../shared/resumeValidation';
import { RuntimeConfigService, RuntimeConfigSnapshot } from '../shared/runtimeConfig.service';

export interface ResumeServiceSettings {
  maxUploadBytes: number;
  sessionTtlHours: number;
  presignedUrlTtlSeconds: number;
}

export interface ResumeServiceDeps {
  store: ResumeStore;
  fileStorage: FileStorage;
  textExtractor: TextExtractor;
  providers: ProviderRegistry;
  runtimeConfig: RuntimeConfigService;
  selection: ProcessingSelectionService;
  extraction: ResumeExtractionService;
  settings: ResumeServiceSettings;
}

export interface UploadResumeInput {
  buffer: Buffer;
  fileName: string;
  level: JobLevel;
  jobDescription?: string;
  ipAddress: string;
  sessionId?: string;
}

export interface S3UploadInfo {
  uploaded: boolean;
  attempted: boolean;
  bucket?: string;
  key?: string;
  url?: string;
  publicUrl?: string;
  reason?: string;
}

export interface UploadResumeResult {
  status: 'success';
  sessionId: string;
  userId: string;
  resumeId: string;
  extractedEmail: string | null;
  extractionConfidence: number;
  llmProviderUsed: string;
  extractionMethod: ExtractionMethod;
  processingModeUsed: ProcessingMode;
  llmProviderSelected: string;
  selectionReasoning: string;
  autoDetectedIp: string;
  fileInfo: {
    fileName: string;
    size: number;
    storageLocation: 's3' | 'metadata_only';
    filePath: string;
  };
  extractedData: {
    personalInfo: ResumeData['personal_info'];
    skillsCount: number;
    experienceCount: number;
    educationCount: number;
    projectsCount: number;
    achievementsCount: number;
  };
  validation: ResumeValidationResult;
  verificationNeeded: boolean;
  s3Info: S3UploadInfo;
  message: string;
}

export interface ResumeSummary {
  resumeId: string;
  fileName: string;
  uploadDate: Date;
  fileSize: number;
  extractionConfidence: number;
  processingMode: ProcessingMode;
  llmProvider: string;
  level: JobLevel;
  storageType: StorageDetails['type'];
  s3Available: boolean;
  downloadUrl?: string;
  downloadExpiresIn?: number;
}

export const UNSUPPORTED_FILE_TYPE_MESSAGE = 'Invalid file type. Only PDF and DOCX are supported.';

export function isSupportedUpload(fileName: string): boolean {
  return SUPPORTED_UPLOAD_EXTENSIONS.includes(fileExtensionOf(fileName));
}

const CRITICAL_SECTIONS: Record<ProcessingMode, ResumeSection[]> = {
  complete_llm: ['personal_info'],
  hybrid: ['personal_info', 'skills', 'experience']
};

const MIME_TYPES: Record<string, string> = {
  '.pdf': PDF_MIME_TYPE,
  '.docx': DOCX_MIME_TYPE
};

function countOf(value: unknown[] | null | undefined): number {
  return value ? value.length : 0;
}

export class ResumeService {
  private readonly store: ResumeStore;
  private readonly fileStorage: FileStorage;
  private readonly textExtractor: TextExtractor;
  private readonly providers: ProviderRegistry;
  private readonly runtimeConfig: RuntimeConfigService;
  private readonly selection: ProcessingSelectionService;
  private readonly extraction: ResumeExtractionService;
  private readonly settings: ResumeServiceSettings;

  constructor(deps: ResumeServiceDeps) {
    this.store = deps.store;
    this.fileStorage = deps.fileStorage;
    this.textExtractor = deps.textExtractor;
    this.providers = deps.providers;
    this.runtimeConfig = deps.runtimeConfig;
    this.selection = deps.selection;
    this.extraction = deps.extraction;
    this.settings = deps.settings;
  }

  async uploadResume(input: UploadResumeInput): Promise<UploadResumeResult> {
    const { buffer, fileName, level, ipAddress } = input;
    const extension = fileExtensionOf(fileName);

    if (!isSupportedUpload(fileName)) {
      throw new AppError(UNSUPPORTED_FILE_TYPE_MESSAGE, 415);
    }
    if (buffer.length > this.settings.maxUploadBytes) {
      const maxMb = Math.round(this.settings.maxUploadBytes / (1024 * 1024));
      throw new AppError(`File too large. Maximum size is ${maxMb}MB.`, 413);
    }

    const strategy = this.selection.selectStrategy(fileName, buffer.length, { sessionId: input.sessionId });
    let mode = strategy.mode;
    let rawText: string | null = null;
    let harvestedEmails: string[] = [];

    if (mode === 'hybrid') {
      try {
        rawText = await this.textExtractor.extractText(buffer, fileName);
        if (!rawText) {
          logger.warn('Library extraction returned no text, switching to complete_llm', { fileName });
          mode = 'complete_llm';
        }
      } catch (error) {
        logger.warn('Library extraction failed, switching to complete_llm', {
          fileName,
          reason: describeError(error)
        });
        rawText = null;
        mode = 'complete_llm';
      }
      if (rawText) {
        harvestedEmails = extractEmails(rawText);
      }
    }

    const config = this.runtimeConfig.snapshot();
    const extraction = await this.extraction.extract({
      file: { buffer, fileName, mimeType: MIME_TYPES[extension] },
      text: rawText,
      mode,
      provider: strategy.provider,
      autoFallback: config.autoFallback,
      priority: config.providerPriority
    });
    rawText = extraction.text ?? rawText;

    const harvestedEmail = harvestedEmails[0] ?? null;
    let data = extraction.data;
    if (harvestedEmail && !data.personal_info?.email) {
      data = { ...data, personal_info: { ...data.personal_info, email: harvestedEmail } };
    }

    const finalEmail = data.personal_info?.email || harvestedEmail;
    if (!finalEmail) {
      if (mode === 'hybrid') {
        throw new AppError(
          'No email address found in resume. Please ensure your resume contains a valid email address.',
          400
        );
      }
      logger.warn('No email found in complete_llm mode, storing user without primary email', { fileName });
    }

    const missing = missingSections(data, CRITICAL_SECTIONS[mode]);
    if (missing.length > 0) {
      throw new AppError(
        `Critical resume sections missing: ${missing.join(', ')}. Please ensure your resume contains complete information.`,
        400
      );
    }

    const validation = validateResumeData(data, extraction.confidence);
    if (!validation.isValid) {
      logger.info('Extracted resume is incomplete', {
        fileName,
        missingFields: validation.missingFields,
        validationErrors: validation.validationErrors
      });
    }

    const { user, isNew } = await this.findOrCreateUser(finalEmail, data, harvestedEmails);

    const now = new Date();
    const sessionId = uuidv4();
    await this.store.createSession({
      sessionId,
      userId: user.userId,
      extractedEmail: finalEmail,
      ipAddress,
      status: 'active',
      createdAt: now,
      expiresAt: new Date(now.getTime() + this.settings.sessionTtlHours * 60 * 60 * 1000)
    });

    const { stored, storage } = await this.storeFile(buffer, fileName, user.userId, MIME_TYPES[extension]);
    const filePath = stored ? `s3://${stored.bucket}/${stored.key}` : `local://${fileName}`;

    const resumeId = uuidv4();
    const record: ResumeRecord = {
      resumeId,
      sessionId,
      userId: user.userId,
      fileName,
      filePath,
      fileSize: buffer.length,
      rawText: rawText ?? 'Processed directly by LLM',
      jsonData: data,
      extractionConfidence: extraction.confidence,
      level,
      jobDescription: input.jobDescription ?? null,
      extractionMethod: extraction.method,
      llmProviderUsed: extraction.provider,
      processingMode: mode,
      libraryExtractedEmails: harvestedEmails,
      autoDetectedIp: ipAddress,
      intelligentSelection: {
        processingModeSelected: strategy.mode,
        llmProviderSelected: strategy.provider,
        selectionReasoning: strategy.reasoning,
        autoSelected: true
      },
      storage,
      createdAt: now
    };
    await this.store.saveResume(record);

    logger.info('Resume processed', {
      resumeId,
      userId: user.userId,
      mode,
      provider: extraction.provider,
      method: extraction.method
    });

    return {
      status: 'success',
      sessionId,
      userId: user.userId,
      resumeId,
      extractedEmail: finalEmail,
      extractionConfidence: extraction.confidence,
      llmProviderUsed: extraction.provider,
      extractionMethod: extraction.method,
      processingModeUsed: mode,
      llmProviderSelected: strategy.provider,
      selectionReasoning: strategy.reasoning,
      autoDetectedIp: ipAddress,
      fileInfo: {
        fileName,
        size: buffer.length,
        storageLocation: stored ? 's3' : 'metadata_only',
        filePath
      },
      extractedData: {
        personalInfo: data.personal_info ?? {},
        skillsCount: countOf(data.skills?.technical_skills),
        experienceCount: countOf(data.experience),
        educationCount: countOf(data.education),
        projectsCount: countOf(data.projects),
        achievementsCount: countOf(data.achievements)
      },
      validation,
      verificationNeeded: isNew,
      s3Info: stored
        ? {
            uploaded: true,
            attempted: true,
            bucket: stored.bucket,
            key: stored.key,
            url: stored.url,
            publicUrl: stored.publicUrl
          }
        : {
            uploaded: false,
            attempted: storage.uploadAttempted,
            reason: storage.errorReason
          },
      message: `Resume processed successfully using ${mode} mode with ${extraction.provider} LLM`
    };
  }

  processingOptions() {
    const availability = this.providers.availability();
    return {
      processingModes: {
        hybrid: {
          description: 'Library extraction + LLM processing',
          advantages: ['Fast', 'Cost-effective', 'Reliable fallback', 'Good for simple resumes'],
          bestFor: 'Standard resumes, high-volume processing, cost optimization'
        },
        complete_llm: {
          description: 'Direct file upload to LLM only',
          advantages: ['Best context understanding', 'Handles complex layouts', 'Superior accuracy'],
          bestFor: 'Complex resumes, creative layouts, maximum accuracy needed'
        }
      },
      llmProviders: {
        auto: {
          description: 'Smart automatic selection',
          logic: 'Chooses best provider based on processing mode and availability'
        },
        openai: {
          description: 'OpenAI GPT-4o',
          advantages: ['Best accuracy', 'File upload support', 'Complex document understanding'],
          available: availability.openai,
          bestFor: 'Maximum accuracy, complex documents, direct file processing'
        },
        groq: {
          description: 'Groq hosted Llama',
          advantages: ['Fastest processing', 'Cost-effective', 'Good accuracy'],
          available: availability.groq,
          bestFor: 'High-volume processing, speed optimization, text processing'
        },
        anthropic: {
          description: 'Anthropic Claude',
          advantages: ['Excellent reasoning', 'Large context', 'Good accuracy'],
          available: availability.anthropic,
          bestFor: 'Complex analysis, large documents, detailed extraction'
        }
      },
      recommendations: {
        costOptimized: {
          processingMode: 'hybrid',
          llmProvider: 'groq',
          description: 'Fastest and most cost-effective option'
        },
        accuracyOptimized: {
          processingMode: 'complete_llm',
          llmProvider: 'openai',
          description: 'Best accuracy and context understanding'
        },
        balanced: {
          processingMode: 'hybrid',
          llmProvider: 'auto',
          description: 'Good balance of speed, cost, and accuracy'
        }
      },
      currentStatus: {
        availableProviders: availability,
        defaultProcessingMode: this.runtimeConfig.snapshot().processingMode,
        defaultLlmProvider: 'auto'
      }
    };
  }

  simulateSwitches(mode: ProcessingMode, requested: ProviderPreference): SwitchSimulation {
    return this.selection.simulateSwitches(mode, requested);
  }

  intelligentProcessingInfo(): {
    status: 'success';
    currentConfiguration: RuntimeConfigSnapshot;
    sampleSelections: Record<string, SampleSelection>;
    availableProviders: ProviderAvailability;
    configurationHelp: {
      changeSettings: string;
      presetsAvailable: readonly string[];
      environmentVariables: string[];
    };
  } {
    const report = this.selection.testConfiguration();
    return {
      status: 'success',
      currentConfiguration: report.configuration,
      sampleSelections: report.testResults,
      availableProviders: report.availableProviders,
      configurationHelp: {
        changeSettings: 'Use the admin API or `npm run config` to modify configuration',
        presetsAvailable: PRESET_NAMES,
        environmentVariables: Object.keys(this.runtimeConfig.environmentView())
      }
    };
  }

  explainFile(fileName: string, sizeBytes: number): ProcessingExplanation & { status: 'success'; message: string } {
    return {
      status: 'success',
      message: `Processing explanation for ${fileName}`,
      ...this.selection.explain(fileName, sizeBytes)
    };
  }

  async getDownload(resumeId: string) {
    const resume = await this.store.findResume(resumeId);
    if (!resume) {
      throw new AppError('Resume not found', 404);
    }
    if (!resume.storage.key) {
      throw new AppError('Resume file not stored in S3', 404);
    }

    let downloadUrl: string;
    try {
      downloadUrl = await this.fileStorage.presignedDownloadUrl(
        resume.storage.key,
        this.settings.presignedUrlTtlSeconds
      );
    } catch (error) {
      logger.error('Presigned URL generation failed', { resumeId, reason: describeError(error) });
      throw new AppError('Failed to generate download URL', 500);
    }

    return {
      status: 'success',
      resumeId,
      fileName: resume.fileName,
      downloadUrl,
      expiresIn: this.settings.presignedUrlTtlSeconds,
      fileSize: resume.fileSize,
      uploadDate: resume.createdAt
    };
  }

  async listUserResumes(userId: string) {
    const resumes = await this.store.listResumesByUser(userId);
    const summaries: ResumeSummary[] = [];

    for (const resume of resumes) {
      const summary: ResumeSummary = {
        resumeId: resume.resumeId,
        fileName: resume.fileName,
        uploadDate: resume.createdAt,
        fileSize: resume.fileSize,
        extractionConfidence: resume.extractionConfidence,
        processingMode: resume.processingMode,
        llmProvider: resume.llmProviderUsed,
        level: resume.level,
        storageType: resume.storage.type,
        s3Available: Boolean(resume.storage.key)
      };

      if (resume.storage.key && this.fileStorage.enabled) {
        try {
          summary.downloadUrl = await this.fileStorage.presignedDownloadUrl(
            resume.storage.key,
            this.settings.presignedUrlTtlSeconds
          );
          summary.downloadExpiresIn = this.settings.presignedUrlTtlSeconds;
        } catch (error) {
          logger.warn('Skipping download URL for resume', {
            resumeId: resume.resumeId,
            reason: describeError(error)
          });
        }
      }

      summaries.push(summary);
    }

    return {
      status: 'success',
      userId,
      resumes: summaries,
      totalCount: summaries.length,
      s3Enabled: this.fileStorage.enabled
    };
  }

  async deleteResume(resumeId: string) {
    const resume = await this.store.findResume(resumeId);
    if (!resume) {
      throw new AppError('Resume not found', 404);
    }

    const s3FileDeleted = resume.storage.key
      ? await this.fileStorage.deleteObject(resume.storage.key)
      : false;

    const deleted = await this.store.deleteResume(resumeId);
    if (!deleted) {
      throw new AppError('Failed to delete resume metadata', 500);
    }

    logger.info('Resume deleted', { resumeId, s3FileDeleted });
    return {
      status: 'success',
      resumeId,
      fileName: resume.fileName,
      metadataDeleted: true,
      s3FileDeleted,
      message: 'Resume deleted successfully'
    };
  }

  s3Status() {
    const enabled = this.fileStorage.enabled;
    return {
      s3Enabled: enabled,
      bucketName: enabled ? this.fileStorage.bucket : null,
      awsRegion: this.fileStorage.region,
      status: enabled ? 'connected' : 'not_configured'
    };
  }

  private async findOrCreateUser(
    email: string | null,
    data: ResumeData,
    harvestedEmails: string[]
  ): Promise<{ user: UserRecord; isNew: boolean }> {
    if (email) {
      const existing = await this.store.findUserByEmail(email);
      if (existing) {
        return { user: existing, isNew: false };
      }
    }

    const personal = data.personal_info;
    const user: UserRecord = {
      userId: uuidv4(),
      // Left out without an email so the sparse unique index skips the document
      ...(email ? { primaryEmail: email } : {}),
      alternateEmails: harvestedEmails.filter(candidate => candidate !== email),
      phone: personal?.phone ?? null,
      linkedin: personal?.linkedin ?? null,
      name: personal?.name ?? null,
      verificationStatus: 'pending',
      createdAt: new Date(),
      updatedAt: null
    };

    try {
      await this.store.createUser(user);
    } catch (error) {
      if (!(error instanceof DuplicateUserError) || !email) {
        throw error;
      }
      // Another upload created the user between the lookup and the insert
      const existing = await this.store.findUserByEmail(email);
      if (!existing) {
        throw error;
      }
      logger.info('User created concurrently, reusing it', { userId: existing.userId });
      return { user: existing, isNew: false };
    }

    logger.info('User created', { userId: user.userId, hasEmail: email !== null });
    return { user, isNew: true };
  }

  private async storeFile(
    buffer: Buffer,
    fileName: string,
    userId: string,
    contentType: string
  ): Promise<{ stored: StoredFileInfo | null; storage: StorageDetails }> {
    if (!this.fileStorage.enabled) {
      return {
        stored: null,
        storage: {
          type: 'local_metadata_only',
          uploadAttempted: false,
          uploadSuccess: false,
          errorReason: 'S3 not enabled (check AWS credentials and configuration)'
        }
      };
    }

    try {
      const stored = await this.fileStorage.uploadResume(buffer, fileName, userId, contentType);
      return {
        stored,
        storage: {
          type: 's3',
          uploadAttempted: true,
          uploadSuccess: true,
          bucket: stored.bucket,
          key: stored.key,
          url: stored.url,
          publicUrl: stored.publicUrl
        }
      };
    } catch (error) {
      const reason = `S3 upload exception: ${describeError(error)}`;
      logger.error('S3 upload failed, keeping metadata only', { fileName, reason });
      return {
        stored: null,
        storage: {
          type: 'local_metadata_only',
          uploadAttempted: true,
          uploadSuccess: false,
          errorReason: reason
        }
      };
    }
  }
}
