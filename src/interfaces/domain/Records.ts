import { LlmProvider, ProcessingMode } from '../../config/processing.config';
import { ResumeData } from './ResumeData';

export type JobLevel = 'entry' | 'mid' | 'senior';

export type VerificationStatus = 'pending' | 'verified';

export interface UserRecord {
  userId: string;
  // Absent when the resume carried no email
  primaryEmail?: string;
  alternateEmails: string[];
  phone: string | null;
  linkedin: string | null;
  name: string | null;
  verificationStatus: VerificationStatus;
  createdAt: Date;
  updatedAt: Date | null;
}

export interface SessionRecord {
  sessionId: string;
  userId: string;
  extractedEmail: string | null;
  ipAddress: string;
  status: 'active' | 'expired';
  createdAt: Date;
  expiresAt: Date;
}

export interface SelectionDetails {
  processingModeSelected: ProcessingMode;
  llmProviderSelected: LlmProvider;
  selectionReasoning: string;
  autoSelected: boolean;
}

export interface StorageDetails {
  type: 's3' | 'local_metadata_only';
  uploadAttempted: boolean;
  uploadSuccess: boolean;
  bucket?: string;
  key?: string;
  url?: string;
  publicUrl?: string;
  errorReason?: string;
}

export interface ResumeRecord {
  resumeId: string;
  sessionId: string;
  userId: string;
  fileName: string;
  filePath: string;
  fileSize: number;
  rawText: string;
  jsonData: ResumeData;
  extractionConfidence: number;
  level: JobLevel;
  jobDescription: string | null;
  extractionMethod: string;
  llmProviderUsed: LlmProvider;
  processingMode: ProcessingMode;
  libraryExtractedEmails: string[];
  autoDetectedIp: string;
  intelligentSelection: SelectionDetails;
  storage: StorageDetails;
  createdAt: Date;
}
