import { Entity, ObjectIdColumn, Column, Index } from 'typeorm';
import { ObjectId } from 'mongodb';
import { LlmProvider, ProcessingMode } from '../config/processing.config';
import {
  JobLevel,
  ResumeRecord,
  SelectionDetails,
  StorageDetails
} from '../interfaces/domain/Records';
import { ResumeData } from '../interfaces/domain/ResumeData';

@Entity({ name: 'resumes' })
export class Resume implements ResumeRecord {
  @ObjectIdColumn()
  _id!: ObjectId;

  @Index({ unique: true })
  @Column()
  resumeId!: string;

  @Column()
  sessionId!: string;

  @Index()
  @Column()
  userId!: string;

  @Column()
  fileName!: string;

  @Column()
  filePath!: string;

  @Column()
  fileSize!: number;

  @Column()
  rawText!: string;

  @Column()
  jsonData!: ResumeData;

  @Column()
  extractionConfidence!: number;

  @Column()
  level!: JobLevel;

  @Column({ nullable: true })
  jobDescription!: string | null;

  @Column()
  extractionMethod!: string;

  @Column()
  llmProviderUsed!: LlmProvider;

  @Column()
  processingMode!: ProcessingMode;

  @Column()
  libraryExtractedEmails!: string[];

  @Column()
  autoDetectedIp!: string;

  @Column()
  intelligentSelection!: SelectionDetails;

  @Column()
  storage!: StorageDetails;

  @Column()
  createdAt!: Date;
}
