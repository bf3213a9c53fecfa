import { Request, Response, NextFunction } from 'express';
import { processingSwitchesSchema, uploadResumeSchema } from '../../interfaces/dto/UploadResumeDto';
import { resolveClientIp } from '../../utils/clientIp';
import { AppError } from '../../utils/errorHandler';
import { ResumeService } from './resume.service';

function sessionIdOf(req: Request): string | undefined {
  const header = req.headers['session-id'];
  const value = Array.isArray(header) ? header[0] : header;
  return value || undefined;
}

export class ResumeController {
  constructor(private readonly resumeService: ResumeService) {}

  async uploadResume(req: Request, res: Response, next: NextFunction) {
    try {
      if (!req.file) {
        throw new AppError('Resume file is required in the "resume" field', 400);
      }
      const dto = uploadResumeSchema.parse(req.body);

      const result = await this.resumeService.uploadResume({
        buffer: req.file.buffer,
        fileName: req.file.originalname,
        level: dto.level,
        jobDescription: dto.job_description,
        ipAddress: resolveClientIp(req),
        sessionId: sessionIdOf(req)
      });

      res.json(result);
    } catch (error) {
      next(error);
    }
  }

  async getProcessingOptions(req: Request, res: Response, next: NextFunction) {
    try {
      res.json(this.resumeService.processingOptions());
    } catch (error) {
      next(error);
    }
  }

  async testProcessingSwitches(req: Request, res: Response, next: NextFunction) {
    try {
      const dto = processingSwitchesSchema.parse(req.body ?? {});
      res.json(this.resumeService.simulateSwitches(dto.processing_mode, dto.llm_provider));
    } catch (error) {
      next(error);
    }
  }

  async getIntelligentProcessingInfo(req: Request, res: Response, next: NextFunction) {
    try {
      res.json(this.resumeService.intelligentProcessingInfo());
    } catch (error) {
      next(error);
    }
  }

  async explainFileProcessing(req: Request, res: Response, next: NextFunction) {
    try {
      if (!req.file) {
        throw new AppError('File is required in the "file" field', 400);
      }
      res.json(this.resumeService.explainFile(req.file.originalname, req.file.size));
    } catch (error) {
      next(error);
    }
  }

  async downloadResume(req: Request, res: Response, next: NextFunction) {
    try {
      const { resumeId } = req.params;
      res.json(await this.resumeService.getDownload(resumeId));
    } catch (error) {
      next(error);
    }
  }

  async listUserResumes(req: Request, res: Response, next: NextFunction) {
    try {
      const { userId } = req.params;
      res.json(await this.resumeService.listUserResumes(userId));
    } catch (error) {
      next(error);
    }
  }

  async deleteResume(req: Request, res: Response, next: NextFunction) {
    try {
      const { resumeId } = req.params;
      res.json(await this.resumeService.deleteResume(resumeId));
    } catch (error) {
      next(error);
    }
  }

  async getS3Status(req: Request, res: Response, next: NextFunction) {
    try {
      res.json(this.resumeService.s3Status());
    } catch (error) {
      next(error);
    }
  }
}
