import { Router } from 'express';
import multer from 'multer';
import { RateLimiter } from '../../middleware/rateLimiter.middleware';
import { AppError } from '../../utils/errorHandler';
import { ResumeController } from './resume.controller';
import { ResumeService, UNSUPPORTED_FILE_TYPE_MESSAGE, isSupportedUpload } from './resume.service';

export interface ResumeRoutesOptions {
  maxUploadBytes: number;
  uploadsPerMinute: number;
}

export function createResumeRoutes(resumeService: ResumeService, options: ResumeRoutesOptions): Router {
  const router = Router();
  const controller = new ResumeController(resumeService);

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: options.maxUploadBytes
    }
  });

  // Type is checked when the file part starts, ahead of the size limit and form fields
  const resumeUpload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: options.maxUploadBytes
    },
    fileFilter: (req, file, cb) => {
      if (!isSupportedUpload(file.originalname)) {
        cb(new AppError(UNSUPPORTED_FILE_TYPE_MESSAGE, 415));
        return;
      }
      cb(null, true);
    }
  });

  const uploadLimiter = new RateLimiter({
    windowMs: 60 * 1000,
    maxRequests: options.uploadsPerMinute
  });

  // POST /api/v1/upload_resume - Process a resume upload
  router.post(
    '/upload_resume',
    uploadLimiter.middleware(),
    resumeUpload.single('resume'),
    controller.uploadResume.bind(controller)
  );

  // POST /api/v1/explain_file_processing - Preview the strategy for a file
  router.post(
    '/explain_file_processing',
    uploadLimiter.middleware(),
    upload.single('file'),
    controller.explainFileProcessing.bind(controller)
  );

  // GET /api/v1/processing_options - Modes, providers and recommendations
  router.get('/processing_options', controller.getProcessingOptions.bind(controller));

  // POST /api/v1/test_processing_switches - Preview a manual mode/provider pick
  router.post('/test_processing_switches', upload.none(), controller.testProcessingSwitches.bind(controller));

  // GET /api/v1/intelligent_processing_info - Current configuration and sample selections
  router.get('/intelligent_processing_info', controller.getIntelligentProcessingInfo.bind(controller));

  // GET /api/v1/download/:resumeId - Presigned download URL
  router.get('/download/:resumeId', controller.downloadResume.bind(controller));

  // GET /api/v1/user/:userId/resumes - Resumes of a user, newest first
  router.get('/user/:userId/resumes', controller.listUserResumes.bind(controller));

  // DELETE /api/v1/delete/:resumeId - Remove a resume and its stored file
  router.delete('/delete/:resumeId', controller.deleteResume.bind(controller));

  // GET /api/v1/s3/status - File storage status
  router.get('/s3/status', controller.getS3Status.bind(controller));

  return router;
}
