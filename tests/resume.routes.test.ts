import request from 'supertest';
import { createApp } from '../src/app';
import { RuntimeConfigService } from '../src/models/shared/runtimeConfig.service';
import { DOCX_MIME_TYPE } from '../src/providers/types';
import {
  FakeFileStorage,
  FakeProvider,
  FakeTextExtractor,
  InMemoryResumeStore,
  SAMPLE_RESUME,
  TEST_SETTINGS,
  buildContext,
  registryOf
} from './support/fakes';

const RESUME_TEXT = 'Jane Doe\njane@example.com\nEngineer at Acme';

function uploadDocx(app: ReturnType<typeof createApp>, fileName = 'cv.docx') {
  return request(app)
    .post('/api/v1/upload_resume')
    .field('level', 'mid')
    .attach('resume', Buffer.from('PK docx body'), fileName);
}

describe('POST /api/v1/upload_resume', () => {
  it('processes a DOCX upload in hybrid mode', async () => {
    const store = new InMemoryResumeStore();
    const app = createApp(buildContext({ store }));

    const response = await uploadDocx(app).set('X-Forwarded-For', '203.0.113.9');

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({
      status: 'success',
      extractedEmail: 'jane@example.com',
      extractionConfidence: 0.85,
      llmProviderUsed: 'groq',
      extractionMethod: 'text_extraction',
      processingModeUsed: 'hybrid',
      llmProviderSelected: 'groq',
      selectionReasoning:
        'Rule-based: DOCX files extract well with libraries, hybrid is efficient | Already using cost-effective provider',
      autoDetectedIp: '203.0.113.9',
      fileInfo: {
        fileName: 'cv.docx',
        size: 12,
        storageLocation: 'metadata_only',
        filePath: 'local://cv.docx'
      },
      extractedData: {
        skillsCount: 3,
        experienceCount: 1,
        educationCount: 1,
        projectsCount: 1,
        achievementsCount: 0
      },
      verificationNeeded: true,
      s3Info: {
        uploaded: false,
        attempted: false,
        reason: 'S3 not enabled (check AWS credentials and configuration)'
      },
      message: 'Resume processed successfully using hybrid mode with groq LLM'
    });

    expect(store.users).toHaveLength(1);
    expect(store.users[0]).toMatchObject({
      userId: response.body.userId,
      primaryEmail: 'jane@example.com',
      alternateEmails: [],
      name: 'Jane Doe',
      verificationStatus: 'pending'
    });
    expect(store.sessions[0]).toMatchObject({
      sessionId: response.body.sessionId,
      ipAddress: '203.0.113.9',
      status: 'active'
    });
    expect(store.sessions[0].expiresAt.getTime() - store.sessions[0].createdAt.getTime()).toBe(24 * 60 * 60 * 1000);
    expect(store.resumes[0]).toMatchObject({
      resumeId: response.body.resumeId,
      rawText: RESUME_TEXT,
      level: 'mid',
      jobDescription: null,
      libraryExtractedEmails: ['jane@example.com'],
      intelligentSelection: { processingModeSelected: 'hybrid', llmProviderSelected: 'groq', autoSelected: true }
    });
  });

  it('reuses an existing user with the same email', async () => {
    const store = new InMemoryResumeStore();
    const app = createApp(buildContext({ store }));

    const first = await uploadDocx(app);
    const second = await uploadDocx(app);

    expect(second.body.verificationNeeded).toBe(false);
    expect(second.body.userId).toBe(first.body.userId);
    expect(store.users).toHaveLength(1);
    expect(store.resumes).toHaveLength(2);
  });

  it('rejects unsupported file types', async () => {
    const app = createApp(buildContext());

    const response = await uploadDocx(app, 'cv.txt');

    expect(response.status).toBe(415);
    expect(response.body).toEqual({ error: 'Invalid file type. Only PDF and DOCX are supported.' });
  });

  it('rejects files above the upload limit', async () => {
    const app = createApp(buildContext({ settings: { ...TEST_SETTINGS, maxUploadBytes: 8 } }));

    const response = await uploadDocx(app);

    expect(response.status).toBe(413);
    expect(response.body).toEqual({ error: 'File too large' });
  });

  it('reports the file type before the level', async () => {
    const app = createApp(buildContext());

    const response = await request(app)
      .post('/api/v1/upload_resume')
      .field('level', 'principal')
      .attach('resume', Buffer.from('plain text'), 'cv.txt');

    expect(response.status).toBe(415);
    expect(response.body).toEqual({ error: 'Invalid file type. Only PDF and DOCX are supported.' });
  });

  it('reports the file type before the size limit', async () => {
    const app = createApp(buildContext({ settings: { ...TEST_SETTINGS, maxUploadBytes: 8 } }));

    const response = await uploadDocx(app, 'cv.txt');

    expect(response.status).toBe(415);
  });

  it('requires a valid level', async () => {
    const app = createApp(buildContext());

    const response = await request(app)
      .post('/api/v1/upload_resume')
      .field('level', 'principal')
      .attach('resume', Buffer.from('PK docx body'), 'cv.docx');

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      error: 'Invalid request',
      details: [{ field: 'level', message: 'level must be one of: entry, mid, senior' }]
    });
  });

  it('requires a file', async () => {
    const app = createApp(buildContext());

    const response = await request(app).post('/api/v1/upload_resume').field('level', 'mid');

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: 'Resume file is required in the "resume" field' });
  });

  it('rejects a hybrid upload without an email address', async () => {
    const app = createApp(buildContext({
      textExtractor: new FakeTextExtractor('Jane Doe\nEngineer at Acme'),
      providers: registryOf(new FakeProvider('groq', {
        text: { ...SAMPLE_RESUME, personal_info: { name: 'Jane Doe' } }
      }))
    }));

    const response = await uploadDocx(app);

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      error: 'No email address found in resume. Please ensure your resume contains a valid email address.'
    });
  });

  it('stores a complete_llm upload without an email address', async () => {
    const store = new InMemoryResumeStore();
    const app = createApp(buildContext({
      store,
      runtimeConfig: new RuntimeConfigService({ source: { ENABLE_COST_OPTIMIZATION: 'false' } }),
      providers: registryOf(new FakeProvider('openai', {
        file: { personal_info: { name: 'Jane Doe' } }
      }))
    }));

    const response = await request(app)
      .post('/api/v1/upload_resume')
      .field('level', 'senior')
      .attach('resume', Buffer.from('%PDF-1.4 body'), 'cv.pdf');

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({
      extractedEmail: null,
      processingModeUsed: 'complete_llm',
      llmProviderUsed: 'openai',
      extractionMethod: 'direct_file',
      extractionConfidence: 0.95
    });
    expect(store.users[0]).not.toHaveProperty('primaryEmail');
    expect(store.resumes[0].rawText).toBe('Processed directly by LLM');
  });

  it('stores each upload without an email as its own user', async () => {
    const store = new InMemoryResumeStore();
    const app = createApp(buildContext({
      store,
      runtimeConfig: new RuntimeConfigService({ source: { ENABLE_COST_OPTIMIZATION: 'false' } }),
      providers: registryOf(new FakeProvider('openai', {
        file: { personal_info: { name: 'Jane Doe' } }
      }))
    }));
    const uploadPdf = () =>
      request(app).post('/api/v1/upload_resume').field('level', 'mid').attach('resume', Buffer.from('%PDF-1.4'), 'cv.pdf');

    const first = await uploadPdf();
    const second = await uploadPdf();

    expect(first.status).toBe(200);
    expect(second.status).toBe(200);
    expect(second.body.userId).not.toBe(first.body.userId);
    expect(store.users).toHaveLength(2);
  });

  it('reuses a user created by a concurrent upload', async () => {
    class RacingStore extends InMemoryResumeStore {
      private lookups = 0;

      async findUserByEmail(email: string) {
        this.lookups += 1;
        return this.lookups === 1 ? null : super.findUserByEmail(email);
      }
    }
    const store = new RacingStore();
    store.users.push({
      userId: 'existing-user',
      primaryEmail: 'jane@example.com',
      alternateEmails: [],
      phone: null,
      linkedin: null,
      name: 'Jane Doe',
      verificationStatus: 'pending',
      createdAt: new Date('2024-01-01T00:00:00Z'),
      updatedAt: null
    });
    const app = createApp(buildContext({ store }));

    const response = await uploadDocx(app);

    expect(response.status).toBe(200);
    expect(response.body.userId).toBe('existing-user');
    expect(response.body.verificationNeeded).toBe(false);
    expect(store.users).toHaveLength(1);
    expect(store.sessions[0].userId).toBe('existing-user');
  });

  it('rejects a hybrid upload missing critical sections', async () => {
    const app = createApp(buildContext({
      providers: registryOf(new FakeProvider('groq', {
        text: { personal_info: { name: 'Jane Doe', email: 'jane@example.com' } }
      }))
    }));

    const response = await uploadDocx(app);

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      error: 'Critical resume sections missing: skills, experience. Please ensure your resume contains complete information.'
    });
  });

  it('reports a text-only provider that cannot get text', async () => {
    const app = createApp(buildContext({
      textExtractor: new FakeTextExtractor(new Error('bad docx')),
      providers: registryOf(new FakeProvider('groq'))
    }));

    const response = await uploadDocx(app);

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ error: 'Provider groq requires text but text extraction failed: bad docx' });
  });

  it('uploads the file to S3 when enabled', async () => {
    const fileStorage = new FakeFileStorage(true);
    const app = createApp(buildContext({ fileStorage }));

    const response = await uploadDocx(app);
    const key = `resumes/${response.body.userId}/upload_1.pdf`;

    expect(response.body.fileInfo).toMatchObject({ storageLocation: 's3', filePath: `s3://test-bucket/${key}` });
    expect(response.body.s3Info).toEqual({
      uploaded: true,
      attempted: true,
      bucket: 'test-bucket',
      key,
      url: `https://test-bucket.s3.us-east-1.amazonaws.com/${key}`,
      publicUrl: `https://test-bucket.s3.us-east-1.amazonaws.com/${key}`
    });
    expect(fileStorage.uploads).toEqual([
      { fileName: 'cv.docx', userId: response.body.userId, contentType: DOCX_MIME_TYPE }
    ]);
  });

  it('keeps the resume when the S3 upload fails', async () => {
    const fileStorage = new FakeFileStorage(true);
    fileStorage.failUploads = true;
    const store = new InMemoryResumeStore();
    const app = createApp(buildContext({ fileStorage, store }));

    const response = await uploadDocx(app);

    expect(response.status).toBe(200);
    expect(response.body.s3Info).toEqual({
      uploaded: false,
      attempted: true,
      reason: 'S3 upload exception: Access Denied'
    });
    expect(store.resumes[0].storage).toEqual({
      type: 'local_metadata_only',
      uploadAttempted: true,
      uploadSuccess: false,
      errorReason: 'S3 upload exception: Access Denied'
    });
  });

  it('uses the provider forced for the session', async () => {
    const runtimeConfig = new RuntimeConfigService({ source: {} });
    runtimeConfig.forceProvider('session-1', 'anthropic');
    const app = createApp(buildContext({ runtimeConfig }));

    const response = await uploadDocx(app).set('session-id', 'session-1');

    expect(response.body.llmProviderUsed).toBe('anthropic');
    expect(response.body.selectionReasoning).toBe(
      'Rule-based: DOCX files extract well with libraries, hybrid is efficient | Already using cost-effective provider | Session override: anthropic'
    );
  });
});

describe('resume management routes', () => {
  it('returns a presigned download URL', async () => {
    const app = createApp(buildContext({ fileStorage: new FakeFileStorage(true) }));
    const upload = await uploadDocx(app);

    const response = await request(app).get(`/api/v1/download/${upload.body.resumeId}`);

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({
      status: 'success',
      resumeId: upload.body.resumeId,
      fileName: 'cv.docx',
      downloadUrl: `https://signed.example/${upload.body.s3Info.key}?expires=3600`,
      expiresIn: 3600,
      fileSize: 12
    });
  });

  it('returns 404 for unknown resumes and resumes outside S3', async () => {
    const app = createApp(buildContext());
    const upload = await uploadDocx(app);

    const unknown = await request(app).get('/api/v1/download/missing-id');
    const local = await request(app).get(`/api/v1/download/${upload.body.resumeId}`);

    expect(unknown.status).toBe(404);
    expect(unknown.body).toEqual({ error: 'Resume not found' });
    expect(local.status).toBe(404);
    expect(local.body).toEqual({ error: 'Resume file not stored in S3' });
  });

  it('returns 500 when signing fails', async () => {
    const fileStorage = new FakeFileStorage(true);
    const app = createApp(buildContext({ fileStorage }));
    const upload = await uploadDocx(app);
    fileStorage.failSigning = true;

    const response = await request(app).get(`/api/v1/download/${upload.body.resumeId}`);

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ error: 'Failed to generate download URL' });
  });

  it('lists the resumes of a user', async () => {
    const app = createApp(buildContext({ fileStorage: new FakeFileStorage(true) }));
    const upload = await uploadDocx(app);

    const response = await request(app).get(`/api/v1/user/${upload.body.userId}/resumes`);

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({ status: 'success', totalCount: 1, s3Enabled: true });
    expect(response.body.resumes[0]).toMatchObject({
      resumeId: upload.body.resumeId,
      fileName: 'cv.docx',
      processingMode: 'hybrid',
      llmProvider: 'groq',
      level: 'mid',
      storageType: 's3',
      s3Available: true,
      downloadExpiresIn: 3600
    });
  });

  it('deletes a resume and its stored file', async () => {
    const fileStorage = new FakeFileStorage(true);
    const app = createApp(buildContext({ fileStorage }));
    const upload = await uploadDocx(app);

    const response = await request(app).delete(`/api/v1/delete/${upload.body.resumeId}`);
    const again = await request(app).delete(`/api/v1/delete/${upload.body.resumeId}`);

    expect(response.body).toEqual({
      status: 'success',
      resumeId: upload.body.resumeId,
      fileName: 'cv.docx',
      metadataDeleted: true,
      s3FileDeleted: true,
      message: 'Resume deleted successfully'
    });
    expect(fileStorage.deleted).toEqual([upload.body.s3Info.key]);
    expect(again.status).toBe(404);
  });

  it('reports S3 status', async () => {
    const app = createApp(buildContext());

    const response = await request(app).get('/api/v1/s3/status');

    expect(response.body).toEqual({
      s3Enabled: false,
      bucketName: null,
      awsRegion: 'us-east-1',
      status: 'not_configured'
    });
  });
});

describe('processing information routes', () => {
  it('lists processing options with availability', async () => {
    const app = createApp(buildContext({
      providers: registryOf(new FakeProvider('groq'), new FakeProvider('openai', { available: false }))
    }));

    const response = await request(app).get('/api/v1/processing_options');

    expect(response.body.llmProviders.groq.available).toBe(true);
    expect(response.body.llmProviders.openai.available).toBe(false);
    expect(response.body.llmProviders.anthropic.available).toBe(false);
    expect(response.body.currentStatus.defaultProcessingMode).toBe('hybrid');
  });

  it('previews a processing switch', async () => {
    const app = createApp(buildContext());

    const response = await request(app)
      .post('/api/v1/test_processing_switches')
      .send({ processing_mode: 'hybrid', llm_provider: 'groq' });

    expect(response.body.configuration).toEqual({
      processingMode: 'hybrid',
      llmProviderRequested: 'groq',
      llmProviderSelected: 'groq',
      autoSelection: false
    });
    expect(response.body.recommendation).toBe('Good choice!');
  });

  it('rejects an unknown provider in a switch preview', async () => {
    const app = createApp(buildContext());

    const response = await request(app)
      .post('/api/v1/test_processing_switches')
      .send({ llm_provider: 'gemini' });

    expect(response.status).toBe(400);
    expect(response.body.error).toBe('Invalid request');
  });

  it('explains the strategy for an uploaded file', async () => {
    const app = createApp(buildContext());

    const response = await request(app)
      .post('/api/v1/explain_file_processing')
      .attach('file', Buffer.alloc(2048), 'cv.pdf');

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({
      status: 'success',
      message: 'Processing explanation for cv.pdf',
      ruleApplied: { name: 'pdf_files' },
      fileAnalysis: { name: 'cv.pdf', sizeMb: 0, extension: 'pdf', estimatedComplexity: 'medium' }
    });
  });

  it('shows the intelligent processing summary', async () => {
    const app = createApp(buildContext());

    const response = await request(app).get('/api/v1/intelligent_processing_info');

    expect(Object.keys(response.body.sampleSelections)).toEqual([
      'small_resume.docx',
      'large_resume.pdf',
      'simple_resume.txt',
      'complex_resume.pdf'
    ]);
    expect(response.body.configurationHelp.environmentVariables).toEqual([
      'DEFAULT_PROCESSING_MODE',
      'PROVIDER_PRIORITY',
      'ENABLE_COST_OPTIMIZATION',
      'ENABLE_AUTO_FALLBACK'
    ]);
  });

  it('rate limits uploads per client', async () => {
    const app = createApp(buildContext({ settings: { ...TEST_SETTINGS, uploadsPerMinute: 2 } }));
    const explain = () =>
      request(app).post('/api/v1/explain_file_processing').attach('file', Buffer.alloc(16), 'cv.pdf');

    await explain();
    await explain();
    const limited = await explain();

    expect(limited.status).toBe(429);
    expect(limited.body.error).toBe('Too many requests, try again later');
    expect(Number(limited.headers['retry-after'])).toBeGreaterThan(0);
  });

  it('ignores a rotating X-Forwarded-For when limiting', async () => {
    const app = createApp(buildContext({ settings: { ...TEST_SETTINGS, uploadsPerMinute: 1 } }));
    const explainFrom = (ip: string) =>
      request(app)
        .post('/api/v1/explain_file_processing')
        .set('X-Forwarded-For', ip)
        .attach('file', Buffer.alloc(16), 'cv.pdf');

    const first = await explainFrom('203.0.113.1');
    const second = await explainFrom('203.0.113.2');

    expect(first.status).toBe(200);
    expect(second.status).toBe(429);
  });

  it('limits forwarded clients separately behind a trusted proxy', async () => {
    const app = createApp(buildContext({ settings: { ...TEST_SETTINGS, uploadsPerMinute: 1, trustProxyHops: 1 } }));
    const explainFrom = (ip: string) =>
      request(app)
        .post('/api/v1/explain_file_processing')
        .set('X-Forwarded-For', ip)
        .attach('file', Buffer.alloc(16), 'cv.pdf');

    const first = await explainFrom('203.0.113.1');
    const other = await explainFrom('203.0.113.2');
    const repeat = await explainFrom('203.0.113.1');

    expect(first.status).toBe(200);
    expect(other.status).toBe(200);
    expect(repeat.status).toBe(429);
  });
});

describe('service routes', () => {
  it('reports health', async () => {
    const app = createApp(buildContext());

    const response = await request(app).get('/health');

    expect(response.body).toMatchObject({
      status: 'ok',
      providers: { openai: true, groq: true, anthropic: true },
      s3Enabled: false
    });
  });

  it('answers unknown routes with 404', async () => {
    const app = createApp(buildContext());

    const response = await request(app).get('/api/v1/unknown');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: 'Route not found' });
  });
});
