import request from 'supertest';
import { Application } from 'express';
import { createApp } from '../../src/app';
import { FileUploadError } from '../../src/utils/errors';
import {
  FakeWorkbookIntake,
  InMemoryPortfolioStore,
  JobServiceHarness,
  buildJob,
  createJobServiceHarness,
} from '../helpers/fakes';

const WORKBOOK_BYTES = Buffer.from('PK test workbook bytes');
const BEFORE_RESTART = new Date('2024-12-31T23:50:00.000Z');

describe('Job API Integration Tests', () => {
  let harness: JobServiceHarness;
  let uploads: FakeWorkbookIntake;
  let app: Application;

  beforeEach(() => {
    harness = createJobServiceHarness();
    uploads = new FakeWorkbookIntake();
    app = createApp({
      jobService: harness.service,
      uploads,
      portfolios: new InMemoryPortfolioStore(),
      defaultParseMethod: 'together',
      maxUploadMb: 1,
      now: () => new Date('2025-01-01T00:00:00.000Z'),
    });
  });

  describe('POST /jobs/upload-excel-async', () => {
    it('should queue a job for the split workbook and answer immediately', async () => {
      // Act
      const response = await request(app)
        .post('/jobs/upload-excel-async')
        .field('parse_method', 'manual')
        .field('priority', '3')
        .field('user_id', 'user-7')
        .attach('file', WORKBOOK_BYTES, 'funds.xlsx');

      // Assert
      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        job_id: 'job-1',
        status: 'pending',
        message: 'Excel file uploaded successfully. Processing 2 sheets in background.',
        estimated_completion_time: '2025-01-01T00:03:00.000Z',
        status_url: '/jobs/job-1/status',
        webhook_url: null,
      });

      const job = await harness.store.get('job-1');
      expect(job?.inputData).toEqual({
        fileId: 'file-1',
        filePath: '/tmp/uploads/file-1_funds.xlsx',
        sheetCount: 2,
        parseMethod: 'manual',
      });
      expect(job?.priority).toBe(3);
      expect(job?.userId).toBe('user-7');
    });

    it('should fall back to the default parse method and keep a valid webhook', async () => {
      // Act
      const response = await request(app)
        .post('/jobs/upload-excel-async')
        .field('callback_url', 'https://hooks.test/done')
        .field('callback_headers', '{"X-Token":"test-secret"}')
        .attach('file', WORKBOOK_BYTES, 'funds.xlsx');

      // Assert
      expect(response.status).toBe(200);
      expect(response.body.webhook_url).toBe('https://hooks.test/done');
      const job = await harness.store.get('job-1');
      expect(job?.inputData.parseMethod).toBe('together');
      expect(job?.callbackHeaders).toEqual({ 'X-Token': 'test-secret' });
    });

    it('should accept the upload but add a note for a callback URL without a scheme', async () => {
      // Act
      const response = await request(app)
        .post('/jobs/upload-excel-async')
        .field('callback_url', 'hooks.test/done')
        .attach('file', WORKBOOK_BYTES, 'funds.xlsx');

      // Assert
      expect(response.status).toBe(200);
      expect(response.body.webhook_url).toBeNull();
      expect(response.body.note).toBe("Ignoring callback_url 'hooks.test/done': it must start with http:// or https://");
    });

    it('should return 422 when no file is attached', async () => {
      // Act
      const response = await request(app).post('/jobs/upload-excel-async').field('parse_method', 'manual');

      // Assert
      expect(response.status).toBe(422);
      expect(response.body.error.code).toBe('validation_error');
      expect(response.body.error.details).toEqual([{ field: 'file', reason: 'An Excel file is required.' }]);
      expect(await harness.store.list({})).toHaveLength(0);
    });

    it('should return 422 for an unsupported file type', async () => {
      // Act
      const response = await request(app)
        .post('/jobs/upload-excel-async')
        .attach('file', WORKBOOK_BYTES, 'notes.txt');

      // Assert
      expect(response.status).toBe(422);
      expect(response.body.error.code).toBe('unsupported_file');
      expect(response.body.error.message).toBe('Unsupported file type: .txt');
    });

    it('should reject an unknown parse method', async () => {
      // Act
      const response = await request(app)
        .post('/jobs/upload-excel-async')
        .field('parse_method', 'ocr')
        .attach('file', WORKBOOK_BYTES, 'funds.xlsx');

      // Assert
      expect(response.status).toBe(422);
      expect(response.body.error.details[0].field).toBe('parse_method');
    });

    it('should discard the stored upload when the job cannot be queued', async () => {
      // Arrange
      jest.spyOn(harness.store, 'create').mockRejectedValueOnce(new Error('write concern timeout'));

      // Act
      const response = await request(app)
        .post('/jobs/upload-excel-async')
        .attach('file', WORKBOOK_BYTES, 'funds.xlsx');

      // Assert
      expect(response.status).toBe(500);
      expect(response.body.error.message).toBe('Failed to upload file: write concern timeout');
      expect(uploads.discarded).toEqual([
        { fileId: 'file-1', reason: 'Upload was not queued: write concern timeout' },
      ]);
    });

    it('should discard the stored upload when the workbook cannot be split', async () => {
      // Arrange
      uploads.splitError = new FileUploadError('WorkbookUnreadable', 'Could not read workbook funds.xlsx: bad zip');

      // Act
      const response = await request(app)
        .post('/jobs/upload-excel-async')
        .attach('file', WORKBOOK_BYTES, 'funds.xlsx');

      // Assert
      expect(response.status).toBe(422);
      expect(response.body.error.message).toBe('Could not read workbook funds.xlsx: bad zip');
      expect(uploads.discarded).toEqual([
        { fileId: 'file-1', reason: 'Upload was not queued: Could not read workbook funds.xlsx: bad zip' },
      ]);
      expect(await harness.store.list({})).toHaveLength(0);
    });

    it('should return 413 when the upload exceeds the size limit', async () => {
      // Arrange: a limit of roughly 1 KB
      const smallApp = createApp({
        jobService: harness.service,
        uploads: new FakeWorkbookIntake(),
        portfolios: new InMemoryPortfolioStore(),
        defaultParseMethod: 'manual',
        maxUploadMb: 0.001,
      });

      // Act
      const response = await request(smallApp)
        .post('/jobs/upload-excel-async')
        .attach('file', Buffer.alloc(4096, 1), 'funds.xlsx');

      // Assert
      expect(response.status).toBe(413);
      expect(response.body.error.code).toBe('payload_too_large');
    });
  });

  describe('GET /jobs/:jobId/status', () => {
    it('should report progress and remaining time for a running job', async () => {
      // Arrange
      harness.store.seed(buildJob({
        status: 'running',
        startedAt: new Date('2025-01-01T00:00:10.000Z'),
        progress: { totalItems: 3, completedItems: 1, failedItems: 0, currentItem: 'Processing Sheet2' },
      }));

      // Act
      const response = await request(app).get('/jobs/job-1/status');

      // Assert
      expect(response.status).toBe(200);
      expect(response.body.status).toBe('running');
      expect(response.body.progress.current_item).toBe('Processing Sheet2');
      expect(response.body.estimated_remaining_time).toBe('3.0 minutes');
    });

    it('should return 404 for an unknown job', async () => {
      // Act
      const response = await request(app).get('/jobs/missing/status');

      // Assert
      expect(response.status).toBe(404);
      expect(response.body.error).toMatchObject({ code: 'not_found', message: 'Job not found: missing' });
    });
  });

  describe('GET /jobs/:jobId/result', () => {
    it('should say the job is not yet completed while pending', async () => {
      // Arrange
      harness.store.seed(buildJob());

      // Act
      const response = await request(app).get('/jobs/job-1/result');

      // Assert
      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ job_id: 'job-1', status: 'pending', message: 'Job not yet completed' });
    });

    it('should return the per-sheet result once completed', async () => {
      // Arrange
      harness.store.seed(buildJob({
        status: 'completed',
        completedAt: new Date('2025-01-01T00:04:00.000Z'),
        result: {
          totalSheets: 1,
          successfulSheets: 1,
          failedSheets: 0,
          results: [{ sheetId: 'sheet-1', sheetName: 'Equity', status: 'success', portfolioId: 'sheet-1' }],
          mainFileId: 'file-1',
          parentDeleted: { disk: true, db: false },
        },
      }));

      // Act
      const response = await request(app).get('/jobs/job-1/result');

      // Assert
      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        job_id: 'job-1',
        status: 'completed',
        completed_at: '2025-01-01T00:04:00.000Z',
        result: {
          total_sheets: 1,
          successful_sheets: 1,
          failed_sheets: 0,
          results: [{ sheet_id: 'sheet-1', sheet_name: 'Equity', status: 'success', portfolio_id: 'sheet-1' }],
          main_file_id: 'file-1',
          parent_deleted: { disk: true, db: false },
        },
      });
    });
  });

  describe('DELETE /jobs/:jobId', () => {
    it('should cancel a pending job once and refuse the second time', async () => {
      // Arrange
      harness.store.seed(buildJob());

      // Act
      const first = await request(app).delete('/jobs/job-1');
      const second = await request(app).delete('/jobs/job-1');

      // Assert
      expect(first.status).toBe(200);
      expect(first.body).toEqual({ job_id: 'job-1', status: 'cancelled', message: 'Job cancelled successfully' });
      expect(second.status).toBe(400);
      expect(second.body.error).toMatchObject({
        code: 'invalid_transition',
        message: 'Cannot cancel job in status: cancelled',
      });
    });
  });

  describe('GET /jobs', () => {
    it('should filter by status and echo the filter', async () => {
      // Arrange
      harness.store.seed(buildJob({ jobId: 'job-a' }));
      harness.store.seed(buildJob({ jobId: 'job-b', status: 'failed', errorMessage: 'boom', completedAt: new Date() }));

      // Act
      const response = await request(app).get('/jobs').query({ status: 'pending', limit: '10' });

      // Assert
      expect(response.status).toBe(200);
      expect(response.body.total_count).toBe(1);
      expect(response.body.jobs.map((job: { job_id: string }) => job.job_id)).toEqual(['job-a']);
      expect(response.body.filter).toEqual({ status: 'pending', user_id: null, limit: 10 });
    });

    it('should reject an unknown status filter', async () => {
      const response = await request(app).get('/jobs').query({ status: 'queued' });

      expect(response.status).toBe(422);
    });
  });

  describe('Admin recovery', () => {
    it('should reset a single stuck job on request', async () => {
      // Arrange
      harness.store.seed(buildJob({ status: 'running', startedAt: BEFORE_RESTART }));

      // Act
      const response = await request(app).post('/jobs/admin/fix-stuck-job/job-1').send({ action: 'reset' });

      // Assert
      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        job_id: 'job-1',
        previous_status: 'running',
        status: 'pending',
        message: 'Job moved from running to pending',
      });
    });

    it('should refuse to fix a job that already finished', async () => {
      // Arrange
      harness.store.seed(buildJob({ status: 'cancelled', completedAt: new Date() }));

      // Act
      const response = await request(app).post('/jobs/admin/fix-stuck-job/job-1').send({});

      // Assert
      expect(response.status).toBe(400);
      expect(response.body.error.message).toBe('Cannot recover job in status: cancelled');
    });

    it('should recover jobs left running by a previous process', async () => {
      // Arrange
      harness.store.seed(buildJob({ status: 'running', startedAt: BEFORE_RESTART }));

      // Act
      const response = await request(app).post('/jobs/admin/recover-stuck-jobs').send({ action: 'fail' });

      // Assert
      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        action: 'fail',
        recovered_count: 1,
        jobs: [{ job_id: 'job-1', previous_status: 'running', status: 'failed' }],
      });
      expect((await harness.store.get('job-1'))?.errorMessage).toBe('Job interrupted by service restart');
    });

    it('should answer 400 for a malformed JSON body', async () => {
      // Act
      const response = await request(app)
        .post('/jobs/admin/recover-stuck-jobs')
        .set('Content-Type', 'application/json')
        .send('{"action":');

      // Assert
      expect(response.status).toBe(400);
      expect(response.body.error.message).toBe('Malformed JSON body');
    });
  });

  describe('Misc', () => {
    it('should report health', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('ok');
    });

    it('should return 404 for an unknown route', async () => {
      const response = await request(app).get('/nope');

      expect(response.status).toBe(404);
      expect(response.body.error.message).toBe('Route not found: GET /nope');
    });
  });
});
