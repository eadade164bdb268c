import { ExcelProcessingHandler } from '../../src/jobs/handlers/excelProcessingHandler';
import { JobScheduler } from '../../src/jobs/jobScheduler';
import { IFileUpload } from '../../src/models/fileUpload.model';
import { EventType } from '../../src/models/processingEvent.model';
import { JobService, RESTART_ERROR_MESSAGE } from '../../src/services/job.service';
import {
  FakeSheetFileSource,
  InMemoryPortfolioStore,
  RecordingEventLogger,
  RecordingNotifier,
  buildJob,
  buildParentFile,
  buildSheet,
  createJobServiceHarness,
  excelInput,
  sequentialIds,
  steppingClock,
} from '../helpers/fakes';

// Harness processes start at 2025-01-01T00:00:00Z, so anything started earlier belongs to a dead process
const BEFORE_RESTART = new Date('2024-12-31T23:50:00.000Z');

describe('Stuck job recovery', () => {
  describe('recoverStuckJobs', () => {
    it('should reset running jobs from a previous process to pending with zeroed progress', async () => {
      // Arrange
      const { service, store, events, notifier } = createJobServiceHarness();
      store.seed(buildJob({
        status: 'running',
        startedAt: BEFORE_RESTART,
        progress: { totalItems: 3, completedItems: 1, failedItems: 0, currentItem: 'Processing Sheet2' },
      }));

      // Act
      const recovered = await service.recoverStuckJobs({ action: 'reset' });

      // Assert
      expect(recovered).toEqual([{ jobId: 'job-1', previousStatus: 'running', status: 'pending' }]);
      const job = await store.get('job-1');
      expect(job?.status).toBe('pending');
      expect(job?.startedAt).toBeNull();
      expect(job?.progress).toEqual({ totalItems: 0, completedItems: 0, failedItems: 0, currentItem: null });
      expect(events.ofType(EventType.JOB_RECOVERED)).toHaveLength(1);
      expect(notifier.notified).toHaveLength(0);
    });

    it('should leave jobs started by the live process alone', async () => {
      // Arrange
      const { service, store } = createJobServiceHarness();
      store.seed(buildJob({ status: 'running', startedAt: new Date('2025-01-01T00:00:05.000Z') }));

      // Act
      const recovered = await service.recoverStuckJobs({ action: 'reset' });

      // Assert
      expect(recovered).toEqual([]);
      expect((await store.get('job-1'))?.status).toBe('running');
    });

    it('should fail stuck jobs with the restart message and notify', async () => {
      // Arrange
      const { service, store, notifier } = createJobServiceHarness();
      store.seed(buildJob({ status: 'running', startedAt: BEFORE_RESTART, callbackUrl: 'https://hooks.test/done' }));

      // Act
      const recovered = await service.recoverStuckJobs({ action: 'fail' });

      // Assert
      expect(recovered).toEqual([{ jobId: 'job-1', previousStatus: 'running', status: 'failed' }]);
      const job = await store.get('job-1');
      expect(job?.errorMessage).toBe(RESTART_ERROR_MESSAGE);
      expect(job?.completedAt).toBeInstanceOf(Date);
      expect(notifier.notified.map(notified => notified.jobId)).toEqual(['job-1']);
    });

    it('should also fail old pending jobs when asked to', async () => {
      // Arrange: cutoff is 60 minutes before the clock reading of 00:00:01
      const { service, store } = createJobServiceHarness();
      store.seed(buildJob({ jobId: 'old', createdAt: new Date('2024-12-31T20:00:00.000Z') }));
      store.seed(buildJob({ jobId: 'recent', createdAt: new Date('2024-12-31T23:30:00.000Z') }));

      // Act
      const recovered = await service.recoverStuckJobs({ action: 'fail', includePending: true });

      // Assert
      expect(recovered).toEqual([{ jobId: 'old', previousStatus: 'pending', status: 'failed' }]);
      expect((await store.get('recent'))?.status).toBe('pending');
    });

    it('should ignore includePending for a reset', async () => {
      // Arrange
      const { service, store } = createJobServiceHarness();
      store.seed(buildJob({ createdAt: new Date('2024-12-31T20:00:00.000Z') }));

      // Act
      const recovered = await service.recoverStuckJobs({ action: 'reset', includePending: true });

      // Assert
      expect(recovered).toEqual([]);
    });
  });

  describe('fixStuckJob', () => {
    it('should move a single pending job to failed', async () => {
      // Arrange
      const { service, store } = createJobServiceHarness();
      store.seed(buildJob());

      // Act
      const outcome = await service.fixStuckJob('job-1', 'fail');

      // Assert
      expect(outcome).toEqual({ jobId: 'job-1', previousStatus: 'pending', status: 'failed' });
      expect((await store.get('job-1'))?.errorMessage).toBe(RESTART_ERROR_MESSAGE);
    });

    it('should fail a job this process is running but refuse to reset it', async () => {
      // Arrange: started after the harness process came up
      const { service, store } = createJobServiceHarness();
      store.seed(buildJob({ status: 'running', startedAt: new Date('2025-01-01T00:00:05.000Z') }));

      // Act
      const reset = service.fixStuckJob('job-1', 'reset');
      await expect(reset).rejects.toMatchObject({ code: 'InvalidTransition' });
      const outcome = await service.fixStuckJob('job-1', 'fail');

      // Assert
      expect(outcome).toEqual({ jobId: 'job-1', previousStatus: 'running', status: 'failed' });
    });

    it('should reset a running job left by a previous process', async () => {
      // Arrange
      const { service, store } = createJobServiceHarness();
      store.seed(buildJob({ status: 'running', startedAt: BEFORE_RESTART }));

      // Act
      const outcome = await service.fixStuckJob('job-1', 'reset');

      // Assert
      expect(outcome).toEqual({ jobId: 'job-1', previousStatus: 'running', status: 'pending' });
    });

    it('should refuse a job that already finished', async () => {
      // Arrange
      const { service, store } = createJobServiceHarness();
      store.seed(buildJob({ status: 'completed', completedAt: new Date() }));

      // Act & Assert
      await expect(service.fixStuckJob('job-1', 'reset')).rejects.toMatchObject({
        code: 'InvalidTransition',
        message: 'Cannot recover job in status: completed',
      });
    });

    it('should report an unknown job', async () => {
      const { service } = createJobServiceHarness();

      await expect(service.fixStuckJob('missing', 'fail')).rejects.toMatchObject({ code: 'JobNotFound' });
    });
  });

  it('should produce the same result when a job interrupted mid-run is reset and re-run', async () => {
    // Arrange: a first process claims the job and finishes one of three sheets before dying
    const { service, store } = createJobServiceHarness();
    const files = new FakeSheetFileSource();
    await files.repository.create(buildParentFile());
    for (let index = 0; index < 3; index++) {
      await files.repository.create(buildSheet(index));
    }
    const portfolios = new InMemoryPortfolioStore();
    const sheetProcessor = {
      processSheet: async (sheet: IFileUpload) => {
        const portfolio = {
          mutualFundName: `Fund ${sheet.sheetName}`,
          portfolioDate: 'January 2025',
          totalHoldings: 1,
          holdings: [{ nameOfInstrument: 'Alpha Ltd', isinCode: 'INE000A01010', percentageToNav: '100.0000%' }],
        };
        const portfolioId = await portfolios.upsert({
          _id: sheet.fileId,
          sheetId: sheet.fileId,
          sourceFileId: 'file-1',
          parseMethod: 'manual',
          ...portfolio,
        });
        return { portfolioId, portfolio };
      },
    };
    await service.createJob({ jobType: 'excel_processing', inputData: excelInput() });
    await service.claimNextPending();
    await sheetProcessor.processSheet(buildSheet(0));
    await service.checkpoint('job-1', { totalItems: 3, completedItems: 1, failedItems: 0, currentItem: 'Processing Sheet1' });

    // Act: a new process recovers and runs the job to completion
    const events = new RecordingEventLogger();
    const restarted = new JobService(store, events, new RecordingNotifier(), {
      processStartedAt: new Date('2025-01-02T00:00:00.000Z'),
      now: steppingClock('2025-01-02T00:00:01.000Z'),
      generateId: sequentialIds('restarted'),
    });
    await restarted.recoverStuckJobs({ action: 'reset' });
    const scheduler = new JobScheduler(restarted, {
      excelProcessing: new ExcelProcessingHandler({ files, sheetProcessor, events }),
    });
    await scheduler.tick();
    await scheduler.drain();

    // Assert
    const job = await store.get('job-1');
    expect(job?.status).toBe('completed');
    expect(job?.progress).toEqual({ totalItems: 3, completedItems: 3, failedItems: 0, currentItem: 'Processing Sheet3' });
    expect(job?.result?.successfulSheets).toBe(3);
    expect(job?.result?.results.map(outcome => outcome.portfolioId)).toEqual(['sheet-1', 'sheet-2', 'sheet-3']);
    expect([...portfolios.portfolios.keys()].sort()).toEqual(['sheet-1', 'sheet-2', 'sheet-3']);
  });
});
