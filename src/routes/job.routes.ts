// src/routes/job.routes.ts
import { RequestHandler, Router } from 'express';
import {
    JobController,
    fixStuckJobValidation,
    jobIdParamValidation,
    listJobsValidation,
    recoverStuckJobsValidation,
    uploadValidation,
} from '../controllers/job.controller';

export function createJobRouter(controller: JobController, upload: RequestHandler): Router {
    const router = Router();

    // --- Upload & Enqueue ---

    // POST /jobs/upload-excel-async - Save, split and queue a workbook
    router.post('/upload-excel-async', upload, uploadValidation, controller.uploadExcelAsync);

    // --- Job Monitoring ---

    // GET /jobs - List jobs, newest first
    router.get('/', listJobsValidation, controller.listJobs);

    // GET /jobs/:jobId/status - Progress and state
    router.get('/:jobId/status', jobIdParamValidation, controller.getJobStatus);

    // GET /jobs/:jobId/result - Result, error or progress
    router.get('/:jobId/result', jobIdParamValidation, controller.getJobResult);

    // DELETE /jobs/:jobId - Cancel a pending/running job
    router.delete('/:jobId', jobIdParamValidation, controller.cancelJob);

    // --- Admin Recovery ---

    // POST /jobs/admin/fix-stuck-job/:jobId - Reset or fail one job
    router.post('/admin/fix-stuck-job/:jobId', fixStuckJobValidation, controller.fixStuckJob);

    // POST /jobs/admin/recover-stuck-jobs - Recover jobs orphaned by a restart
    router.post('/admin/recover-stuck-jobs', recoverStuckJobsValidation, controller.recoverStuckJobs);

    return router;
}
