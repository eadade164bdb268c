// src/middleware/upload.middleware.ts
import { RequestHandler } from 'express';
import multer from 'multer';

/** Buffers a single `file` field in memory, capped at `maxUploadMb`. */
export function createUploadMiddleware(maxUploadMb: number): RequestHandler {
    return multer({
        storage: multer.memoryStorage(),
        limits: { fileSize: maxUploadMb * 1024 * 1024, files: 1 },
    }).single('file');
}
