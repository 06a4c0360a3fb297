import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { z } from 'zod';
import { DetectionFailureError, InvalidNameError, StorageWriteError } from '../services/errors.js';

export interface ApiError extends Error {
    statusCode?: number;
    code?: string;
}

/**
 * Translate domain and library errors into ApiErrors with a status code.
 */
function toApiError(err: Error): ApiError {
    if (err instanceof DetectionFailureError) {
        return createError(err.message, 400, 'DETECTION_FAILED');
    }
    if (err instanceof InvalidNameError) {
        return createError(err.message, 400, 'INVALID_NAME');
    }
    if (err instanceof StorageWriteError) {
        return createError(err.message, 500, 'STORAGE_WRITE_FAILED');
    }
    if (err instanceof z.ZodError) {
        return badRequest(err.errors[0]?.message ?? 'Invalid request');
    }
    if (err instanceof multer.MulterError) {
        return badRequest(err.message);
    }
    return err;
}

export function errorHandler(
    err: ApiError,
    req: Request,
    res: Response,
    next: NextFunction
) {
    const apiError = toApiError(err);
    const statusCode = apiError.statusCode || 500;

    if (statusCode >= 500) {
        console.error('Error:', err);
    } else {
        console.warn(`[API] ${req.method} ${req.path} -> ${statusCode}: ${apiError.message}`);
    }

    const message = apiError.message || 'Internal server error';

    res.status(statusCode).json({
        error: {
            message,
            code: apiError.code || 'INTERNAL_ERROR',
            ...(process.env.NODE_ENV === 'development' && { stack: err.stack }),
        },
    });
}

export function createError(message: string, statusCode: number, code?: string): ApiError {
    const error: ApiError = new Error(message);
    error.statusCode = statusCode;
    error.code = code;
    return error;
}

export function notFound(message = 'Resource not found'): ApiError {
    return createError(message, 404, 'NOT_FOUND');
}

export function forbidden(message = 'Forbidden'): ApiError {
    return createError(message, 403, 'FORBIDDEN');
}

export function badRequest(message = 'Bad request'): ApiError {
    return createError(message, 400, 'BAD_REQUEST');
}
