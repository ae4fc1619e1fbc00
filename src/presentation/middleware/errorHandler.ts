import { Request, Response, NextFunction } from 'express';

/**
 * HTTP-facing error with status code.
 */
export class AppError extends Error {
    constructor(
        public readonly statusCode: number,
        message: string
    ) {
        super(message);
        this.name = 'AppError';
    }
}

export class NotFoundError extends AppError {
    constructor(message: string = 'Resource not found') {
        super(404, message);
        this.name = 'NotFoundError';
    }
}

export class BadRequestError extends AppError {
    constructor(message: string = 'Bad request') {
        super(400, message);
        this.name = 'BadRequestError';
    }
}

export class UnauthorizedError extends AppError {
    constructor(message: string = 'Unauthorized') {
        super(401, message);
        this.name = 'UnauthorizedError';
    }
}

/**
 * Error response structure.
 */
interface ErrorResponse {
    error: {
        message: string;
        code: string;
    };
}

/**
 * Fallback for unmatched routes; register after all routers.
 */
export function notFoundHandler(req: Request, res: Response, next: NextFunction): void {
    next(new NotFoundError(`No route for ${req.method} ${req.path}`));
}

/**
 * Global error handler middleware.
 */
export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    next: NextFunction
): void {
    if (err instanceof AppError && err.statusCode < 500) {
        console.warn(`[HTTP] ${err.name}: ${err.message} (${req.method} ${req.path})`);
    } else {
        console.error(`[HTTP] ${err.name}: ${err.message}`);
        if (err.stack) {
            console.error(err.stack);
        }
    }

    if (res.headersSent) {
        // Webhook already acknowledged; nothing left to tell the client
        next(err);
        return;
    }

    if (err instanceof AppError) {
        const response: ErrorResponse = {
            error: {
                message: err.message,
                code: err.name,
            },
        };
        res.status(err.statusCode).json(response);
        return;
    }

    const response: ErrorResponse = {
        error: {
            message: process.env.NODE_ENV === 'production'
                ? 'Internal server error'
                : err.message,
            code: 'INTERNAL_ERROR',
        },
    };
    res.status(500).json(response);
}

/**
 * Async route handler wrapper to catch errors.
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
    return (req: Request, res: Response, next: NextFunction) => {
        return Promise.resolve(fn(req, res, next)).catch(next);
    };
}
