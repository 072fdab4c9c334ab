import { Request, Response, NextFunction } from 'express';
import config from '../config/index.js';
import logger from '../utils/logger.js';
import { BridgeError } from '../utils/errors.js';

const statusByCode: Record<string, number> = {
  MALFORMED_MESSAGE: 400,
  INVALID_COMMAND_ARGUMENT: 400,
  DEVICE_NOT_FOUND: 404,
  MIRROR_UNAVAILABLE: 409,
};

/** HTTP status for an error raised while serving a request. */
export function httpStatusFor(error: unknown, fallback = 500): number {
  if (error instanceof BridgeError) {
    return statusByCode[error.code] ?? fallback;
  }
  return fallback;
}

function isBodyParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    return next(err);
  }

  if (isBodyParseError(err)) {
    res.status(400).json({
      success: false,
      error: 'Invalid JSON body',
    });
    return;
  }

  if (err instanceof BridgeError) {
    logger.warn(`Request failed: ${err.message}`, { code: err.code });
    res.status(httpStatusFor(err)).json({
      success: false,
      error: err.message,
      code: err.code,
    });
    return;
  }

  logger.error('Unhandled error:', err);
  res.status(500).json({
    success: false,
    error: 'Internal server error',
    ...(config.server.nodeEnv === 'development' && {
      message: err.message,
      stack: err.stack,
    }),
  });
}
