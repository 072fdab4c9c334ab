import { Request, Response, NextFunction, RequestHandler } from 'express';
import config from '../config/index.js';
import logger from '../utils/logger.js';

export interface AuthOptions {
  apiKey?: string;
  /** Refuse requests even when no key is configured. */
  required: boolean;
}

export function createAuthMiddleware(
  options: AuthOptions = {
    apiKey: config.api.apiKey,
    required: config.server.nodeEnv === 'production',
  }
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    // No key configured outside production: the API is open
    if (!options.required && !options.apiKey) {
      return next();
    }

    const header = req.headers['x-api-key'];
    const apiKey = typeof header === 'string' ? header : req.query.apiKey;

    if (!apiKey) {
      res.status(401).json({
        success: false,
        error: 'API key required',
      });
      return;
    }

    if (!options.apiKey || apiKey !== options.apiKey) {
      logger.warn(`Invalid API key attempt from ${req.ip} on ${req.method} ${req.originalUrl}`);
      res.status(403).json({
        success: false,
        error: 'Invalid API key',
      });
      return;
    }

    next();
  };
}
