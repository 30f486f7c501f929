import { Request, Response, NextFunction } from 'express';
import { logger } from './logging.js';
import { ApplicationError } from '../errors/index.js';

/**
 * Last-resort handler: every failure leaves as `{ error_type, message }`
 */
export const errorHandler = (
  error: Error | ApplicationError,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const request = {
    method: req.method,
    url: req.url,
    ip: req.ip,
    userAgent: req.get('User-Agent'),
  };

  if (error instanceof ApplicationError) {
    const log = error.isOperational ? logger.warn.bind(logger) : logger.error.bind(logger);
    log('Request error', { error: error.toJSON(), request });

    res.status(error.statusCode).json({
      error_type: error.errorType,
      message: error.isOperational ? error.message : 'Internal server error',
    });
    return;
  }

  // body-parser reports malformed JSON with a 400 status and type
  if ('type' in error && error.type === 'entity.parse.failed') {
    logger.warn('Malformed request body', { request });
    res.status(400).json({ error_type: 'UnexpectedError', message: 'Request body is not valid JSON' });
    return;
  }

  logger.error('Request error (generic)', {
    error: {
      name: error.name,
      message: error.message,
      stack: error.stack,
    },
    request,
  });

  res.status(500).json({ error_type: 'UnexpectedError', message: 'Internal server error' });
};

export const notFoundHandler = (req: Request, res: Response): void => {
  res.status(404).json({
    error_type: 'UnexpectedError',
    message: `Route ${req.method} ${req.url} not found`,
  });
};
