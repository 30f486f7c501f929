/**
 * Error Handler Middleware Tests
 *
 * Validates that every failure leaves as `{ error_type, message }`
 */

import request from 'supertest';
import express, { Express } from 'express';
import { describe, it, expect, beforeAll, jest } from '@jest/globals';
import { errorHandler, notFoundHandler } from '../../src/middleware/errorHandler.js';
import {
  BatchError,
  ErrorCode,
  ExtractionTimeoutError,
  GeoRestrictionError,
  SSHError,
  UnexpectedError,
} from '../../src/errors/index.js';
import { logger } from '../../src/middleware/logging.js';

describe('errorHandler', () => {
  let app: Express;

  beforeAll(() => {
    app = express();
    app.get('/geo', () => {
      throw new GeoRestrictionError('ERROR: not available in your country');
    });
    app.get('/timeout', () => {
      throw new ExtractionTimeoutError(60000);
    });
    app.get('/batch', () => {
      throw new BatchError('Maximum 10 URLs per batch', ErrorCode.BATCH_LIMIT_EXCEEDED);
    });
    app.get('/ssh', () => {
      throw new SSHError('extract-host', 'ssh to extract-host failed: Connection refused', 255);
    });
    app.get('/unexpected', () => {
      throw new UnexpectedError('secret internals');
    });
    app.get('/plain', () => {
      throw new Error('boom');
    });
    app.use(notFoundHandler);
    app.use(errorHandler);
  });

  it('should use the error status code and type', async () => {
    const response = await request(app).get('/geo').expect(451);

    expect(response.body).toEqual({ error_type: 'GeoRestriction', message: 'ERROR: not available in your country' });
  });

  it('should report timeouts as extraction errors', async () => {
    const response = await request(app).get('/timeout').expect(504);

    expect(response.body).toEqual({ error_type: 'ExtractionError', message: 'Extraction timed out after 60000ms' });
  });

  it('should report batch limits as client errors', async () => {
    const response = await request(app).get('/batch').expect(400);

    expect(response.body).toEqual({ error_type: 'BatchError', message: 'Maximum 10 URLs per batch' });
  });

  it('should report transport failures', async () => {
    const response = await request(app).get('/ssh').expect(503);

    expect(response.body).toEqual({
      error_type: 'SSHError',
      message: 'ssh to extract-host failed: Connection refused',
    });
  });

  it('should hide messages of non-operational errors', async () => {
    const loggerErrorSpy = jest.spyOn(logger, 'error');

    const response = await request(app).get('/unexpected').expect(500);

    expect(response.body).toEqual({ error_type: 'UnexpectedError', message: 'Internal server error' });
    expect(loggerErrorSpy).toHaveBeenCalled();
    loggerErrorSpy.mockRestore();
  });

  it('should convert generic errors', async () => {
    const response = await request(app).get('/plain').expect(500);

    expect(response.body).toEqual({ error_type: 'UnexpectedError', message: 'Internal server error' });
  });
});

describe('notFoundHandler', () => {
  it('should describe the missing route', async () => {
    const app = express();
    app.use(notFoundHandler);

    const response = await request(app).post('/api/missing').expect(404);

    expect(response.body).toEqual({ error_type: 'UnexpectedError', message: 'Route POST /api/missing not found' });
  });
});
