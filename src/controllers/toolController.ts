import { NextFunction, Request, Response } from 'express';
import { logger } from '../middleware/logging.js';
import type { ToolRegistry } from '../tools/index.js';

/**
 * Tool Controller
 *
 * HTTP surface over the tool registry:
 * - List tool descriptors
 * - Invoke a tool with JSON arguments
 */
export class ToolController {
  constructor(private readonly tools: ToolRegistry) {}

  /**
   * GET /api/tools
   */
  list = (_req: Request, res: Response): void => {
    res.json({ tools: this.tools.describe() });
  };

  /**
   * POST /api/tools/:name
   * Errors go to the error handler, which answers with `{ error_type, message }`
   */
  invoke = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const { name } = req.params;
    const tool = name ? this.tools.get(name) : undefined;
    if (!tool) {
      res.status(404).json({ error_type: 'UnexpectedError', message: `Unknown tool: ${name}` });
      return;
    }

    // A client that hangs up no longer needs the extraction
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) {
        logger.debug('[ToolController] Client disconnected, cancelling', { tool: tool.name });
        controller.abort();
      }
    });

    try {
      const startedAt = Date.now();
      const result = await tool.invoke(req.body, { signal: controller.signal });
      logger.debug('[ToolController] Tool completed', { tool: tool.name, durationMs: Date.now() - startedAt });
      res.json(result);
    } catch (error) {
      next(error);
    }
  };
}
