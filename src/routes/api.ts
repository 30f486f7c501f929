import { Router } from 'express';
import { ToolController } from '../controllers/toolController.js';
import type { ToolRegistry } from '../tools/index.js';

export const createApiRouter = (tools: ToolRegistry): Router => {
  const router = Router();
  const toolController = new ToolController(tools);

  router.get('/tools', toolController.list);
  router.post('/tools/:name', (req, res, next) => {
    void toolController.invoke(req, res, next);
  });

  return router;
};
