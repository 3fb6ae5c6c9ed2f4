import { Router, Request, Response } from 'express';
import { CommandExecutor } from '../services/CommandExecutor';

export function createSessionRoutes(executor: CommandExecutor): Router {
  const router = Router();

  // GET /api/sessions: sessions still retained for replay
  router.get('/', (_req: Request, res: Response) => {
    res.json(executor.list());
  });

  return router;
}
