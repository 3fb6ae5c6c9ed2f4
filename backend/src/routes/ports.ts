import { Router, Request, Response } from 'express';
import { FlasherQueries } from '../services/FlasherQueries';

export function createPortRoutes(queries: FlasherQueries): Router {
  const router = Router();

  // GET /api/serial-ports: auto-detect entry followed by the attached devices
  router.get('/', async (_req: Request, res: Response) => {
    res.json(await queries.listPortsForSelection());
  });

  return router;
}
