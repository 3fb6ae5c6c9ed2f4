import { Router, Request, Response } from 'express';
import { FirmwareCatalog } from '../services/FirmwareCatalog';
import { FlasherQueries } from '../services/FlasherQueries';
import { toFirmwareSummary } from '../models/Firmware';

export function createFirmwareRoutes(queries: FlasherQueries, catalog: FirmwareCatalog): Router {
  const router = Router();

  // GET /api/firmware: list every declared firmware source
  router.get('/', (_req: Request, res: Response) => {
    res.json(queries.listFirmware());
  });

  // Static paths MUST come before parameterized /:name routes
  // POST /api/firmware/refresh: resolve one source or all of them in the background
  router.post('/refresh', (req: Request, res: Response) => {
    const name: unknown = req.body?.name;
    if (name !== undefined && typeof name !== 'string') {
      return res.status(400).json({ error: 'name must be a string' });
    }
    if (name !== undefined && !catalog.has(name)) {
      return res.status(404).json({ error: `Firmware '${name}' not found` });
    }

    const snapshot = catalog.refresh(name);
    res.status(202).json(snapshot.map(toFirmwareSummary));
  });

  // GET /api/firmware/:name: one firmware source
  router.get('/:name', (req: Request, res: Response) => {
    const firmware = queries.getFirmware(req.params.name);
    if (!firmware) {
      return res.status(404).json({ error: `Firmware '${req.params.name}' not found` });
    }
    res.json(firmware);
  });

  return router;
}
