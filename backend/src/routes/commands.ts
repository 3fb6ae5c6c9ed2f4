import { Router, Request, Response } from 'express';
import { CommandSession, CommandSpec, SessionSummary } from '../models/CommandSession';
import { CommandExecutor } from '../services/CommandExecutor';
import { FirmwareCatalog } from '../services/FirmwareCatalog';
import { InvalidCommandError, PortBusyError } from '../utils/errors';
import { AUTO_PORT } from '../utils/validation';

// Channel id of sessions started over HTTP; no terminal ever attaches to it
export const HTTP_CHANNEL = 'http';

interface CommandResult {
  success: boolean;
  message: string;
  session: SessionSummary;
  output: string[];
}

async function runToCompletion(session: CommandSession): Promise<CommandResult> {
  const state = await session.done;
  const events = session.eventsSince(0).events;
  return {
    success: state === 'Succeeded',
    message: session.result?.message ?? '',
    session: session.toSummary(),
    output: events.filter((event) => !event.terminal).map((event) => event.message),
  };
}

/**
 * Blocking HTTP counterparts of the terminal's flash and update_firmware
 * commands. Each request runs one session and answers when it has finished.
 */
export function createCommandRoutes(executor: CommandExecutor, catalog: FirmwareCatalog): Router {
  const router = Router();

  function start(spec: CommandSpec, res: Response): CommandSession | null {
    try {
      return executor.start(spec, HTTP_CHANNEL);
    } catch (err) {
      if (err instanceof PortBusyError) {
        res.status(409).json({ error: err.message });
      } else if (err instanceof InvalidCommandError) {
        res.status(400).json({ error: err.message });
      } else {
        console.error(`Routes: failed to start ${spec.kind}:`, err);
        res.status(500).json({ error: `Failed to start ${spec.kind}` });
      }
      return null;
    }
  }

  // POST /api/flash: flash one firmware onto a port
  router.post('/flash', async (req: Request, res: Response) => {
    const firmware: unknown = req.body?.firmware;
    const port: unknown = req.body?.port ?? AUTO_PORT;
    if (typeof firmware !== 'string' || firmware.length === 0) {
      return res.status(400).json({ error: 'firmware must be a non-empty string' });
    }
    if (typeof port !== 'string') {
      return res.status(400).json({ error: 'port must be a string' });
    }
    if (!catalog.has(firmware)) {
      return res.status(404).json({ error: `Firmware '${firmware}' not found in configuration` });
    }

    const session = start({ kind: 'flash', firmware, port }, res);
    if (!session) return;
    const result = await runToCompletion(session);
    res.status(result.success ? 200 : 500).json(result);
  });

  // POST /api/update-firmware: resolve every source, reporting per-source results
  router.post('/update-firmware', async (_req: Request, res: Response) => {
    const session = start({ kind: 'update-all' }, res);
    if (!session) return;
    res.json(await runToCompletion(session));
  });

  return router;
}
