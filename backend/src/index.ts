import fs from 'fs';
import http from 'http';
import path from 'path';
import express from 'express';
import { ServerConfig, loadServerConfig } from './config';
import { SourceDescriptorStore } from './services/SourceDescriptorStore';
import { FetchResolver } from './services/FetchResolver';
import { GitHubReleaseSource, ReleaseSource } from './services/GitHubReleaseSource';
import { FirmwareCatalog } from './services/FirmwareCatalog';
import { PortEnumerator, PortLister } from './services/PortEnumerator';
import { PortLockRegistry } from './services/PortLockRegistry';
import { ArtifactLeases } from './services/ArtifactLeases';
import { CommandExecutor } from './services/CommandExecutor';
import { ProcessLauncher, spawnProcess } from './services/ProcessRunner';
import { SerialOpener } from './services/SerialConnection';
import { StreamingBroker } from './services/StreamingBroker';
import { RefreshScheduler } from './services/RefreshScheduler';
import { FlasherQueries } from './services/FlasherQueries';
import { createCommandRoutes } from './routes/commands';
import { createFirmwareRoutes } from './routes/firmware';
import { createPortRoutes } from './routes/ports';
import { createSessionRoutes } from './routes/sessions';
import { ConfigError, errorMessage } from './utils/errors';

export const SERVICE_NAME = 'firmware-flash-station';

export interface Services {
  config: ServerConfig;
  store: SourceDescriptorStore;
  catalog: FirmwareCatalog;
  locks: PortLockRegistry;
  executor: CommandExecutor;
  queries: FlasherQueries;
  scheduler: RefreshScheduler;
}

/** Injection points for everything that leaves the process. */
export interface ServiceOverrides {
  launcher?: ProcessLauncher;
  releases?: ReleaseSource;
  portLister?: PortLister;
  serialOpener?: SerialOpener;
}

export function createServices(config: ServerConfig, sourcesText: string, overrides: ServiceOverrides = {}): Services {
  const store = SourceDescriptorStore.fromText(sourcesText);
  const fetchDir = config.fetchDir ?? store.fetchDir;
  const launcher = overrides.launcher ?? spawnProcess;
  // Shared so that pruning the cache never removes an artifact being flashed
  const leases = new ArtifactLeases();

  const resolver = new FetchResolver({
    releases: overrides.releases ?? new GitHubReleaseSource({ token: config.githubToken, apiBaseUrl: config.githubApiUrl }),
    launcher,
    buildCommand: config.buildCommand,
    leases,
  });
  const catalog = new FirmwareCatalog(store.list(), resolver, fetchDir);
  const locks = new PortLockRegistry();
  const executor = new CommandExecutor({
    catalog,
    locks,
    launcher,
    esptoolCommand: config.esptoolCommand,
    baudRate: config.flashBaudRate,
    flashAddress: config.flashAddress,
    killGraceMs: config.killGraceMs,
    sessionGraceMs: config.sessionGraceMs,
    replayLimit: config.replayLimit,
    diagnosticTimeoutMs: config.diagnosticTimeoutMs,
    leases,
    serialOpener: overrides.serialOpener,
  });
  const queries = new FlasherQueries(catalog, new PortEnumerator(overrides.portLister));
  const scheduler = new RefreshScheduler(catalog, config.refreshCron);

  return { config, store, catalog, locks, executor, queries, scheduler };
}

export function createApp(services: Services): express.Express {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.use('/api/firmware', createFirmwareRoutes(services.queries, services.catalog));
  app.use('/api/serial-ports', createPortRoutes(services.queries));
  app.use('/api/sessions', createSessionRoutes(services.executor));
  app.use('/api', createCommandRoutes(services.executor, services.catalog));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'healthy', service: SERVICE_NAME, timestamp: new Date().toISOString() });
  });

  return app;
}

export interface RunningServer {
  server: http.Server;
  broker: StreamingBroker;
  services: Services;
  close(): Promise<void>;
}

export function readSourcesFile(sourcesFile: string): string {
  try {
    return fs.readFileSync(sourcesFile, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read sources file ${path.resolve(sourcesFile)}`, [errorMessage(err)]);
  }
}

export async function startServer(config: ServerConfig, overrides: ServiceOverrides = {}): Promise<RunningServer> {
  const services = createServices(config, readSourcesFile(config.sourcesFile), overrides);
  await services.catalog.initialize();

  const app = createApp(services);
  const server = http.createServer(app);
  const broker = new StreamingBroker(server, services.executor, { channelGraceMs: config.sessionGraceMs });

  await new Promise<void>((resolve) => {
    server.listen(config.port, config.host, () => resolve());
  });
  console.log(`Flash station running on http://${config.host}:${config.port}`);

  services.scheduler.start();
  if (config.refreshOnStart) {
    void services.scheduler.runRefresh();
  }

  const close = async (): Promise<void> => {
    services.scheduler.stop();
    broker.close();
    await services.executor.shutdown();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  };

  return { server, broker, services, close };
}

if (require.main === module) {
  let config: ServerConfig;
  try {
    config = loadServerConfig();
  } catch (err) {
    console.error(`FATAL: ${errorMessage(err)}`);
    process.exit(1);
  }

  startServer(config)
    .then((running) => {
      const shutdown = (): void => {
        console.log('Shutting down, cancelling running sessions...');
        running.close()
          .then(() => process.exit(0))
          .catch((err: unknown) => {
            console.error('Shutdown failed:', err);
            process.exit(1);
          });
      };
      process.on('SIGTERM', shutdown);
      process.on('SIGINT', shutdown);
    })
    .catch((err: unknown) => {
      if (err instanceof ConfigError) {
        console.error(`FATAL: ${err.message}`);
      } else {
        console.error('FATAL: server failed to start:', err);
      }
      process.exit(1);
    });
}
