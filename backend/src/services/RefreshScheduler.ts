import * as cron from 'node-cron';
import { FirmwareCatalog, RefreshOutcome } from './FirmwareCatalog';

export class RefreshScheduler {
  private catalog: FirmwareCatalog;
  private expression: string;
  private tasks: cron.ScheduledTask[] = [];
  private running: Promise<RefreshOutcome[]> | null = null;

  /** An empty expression disables the periodic refresh. */
  constructor(catalog: FirmwareCatalog, expression: string) {
    this.catalog = catalog;
    this.expression = expression;
  }

  start(): void {
    if (!this.expression) {
      console.log('Scheduler: periodic firmware refresh disabled');
      return;
    }
    const refreshJob = cron.schedule(this.expression, () => {
      void this.runRefresh();
    });
    this.tasks.push(refreshJob);
    console.log(`Scheduler: firmware refresh registered (${this.expression})`);
  }

  stop(): void {
    for (const task of this.tasks) {
      task.stop();
    }
    this.tasks = [];
  }

  /** Refreshes every source; a tick that overlaps a running refresh joins it. */
  runRefresh(): Promise<RefreshOutcome[]> {
    if (this.running) return this.running;

    this.running = this.catalog.resolveAll()
      .then((outcomes) => {
        const failed = outcomes.filter((outcome) => outcome.error !== undefined);
        console.log(`Scheduler: firmware refresh finished (${outcomes.length - failed.length} ok, ${failed.length} failed)`);
        return outcomes;
      })
      .catch((err: unknown) => {
        console.error('Scheduler: firmware refresh failed:', err);
        return [];
      })
      .finally(() => {
        this.running = null;
      });
    return this.running;
  }
}
