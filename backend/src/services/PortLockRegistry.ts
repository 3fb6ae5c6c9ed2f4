import { PortBusyError } from '../utils/errors';
import { AUTO_PORT } from '../utils/validation';

/**
 * Single-writer tokens for serial ports. `auto` may end up on any port, so
 * it conflicts with every held token and every token conflicts with it.
 */
export class PortLockRegistry {
  private holders = new Map<string, string>(); // port -> sessionId

  acquire(port: string, sessionId: string): void {
    const conflict = this.findConflict(port);
    if (conflict) {
      throw new PortBusyError(port, conflict.sessionId, conflict.port);
    }
    this.holders.set(port, sessionId);
  }

  release(port: string, sessionId: string): boolean {
    if (this.holders.get(port) !== sessionId) return false;
    this.holders.delete(port);
    return true;
  }

  isAvailable(port: string): boolean {
    return this.findConflict(port) === null;
  }

  holderOf(port: string): string | undefined {
    return this.holders.get(port);
  }

  getHeldPorts(): string[] {
    return Array.from(this.holders.keys()).sort();
  }

  private findConflict(port: string): { port: string; sessionId: string } | null {
    if (port === AUTO_PORT) {
      for (const [heldPort, sessionId] of this.holders) {
        return { port: heldPort, sessionId };
      }
      return null;
    }
    for (const candidate of [port, AUTO_PORT]) {
      const sessionId = this.holders.get(candidate);
      if (sessionId !== undefined) return { port: candidate, sessionId };
    }
    return null;
  }
}
