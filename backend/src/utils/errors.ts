export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** Base class for failures while turning a descriptor into a local artifact. */
export class ResolveError extends Error {
  readonly sourceName: string;

  constructor(message: string, sourceName: string) {
    super(message);
    this.name = 'ResolveError';
    this.sourceName = sourceName;
  }
}

export class NotFoundError extends ResolveError {
  constructor(message: string, sourceName: string) {
    super(message, sourceName);
    this.name = 'NotFoundError';
  }
}

/** Transport failure; unlike NotFoundError, worth retrying later. */
export class NetworkError extends ResolveError {
  readonly status?: number;

  constructor(message: string, sourceName: string, status?: number) {
    super(message, sourceName);
    this.name = 'NetworkError';
    this.status = status;
  }
}

export class BuildError extends ResolveError {
  readonly outputTail: string[];

  constructor(message: string, sourceName: string, outputTail: string[]) {
    super(message, sourceName);
    this.name = 'BuildError';
    this.outputTail = outputTail;
  }
}

export class UnknownSourceError extends Error {
  readonly sourceName: string;

  constructor(sourceName: string) {
    super(`Firmware '${sourceName}' not found in configuration`);
    this.name = 'UnknownSourceError';
    this.sourceName = sourceName;
  }
}

export class PortBusyError extends Error {
  readonly port: string;
  readonly heldBy: string;

  constructor(port: string, heldBy: string, heldPort: string = port) {
    super(
      heldPort === port
        ? `Port ${port} is busy (held by session ${heldBy})`
        : `Port ${port} is busy (session ${heldBy} holds ${heldPort})`,
    );
    this.name = 'PortBusyError';
    this.port = port;
    this.heldBy = heldBy;
  }
}

export class InvalidCommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidCommandError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
