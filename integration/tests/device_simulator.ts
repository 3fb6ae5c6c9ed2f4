/**
 * EsptoolSimulator: stands in for esptool talking to boards on serial ports.
 *
 * Models attached boards that:
 * - Answer chip-id and write-flash the way the real tool reports them
 * - Keep the last image written to them
 * - Can be unplugged, which makes the tool fail to connect
 */

import fs from 'fs';
import { FakeChildProcess } from '../../backend/__tests__/helpers/fakeProcess';
import { ProcessLauncher } from '../../backend/src/services/ProcessRunner';

export interface SimulatedBoard {
  port: string;
  chip: string;
  mac: string;
  connected: boolean;
  image: Buffer | null;
  flashAddress: string | null;
}

const VALUE_OPTIONS = new Set(['--port', '-p', '--baud', '-b', '--chip', '-c', '--before', '--after']);

function parseInvocation(args: string[]): { port?: string; positional: string[] } {
  const positional: string[] = [];
  let port: string | undefined;
  // Skip the interpreter prefix, e.g. `-m esptool`
  const start = args[0] === '-m' ? 2 : 0;
  for (let i = start; i < args.length; i++) {
    if (VALUE_OPTIONS.has(args[i])) {
      if (args[i] === '--port' || args[i] === '-p') port = args[i + 1];
      i++;
      continue;
    }
    positional.push(args[i]);
  }
  return { port, positional };
}

export class EsptoolSimulator {
  private boards = new Map<string, SimulatedBoard>();
  readonly invocations: string[][] = [];

  attach(port: string, chip = 'ESP32-D0WD-V3'): SimulatedBoard {
    const board: SimulatedBoard = {
      port,
      chip,
      mac: '24:0a:c4:00:00:01',
      connected: true,
      image: null,
      flashAddress: null,
    };
    this.boards.set(port, board);
    return board;
  }

  board(port: string): SimulatedBoard {
    const board = this.boards.get(port);
    if (!board) throw new Error(`No simulated board on ${port}`);
    return board;
  }

  launch: ProcessLauncher = (command, args, options) => {
    const child = new FakeChildProcess(command, args, options);
    this.invocations.push([command, ...args]);
    setImmediate(() => this.run(child, args));
    return child;
  };

  private run(child: FakeChildProcess, args: string[]): void {
    const { port, positional } = parseInvocation(args);
    const [subcommand, ...rest] = positional;
    child.write('esptool.py v4.7.0\n');

    if (subcommand === 'version') {
      child.write('4.7.0\n');
      child.finish(0);
      return;
    }

    const board = port ? this.boards.get(port) : Array.from(this.boards.values()).find((b) => b.connected);
    child.write(`Serial port ${port ?? 'auto'}\n`);
    child.write('Connecting....');
    if (!board || !board.connected) {
      child.write('\n');
      child.write('A fatal error occurred: Failed to connect to ESP32: No serial data received.\n', 'stderr');
      child.finish(2);
      return;
    }
    child.write('\n');
    child.write(`Chip is ${board.chip} (revision v3.0)\n`);
    child.write(`MAC: ${board.mac}\n`);

    switch (subcommand) {
      case 'chip-id':
      case 'chip_id':
        child.write('Chip ID: 0x0000c400\n');
        break;
      case 'write-flash':
      case 'write_flash':
        if (!this.writeFlash(child, board, rest)) return;
        break;
      default:
        child.write(`esptool: error: invalid choice: '${subcommand ?? ''}'\n`, 'stderr');
        child.finish(2);
        return;
    }

    child.write('Hard resetting via RTS pin...\n');
    child.finish(0);
  }

  private writeFlash(child: FakeChildProcess, board: SimulatedBoard, rest: string[]): boolean {
    const [address, file] = rest;
    let image: Buffer;
    try {
      image = fs.readFileSync(file);
    } catch {
      child.write(`esptool: error: argument <address> <filename>: can't open '${file}'\n`, 'stderr');
      child.finish(2);
      return false;
    }

    child.write(`Flash will be erased from ${address} to 0x00000fff...\n`);
    for (const percent of [25, 50, 75, 100]) {
      child.write(`Writing at ${address}... (${percent} %)\r`);
    }
    child.write(`\nWrote ${image.length} bytes at ${address} in 0.1 seconds\n`);
    child.write('Hash of data verified.\n');
    board.image = image;
    board.flashAddress = address;
    return true;
  }
}
