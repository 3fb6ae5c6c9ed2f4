import fs from 'fs';
import http from 'http';
import os from 'os';
import path from 'path';
import { StreamingBroker, StreamingBrokerOptions, parseResumeCursor } from '../src/services/StreamingBroker';
import { CommandExecutor } from '../src/services/CommandExecutor';
import { FirmwareCatalog } from '../src/services/FirmwareCatalog';
import { FetchResolver } from '../src/services/FetchResolver';
import { PortLockRegistry } from '../src/services/PortLockRegistry';
import { LocalPathDescriptor } from '../src/models/SourceDescriptor';
import { FakeLauncher, waitFor } from './helpers/fakeProcess';
import { FakeReleaseSource } from './helpers/fakeReleases';
import { FakeSerialOpener } from './helpers/fakeSerial';
import { TerminalClient } from './helpers/terminalClient';

describe('StreamingBroker', () => {
  let workDir: string;
  let server: http.Server;
  let broker: StreamingBroker;
  let executor: CommandExecutor;
  let locks: PortLockRegistry;
  let launcher: FakeLauncher;
  let serial: FakeSerialOpener;
  let baseUrl: string;
  const clients: TerminalClient[] = [];

  async function connect(channel?: string, since?: Record<string, number>): Promise<TerminalClient> {
    const client = await TerminalClient.connect(baseUrl, channel, since);
    clients.push(client);
    return client;
  }

  async function startServer(replayLimit?: number, options: StreamingBrokerOptions = {}): Promise<void> {
    const local = (name: string): LocalPathDescriptor => ({
      name,
      kind: 'local-path',
      platform: 'esp32',
      path: path.join(workDir, `${name}.bin`),
    });
    fs.writeFileSync(path.join(workDir, 'alpha.bin'), 'alpha');
    fs.writeFileSync(path.join(workDir, 'beta.bin'), 'beta');

    launcher = new FakeLauncher();
    serial = new FakeSerialOpener();
    locks = new PortLockRegistry();
    const catalog = new FirmwareCatalog(
      [local('alpha'), local('beta')],
      new FetchResolver({ releases: new FakeReleaseSource(), launcher: launcher.launch }),
      path.join(workDir, 'cache'),
    );
    await catalog.initialize();
    executor = new CommandExecutor({
      catalog,
      locks,
      launcher: launcher.launch,
      serialOpener: serial.open,
      killGraceMs: 50,
      replayLimit,
    });

    server = http.createServer();
    broker = new StreamingBroker(server, executor, { heartbeatMs: 60000, ...options });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('Server has no port');
    baseUrl = `ws://127.0.0.1:${address.port}/ws/terminal`;
  }

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'broker-'));
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await Promise.all(clients.splice(0).map((client) => client.close()));
    broker.close();
    await executor.shutdown();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    jest.restoreAllMocks();
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  describe('protocol', () => {
    beforeEach(async () => {
      await startServer();
    });

    test('announces a channel on connect', async () => {
      const client = await connect();

      expect(client.messages[0]).toMatchObject({ type: 'info', message: 'WebSocket Terminal connected' });
      expect(client.channel).toMatch(/^[0-9a-f-]{36}$/);
      expect(broker.isConnected(client.channel)).toBe(true);
      expect(broker.getChannelCount()).toBe(1);
    });

    test('answers ping with pong and starts nothing', async () => {
      const client = await connect();
      client.send({ type: 'ping' });

      const pong = await client.next((msg) => msg.type === 'pong');
      expect(pong.message).toBe('Terminal connection alive');
      expect(executor.list()).toEqual([]);
    });

    test('rejects unknown types and malformed messages', async () => {
      const client = await connect();
      client.send({ type: 'reboot' });
      client.socket.send('not json');
      client.send({ type: 'flash' });

      await waitFor(() => client.messages.filter((msg) => msg.type === 'error').length === 3);
      expect(client.messages.filter((msg) => msg.type === 'error').map((msg) => msg.message)).toEqual([
        'Unknown command type: reboot',
        'Invalid message: expected JSON',
        'Invalid flash message: firmware Required',
      ]);
    });

    test('an unknown firmware ends in an error event naming it', async () => {
      const client = await connect();
      client.send({ type: 'flash', firmware: 'x', port: 'auto' });

      const error = await client.next((msg) => msg.type === 'error');
      expect(error.message).toBe("Firmware 'x' not found in configuration");
      expect(error.seq).toBe(1);
      expect(error.session).toBeDefined();
      expect(locks.getHeldPorts()).toEqual([]);
    });

    test('streams a flash to the requesting channel only', async () => {
      launcher.onSpawn = (child) => setImmediate(() => {
        child.write('Connecting...\n');
        child.write('Writing at 0x00000000... (50 %)\r');
        child.write('Writing at 0x00000000... (100 %)\r\n');
        child.finish(0);
      });
      const owner = await connect();
      const bystander = await connect();

      owner.send({ type: 'flash', firmware: 'alpha', port: '/dev/ttyUSB0' });
      const success = await owner.next((msg) => msg.type === 'success');

      expect(success).toMatchObject({ message: '✅ alpha flashed successfully!', target: 'alpha' });
      const sessionId = success.session ?? '';
      expect(owner.forSession(sessionId).map((msg) => msg.type)).toEqual([
        'info', 'command', 'info', 'progress', 'progress', 'success',
      ]);
      expect(owner.forSession(sessionId).map((msg) => msg.seq)).toEqual([1, 2, 3, 4, 5, 6]);
      expect(bystander.messages).toHaveLength(1);
    });

    test('reports a busy port as an error', async () => {
      const first = await connect();
      const second = await connect();
      first.send({ type: 'flash', firmware: 'alpha', port: '/dev/ttyUSB0' });
      await first.next((msg) => msg.type === 'command');

      second.send({ type: 'flash', firmware: 'beta', port: '/dev/ttyUSB0' });
      const error = await second.next((msg) => msg.type === 'error');

      const holder = locks.holderOf('/dev/ttyUSB0');
      expect(error.message).toBe(`Port /dev/ttyUSB0 is busy (held by session ${holder})`);
      expect(error.session).toBeUndefined();
    });

    test('runs typed esptool commands and rejects invalid ones', async () => {
      launcher.onSpawn = (child) => setImmediate(() => {
        child.write('esptool.py v4.7.0\n');
        child.finish(0);
      });
      const client = await connect();

      client.send({ type: 'esptool', command: '--port /etc/shadow chip-id' });
      const rejected = await client.next((msg) => msg.type === 'error');
      expect(rejected.message).toBe('Invalid serial port: /etc/shadow');

      client.send({ type: 'esptool', command: 'version' });
      const done = await client.next((msg) => msg.type === 'success');
      expect(done.message).toBe('Command completed successfully');
      expect(launcher.last.args).toEqual(['-m', 'esptool', 'version']);
    });

    test('esptool commands take an optional timeout', async () => {
      const client = await connect();

      client.send({ type: 'esptool', command: 'version', timeout_ms: -5 });
      const invalid = await client.next((msg) => msg.type === 'error');
      expect(invalid.message).toBe('Invalid esptool message: timeout_ms Number must be greater than 0');

      client.send({ type: 'esptool', command: 'read-mac', timeout_ms: 50 });
      const timedOut = await client.next((msg) => msg.type === 'error' && msg.session !== undefined);
      expect(timedOut.message).toBe('Command cancelled: timed out after 50 ms');
      expect(launcher.last.signals).toEqual(['SIGTERM']);
    });

    test('streams a serial monitor until it is stopped', async () => {
      const client = await connect();
      client.send({ type: 'monitor', port: '/dev/ttyUSB0' });
      const connected = await client.next((msg) => msg.message === 'Connected to /dev/ttyUSB0 at 115200 baud');

      serial.last.receive('rst:0x1 (POWERON_RESET),boot:0x13\r\n');
      const line = await client.next((msg) => msg.type === 'monitor');
      expect(line).toMatchObject({ message: 'rst:0x1 (POWERON_RESET),boot:0x13', session: connected.session });

      client.send({ type: 'stop_monitor', port: '/dev/ttyUSB0' });
      const stopped = await client.next((msg) => msg.type === 'success');
      expect(stopped).toMatchObject({ message: 'Serial monitor stopped for /dev/ttyUSB0', session: connected.session });
      expect(client.forSession(connected.session ?? '').map((msg) => msg.type)).toEqual([
        'command', 'info', 'monitor', 'success',
      ]);

      client.send({ type: 'stop_monitor', port: '/dev/ttyUSB0' });
      const error = await client.next((msg) => msg.type === 'error');
      expect(error.message).toBe('No monitor running for port /dev/ttyUSB0');
    });

    test('a monitor needs a specific port and a custom baud rate is used', async () => {
      const client = await connect();
      client.send({ type: 'monitor' });
      const error = await client.next((msg) => msg.type === 'error');
      expect(error.message).toBe('Please select a specific serial port for monitoring');
      expect(serial.ports).toHaveLength(0);

      client.send({ type: 'monitor', port: 'COM4', baudrate: 9600 });
      await client.next((msg) => msg.message === 'Connected to COM4 at 9600 baud');
      expect(serial.last).toMatchObject({ path: 'COM4', baudRate: 9600 });
      expect(locks.getHeldPorts()).toEqual(['COM4']);
    });

    test('update_firmware runs the catalog refresh as a session', async () => {
      const client = await connect();
      client.send({ type: 'update_firmware' });

      const done = await client.next((msg) => msg.type === 'success');
      expect(done.message).toBe('✅ All 2 firmware sources updated');
      expect(client.forSession(done.session ?? '')[0].message).toBe('Updating all firmware sources...');
    });

    test('cancel stops the channel\'s own session', async () => {
      const client = await connect();
      client.send({ type: 'flash', firmware: 'alpha', port: '/dev/ttyUSB0' });
      const echo = await client.next((msg) => msg.type === 'command');

      client.send({ type: 'cancel', session: 'not-a-session' });
      const notFound = await client.next((msg) => msg.type === 'error');
      expect(notFound.message).toBe('Session not-a-session not found');

      client.send({ type: 'cancel', session: echo.session });
      const terminal = await client.next((msg) => msg.type === 'error' && msg.session === echo.session);
      expect(terminal.message).toBe('Flash cancelled: Cancelled by operator');
      expect(executor.get(echo.session ?? '')?.state).toBe('Cancelled');
    });

    test('another channel cannot cancel a session', async () => {
      const owner = await connect();
      const other = await connect();
      owner.send({ type: 'flash', firmware: 'alpha', port: '/dev/ttyUSB0' });
      const echo = await owner.next((msg) => msg.type === 'command');

      other.send({ type: 'cancel', session: echo.session });
      const error = await other.next((msg) => msg.type === 'error');

      expect(error.message).toBe(`Session ${echo.session} not found`);
      expect(executor.get(echo.session ?? '')?.state).toBe('Running');
    });
  });

  describe('reconnect', () => {
    test('replays every missed event once, in order', async () => {
      await startServer();
      const first = await connect();
      const channel = first.channel;
      first.send({ type: 'flash', firmware: 'alpha', port: '/dev/ttyUSB0' });
      const echo = await first.next((msg) => msg.type === 'command');
      const sessionId = echo.session ?? '';

      await first.close();
      await waitFor(() => !broker.isConnected(channel));
      const session = executor.get(sessionId);
      expect(session?.state).toBe('Running');

      launcher.last.write('Connecting...\nChip is ESP32\n');
      launcher.last.write('Hash of data verified.\n');
      launcher.last.finish(0);
      await session?.done;

      const second = await connect(channel);
      await second.next((msg) => msg.type === 'success');

      expect(second.messages[0]).toMatchObject({ type: 'info', message: 'WebSocket Terminal reconnected', channel });
      const before = first.forSession(sessionId).map((msg) => msg.seq);
      const after = second.forSession(sessionId).map((msg) => msg.seq);
      expect(before).toEqual([1, 2]);
      expect(after).toEqual([3, 4, 5, 6]);
      expect(second.forSession(sessionId).map((msg) => msg.message)).toEqual([
        'Connecting...',
        'Chip is ESP32',
        'Hash of data verified.',
        '✅ alpha flashed successfully!',
      ]);
    });

    test('warns about events that no longer fit the replay buffer', async () => {
      await startServer(3);
      const first = await connect();
      const channel = first.channel;
      first.send({ type: 'flash', firmware: 'alpha', port: '/dev/ttyUSB0' });
      const echo = await first.next((msg) => msg.type === 'command');
      const sessionId = echo.session ?? '';

      await first.close();
      await waitFor(() => !broker.isConnected(channel));
      for (let i = 1; i <= 5; i++) launcher.last.write(`line ${i}\n`);
      launcher.last.finish(0);
      await executor.get(sessionId)?.done;

      const second = await connect(channel);
      await second.next((msg) => msg.type === 'success');

      const replayed = second.forSession(sessionId);
      expect(replayed[0]).toMatchObject({
        type: 'warning',
        message: '3 earlier messages of this session are no longer available',
      });
      expect(replayed.slice(1).map((msg) => msg.seq)).toEqual([6, 7, 8]);
    });

    test('resumes from the last event the browser reports', async () => {
      await startServer();
      const first = await connect();
      const channel = first.channel;
      first.send({ type: 'flash', firmware: 'alpha', port: '/dev/ttyUSB0' });
      const echo = await first.next((msg) => msg.type === 'command');
      const sessionId = echo.session ?? '';

      launcher.last.write('Connecting...\nChip is ESP32\n');
      await first.next((msg) => msg.session === sessionId && msg.seq === 4);
      await first.close();
      await waitFor(() => !broker.isConnected(channel));
      launcher.last.finish(0);
      await executor.get(sessionId)?.done;

      // Events 3 and 4 were sent but never reached the browser
      const second = await connect(channel, { [sessionId]: 2, 'unknown-session': 0 });
      await second.next((msg) => msg.type === 'success');

      expect(second.forSession(sessionId).map((msg) => msg.seq)).toEqual([3, 4, 5]);
      expect(second.forSession(sessionId).map((msg) => msg.message)).toEqual([
        'Connecting...',
        'Chip is ESP32',
        '✅ alpha flashed successfully!',
      ]);
      expect(second.messages.filter((msg) => msg.session === 'unknown-session')).toEqual([]);
    });

    test('keeps a channel while its session runs, however long the socket is gone', async () => {
      await startServer(undefined, { heartbeatMs: 20, channelGraceMs: 100 });
      const first = await connect();
      const channel = first.channel;
      first.send({ type: 'flash', firmware: 'alpha', port: '/dev/ttyUSB0' });
      const echo = await first.next((msg) => msg.type === 'command');
      const sessionId = echo.session ?? '';

      await first.close();
      await waitFor(() => !broker.isConnected(channel));
      await new Promise((resolve) => setTimeout(resolve, 300));
      expect(broker.getChannelCount()).toBe(1);

      launcher.last.write('Connecting...\n');
      launcher.last.finish(0);
      await executor.get(sessionId)?.done;

      const second = await connect(channel);
      await second.next((msg) => msg.type === 'success');

      expect(second.messages[0]).toMatchObject({ type: 'info', message: 'WebSocket Terminal reconnected', channel });
      expect(second.forSession(sessionId).map((msg) => msg.seq)).toEqual([3, 4]);
    });

    test('drops a channel once its sessions ended and the grace period passed', async () => {
      await startServer(undefined, { heartbeatMs: 20, channelGraceMs: 60 });
      launcher.onSpawn = (child) => setImmediate(() => child.finish(0));
      const first = await connect();
      const channel = first.channel;
      first.send({ type: 'flash', firmware: 'alpha', port: '/dev/ttyUSB0' });
      await first.next((msg) => msg.type === 'success');

      await first.close();
      await waitFor(() => broker.getChannelCount() === 0);

      const second = await connect(channel);
      expect(second.messages[0].message).toBe('WebSocket Terminal connected');
      expect(second.channel).not.toBe(channel);
    });

    test('an unknown channel id starts a fresh channel', async () => {
      await startServer();
      const client = await connect('no-such-channel');

      expect(client.messages[0].message).toBe('WebSocket Terminal connected');
      expect(client.channel).not.toBe('no-such-channel');
    });
  });
});

describe('parseResumeCursor', () => {
  test('reads session and seq pairs and skips malformed entries', () => {
    expect(parseResumeCursor('a:3,b:c:7,bad,:4,x:-1,y:')).toEqual(new Map([['a', 3], ['b:c', 7]]));
  });

  test('an absent parameter is an empty cursor', () => {
    expect(parseResumeCursor(null)).toEqual(new Map());
    expect(parseResumeCursor('')).toEqual(new Map());
  });
});
