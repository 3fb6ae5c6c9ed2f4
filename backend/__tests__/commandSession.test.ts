import { CommandSession } from '../src/models/CommandSession';
import { StreamEvent } from '../src/models/StreamEvent';

function newSession(replayLimit?: number): CommandSession {
  return new CommandSession('s-1', 'channel-1', { kind: 'flash', firmware: 'alpha', port: '/dev/ttyUSB0' }, '/dev/ttyUSB0', replayLimit);
}

describe('CommandSession', () => {
  test('numbers events from 1 and notifies listeners in order', () => {
    const session = newSession();
    const seen: StreamEvent[] = [];
    session.onEvent((event) => seen.push(event));

    session.append('info', 'Starting flash for alpha...');
    session.append('command-echo', 'Executing: esptool');
    session.append('progress', 'Writing at 0x0 (50 %)');

    expect(seen.map((event) => [event.seq, event.kind])).toEqual([
      [1, 'info'],
      [2, 'command-echo'],
      [3, 'progress'],
    ]);
    expect(seen.every((event) => event.sessionId === 's-1' && !event.terminal)).toBe(true);
    expect(Object.isFrozen(seen[0])).toBe(true);
  });

  test('emits exactly one terminal event', async () => {
    const session = newSession();
    session.transition('Running');

    const success = session.finish('Succeeded', 'alpha flashed', 'alpha');
    expect(success).toMatchObject({ kind: 'success', terminal: true, target: 'alpha', seq: 1 });
    expect(session.finish('Failed', 'too late')).toBeNull();
    expect(session.append('output-chunk', 'late output')).toBeNull();
    expect(session.state).toBe('Succeeded');
    await expect(session.done).resolves.toBe('Succeeded');
  });

  test('failure carries no target', () => {
    const session = newSession();
    const event = session.finish('Failed', 'Flash failed with code 2', 'alpha');
    expect(event).toMatchObject({ kind: 'error', terminal: true });
    expect(event?.target).toBeUndefined();
  });

  test('state only moves forward', () => {
    const session = newSession();
    session.transition('Running');
    expect(() => session.transition('Starting')).toThrow('invalid transition Running -> Starting');
    expect(() => session.transition('Running')).toThrow();
  });

  test('cancel drops later output and ends with an error event', async () => {
    const session = newSession();
    session.transition('Running');
    session.append('progress', 'Writing at 0x0 (10 %)');

    expect(session.requestCancel('stop requested')).toBe(true);
    expect(session.signal.aborted).toBe(true);
    expect(session.cancelReason).toBe('stop requested');
    expect(session.append('progress', 'Writing at 0x0 (20 %)')).toBeNull();
    expect(session.requestCancel()).toBe(false);

    const terminal = session.finish('Succeeded', 'Flash cancelled', 'alpha');
    expect(terminal).toMatchObject({ kind: 'error', seq: 2, terminal: true });
    await expect(session.done).resolves.toBe('Cancelled');
  });

  test('replay buffer keeps the newest events and reports what fell out', () => {
    const session = newSession(3);
    for (let i = 1; i <= 5; i++) {
      session.append('output-chunk', `line ${i}`);
    }

    const fromStart = session.eventsSince(0);
    expect(fromStart.events.map((event) => event.seq)).toEqual([3, 4, 5]);
    expect(fromStart.dropped).toBe(2);

    const recent = session.eventsSince(3);
    expect(recent.events.map((event) => event.message)).toEqual(['line 4', 'line 5']);
    expect(recent.dropped).toBe(0);
  });

  test('unsubscribing stops notifications', () => {
    const session = newSession();
    const seen: number[] = [];
    const unsubscribe = session.onEvent((event) => seen.push(event.seq));

    session.append('info', 'one');
    unsubscribe();
    session.append('info', 'two');

    expect(seen).toEqual([1]);
    expect(session.lastSeq).toBe(2);
  });
});
