import { describe, it, expect } from 'vitest';
import { AdmissionGate, Dispatcher } from './dispatcher.js';
import { buildRunConfig } from './config.js';
import { ConfigurationError } from './errors.js';
import { FakeSessionFactory, device, recordingLogger } from './test-helpers.js';
import type { Logger } from './logger.js';
import type { DeviceOutcome, JobSpec } from './types.js';

const YOINK: JobSpec = Object.freeze({ mode: 'YOINK', commands: Object.freeze(['show version']) });
const SAVE_ONLY: JobSpec = Object.freeze({ mode: 'SAVE_ONLY', commands: Object.freeze([]) });

describe('AdmissionGate', () => {
  it('admits waiters in arrival order', async () => {
    const gate = new AdmissionGate(1);
    const order: string[] = [];

    await gate.acquire();
    const first = gate.acquire().then(() => order.push('first'));
    const second = gate.acquire().then(() => order.push('second'));
    expect(gate.waiting).toBe(2);

    gate.release();
    await first;
    gate.release();
    await second;

    expect(order).toEqual(['first', 'second']);
    expect(gate.waiting).toBe(0);
  });

  it('releases the slot when the task throws', async () => {
    const gate = new AdmissionGate(1);

    await expect(gate.use(async () => { throw new Error('boom'); })).rejects.toThrow('boom');
    await expect(gate.use(async () => 'ok')).resolves.toBe('ok');
  });

  it('rejects a non-positive limit', () => {
    expect(() => new AdmissionGate(0)).toThrow(ConfigurationError);
  });
});

describe('Dispatcher', () => {
  it('never runs more workers than the concurrency limit', async () => {
    const factory = new FakeSessionFactory({}, { latencyMs: 5 });
    const dispatcher = new Dispatcher({ sessionFactory: factory.create });
    const devices = ['a', 'b', 'c', 'd', 'e', 'f', 'g'].map(host => device(host));

    const outcomes = await dispatcher.run(devices, YOINK, buildRunConfig({ concurrencyLimit: 3 }, {}));

    expect(outcomes).toHaveLength(7);
    expect(dispatcher.peakActive).toBe(3);
    expect(factory.gauge.peak).toBeLessThanOrEqual(3);
    expect(dispatcher.activeWorkers).toBe(0);
  });

  it('does not let an unreachable device affect the others', async () => {
    const factory = new FakeSessionFactory({ 'sw2': { refuseConnect: true } }, { latencyMs: 2 });
    const dispatcher = new Dispatcher({ sessionFactory: factory.create });
    const devices = ['sw1', 'sw2', 'sw3', 'sw4'].map(host => device(host));

    const outcomes = await dispatcher.run(devices, YOINK, buildRunConfig({ concurrencyLimit: 2 }, {}));
    const byHost = new Map(outcomes.map(o => [o.host, o.status]));

    expect(byHost).toEqual(new Map([
      ['sw1', 'SUCCESS'],
      ['sw2', 'CONNECT_FAILURE'],
      ['sw3', 'SUCCESS'],
      ['sw4', 'SUCCESS'],
    ]));
  });

  it('runs save-only over three devices two at a time', async () => {
    const factory = new FakeSessionFactory({}, { latencyMs: 2 });
    const dispatcher = new Dispatcher({ sessionFactory: factory.create });
    const devices = ['r1', 'r2', 'r3'].map(host => device(host));

    const outcomes = await dispatcher.run(devices, SAVE_ONLY, buildRunConfig({ concurrencyLimit: 2 }, {}));

    expect(outcomes).toHaveLength(3);
    for (const outcome of outcomes) {
      expect(outcome.status).toBe('SUCCESS');
      expect(outcome.perCommandOutput).toHaveLength(1);
      expect(outcome.perCommandOutput?.[0].output).not.toBe('');
    }
    expect(dispatcher.peakActive).toBe(2);
  });

  it('reports each outcome as it completes', async () => {
    const factory = new FakeSessionFactory({ slow: { latencyMs: 20 } }, {});
    const seen: DeviceOutcome[] = [];
    const dispatcher = new Dispatcher({ sessionFactory: factory.create, onOutcome: o => seen.push(o) });

    await dispatcher.run([device('slow'), device('fast')], YOINK, buildRunConfig({ concurrencyLimit: 2 }, {}));

    expect(seen.map(o => o.host)).toEqual(['fast', 'slow']);
  });

  it('logs start and finish per device', async () => {
    const logger = recordingLogger('run');
    const factory = new FakeSessionFactory({ sw2: { rejectLogin: true } });
    const dispatcher = new Dispatcher({ sessionFactory: factory.create, logger });

    await dispatcher.run([device('sw2')], YOINK, buildRunConfig({}, {}));

    expect(logger.lines.filter(line => !line.startsWith('debug'))).toEqual([
      'info [run:sw2] starting yoink',
      'warn [run:sw2] finished: AUTH_FAILURE (Login rejected by device)',
    ]);
  });

  it('turns a worker that throws into an EXEC_FAILURE outcome', async () => {
    const broken: Logger = {
      debug: () => { throw new Error('log sink closed'); },
      info: () => {},
      warn: () => {},
      error: () => {},
      child: () => broken,
    };
    const factory = new FakeSessionFactory();
    const dispatcher = new Dispatcher({ sessionFactory: factory.create, logger: broken });

    const [outcome] = await dispatcher.run([device('sw1')], YOINK, buildRunConfig({}, {}));

    expect(outcome).toMatchObject({ host: 'sw1', mode: 'YOINK', status: 'EXEC_FAILURE', error: 'log sink closed' });
  });

  it('settles every device when logging the start throws', async () => {
    const broken: Logger = {
      debug: () => {},
      info: (message: string) => {
        if (message.startsWith('starting')) throw new Error('log sink closed');
      },
      warn: () => {},
      error: () => {},
      child: () => broken,
    };
    const factory = new FakeSessionFactory();
    const dispatcher = new Dispatcher({ sessionFactory: factory.create, logger: broken });

    const outcomes = await dispatcher.run([device('sw1'), device('sw2')], YOINK, buildRunConfig({}, {}));

    expect(outcomes.map(o => [o.host, o.status])).toEqual([['sw1', 'EXEC_FAILURE'], ['sw2', 'EXEC_FAILURE']]);
    expect(dispatcher.activeWorkers).toBe(0);
    expect(factory.sessions.size).toBe(0);
  });

  it('keeps the device outcome when logging the finish throws', async () => {
    const broken: Logger = {
      debug: () => {},
      info: (message: string) => {
        if (message.startsWith('finished')) throw new Error('log sink closed');
      },
      warn: () => {},
      error: () => {},
      child: () => broken,
    };
    const dispatcher = new Dispatcher({ sessionFactory: new FakeSessionFactory().create, logger: broken });

    const [outcome] = await dispatcher.run([device('sw1')], YOINK, buildRunConfig({}, {}));

    expect(outcome.status).toBe('SUCCESS');
    expect(dispatcher.activeWorkers).toBe(0);
  });

  it('returns nothing for an empty device list', async () => {
    const dispatcher = new Dispatcher({ sessionFactory: new FakeSessionFactory().create });

    expect(await dispatcher.run([], YOINK, buildRunConfig({}, {}))).toEqual([]);
  });
});
