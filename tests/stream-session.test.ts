/**
 * Stream session and transport pool tests over scripted transports.
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { defaultConfig, type StreamsConfig } from '../src/core/config/schema.js';
import { StreamSession, type StreamState } from '../src/streams/session.js';
import { TransportPool } from '../src/streams/transport.js';
import type { Sample } from '../src/core/models/samples.js';
import type { SensorKind } from '../src/core/models/sensors.js';
import { AUDIO_TRACK, FakeTransportFactory, GAZE_TRACK, SCENE_TRACK, mediaUnit } from './support/fake-transport.js';
import { gazePointPayload } from './support/rtp.js';
import { waitUntil } from './support/wait.js';

const URL_GAZE = 'rtsp://127.0.0.1:8086/?camera=gaze';
const URL_WORLD = 'rtsp://127.0.0.1:8086/?camera=world';

const CONFIG: StreamsConfig = {
  ...defaultConfig().streams,
  bufferCapacity: 4,
  maxConsecutiveDecodeErrors: 2,
  reconnect: { enabled: true, maxAttempts: 0, initialDelayMs: 10, maxDelayMs: 50, jitterMs: 0 },
};

const GAZE = gazePointPayload(0.5, 0.25, true);
const GARBAGE = new Uint8Array(10);

describe('TransportPool', () => {
  it('shares one transport per URL and closes it with the last lease', () => {
    const factory = new FakeTransportFactory();
    const pool = new TransportPool(factory.create);

    const first = pool.acquire(URL_WORLD);
    const second = pool.acquire(URL_WORLD);
    expect(first.transport).toBe(second.transport);
    expect(pool.refCount(URL_WORLD)).toBe(2);

    first.release();
    first.release();
    expect(pool.refCount(URL_WORLD)).toBe(1);
    expect(factory.latest()?.closed).toBe(false);

    second.release();
    expect(pool.size()).toBe(0);
    expect(factory.latest()?.closed).toBe(true);
  });

  it('never hands out a transport that died', () => {
    const factory = new FakeTransportFactory();
    const pool = new TransportPool(factory.create);

    const lease = pool.acquire(URL_GAZE);
    factory.latest()?.fail('reset');
    const fresh = pool.acquire(URL_GAZE);

    expect(fresh.transport).not.toBe(lease.transport);
    expect(factory.count(URL_GAZE)).toBe(2);
  });
});

describe('StreamSession', () => {
  let factory: FakeTransportFactory;
  let pool: TransportPool;
  const sessions: StreamSession[] = [];

  function open(kind: SensorKind, url: string, offsetNs = 0n): StreamSession {
    const session = new StreamSession({
      kind,
      url,
      pool,
      config: CONFIG,
      clock: { translate: (ns) => ns + offsetNs },
    });
    sessions.push(session);
    session.open();
    return session;
  }

  function transport(url = URL_GAZE) {
    const latest = factory.latest(url);
    if (!latest) throw new Error(`no transport for ${url}`);
    return latest;
  }

  beforeEach(() => {
    factory = new FakeTransportFactory();
    pool = new TransportPool(factory.create);
  });

  afterEach(() => {
    for (const session of sessions.splice(0)) {
      session.close();
    }
  });

  it('stamps decoded samples with both clocks', async () => {
    const session = open('gaze', URL_GAZE, 1000n);
    await waitUntil(() => session.getState() === 'streaming');

    transport().emit('data', mediaUnit(GAZE_TRACK, 5000n, GAZE));
    const sample = await session.next(100);

    expect(sample).toEqual({
      kind: 'gaze',
      deviceTimestampNs: 5000n,
      timestampNs: 6000n,
      epoch: 0,
      gaze: { format: 'point', x: 0.5, y: 0.25, worn: true },
    });
    expect(session.latest()).toBe(sample);
    expect(session.receivedCount()).toBe(1);
  });

  it('never lets local timestamps step backwards', async () => {
    const session = open('gaze', URL_GAZE, 1000n);
    await waitUntil(() => session.getState() === 'streaming');

    const produced: Sample[] = [];
    session.onSample((sample) => produced.push(sample));

    transport().emit('data', mediaUnit(GAZE_TRACK, 2000n, GAZE));
    transport().emit('data', mediaUnit(GAZE_TRACK, 1500n, GAZE));

    expect(produced.map((sample) => sample.deviceTimestampNs)).toEqual([2000n, 1500n]);
    expect(produced.map((sample) => sample.timestampNs)).toEqual([3000n, 3000n]);
  });

  it('hands an idle consumer the last sample produced', async () => {
    const session = open('gaze', URL_GAZE);
    await waitUntil(() => session.getState() === 'streaming');

    for (let i = 1; i <= 6; i++) {
      transport().emit('data', mediaUnit(GAZE_TRACK, BigInt(i), GAZE));
    }

    expect(session.droppedCount()).toBe(2);
    expect((await session.next(0))?.deviceTimestampNs).toBe(6n);
    expect(await session.next(0)).toBeNull();
  });

  it('waits for the next sample when nothing is buffered', async () => {
    const session = open('gaze', URL_GAZE);
    await waitUntil(() => session.getState() === 'streaming');

    const pending = session.next(1000);
    transport().emit('data', mediaUnit(GAZE_TRACK, 7n, GAZE));

    expect((await pending)?.deviceTimestampNs).toBe(7n);
  });

  it('tolerates isolated decode errors', async () => {
    const session = open('gaze', URL_GAZE);
    await waitUntil(() => session.getState() === 'streaming');

    for (const payload of [GARBAGE, GARBAGE, GAZE, GARBAGE, GARBAGE]) {
      transport().emit('data', mediaUnit(GAZE_TRACK, 1n, payload));
    }

    expect(session.getState()).toBe('streaming');
    expect(session.receivedCount()).toBe(1);
  });

  it('reconnects after too many consecutive decode errors', async () => {
    const session = open('gaze', URL_GAZE);
    await waitUntil(() => session.getState() === 'streaming');
    const states: StreamState[] = [];
    session.on('stateChanged', (state) => states.push(state));

    for (let i = 0; i < 3; i++) {
      transport().emit('data', mediaUnit(GAZE_TRACK, 1n, GARBAGE));
    }
    await waitUntil(() => session.getState() === 'streaming');

    expect(states).toEqual(['error', 'connecting', 'streaming']);
    expect(factory.count(URL_GAZE)).toBe(2);
    expect(session.getEpoch()).toBe(1);
  });

  it('starts a new epoch when the transport drops', async () => {
    const session = open('gaze', URL_GAZE);
    await waitUntil(() => session.getState() === 'streaming');
    const epochs: number[] = [];
    session.on('reconnected', (epoch) => epochs.push(epoch));

    transport().fail('connection reset');
    expect(session.getState()).toBe('error');
    await waitUntil(() => session.getState() === 'streaming');

    transport().emit('data', mediaUnit(GAZE_TRACK, 10n, GAZE));
    expect(epochs).toEqual([1]);
    expect((await session.next(0))?.epoch).toBe(1);
  });

  it('retries when the transport fails to start', async () => {
    let attempts = 0;
    factory.onCreate = (created) => {
      attempts++;
      if (attempts === 1) created.failStart(new Error('refused'));
    };
    const session = open('gaze', URL_GAZE);

    await waitUntil(() => session.getState() === 'streaming');
    expect(factory.count(URL_GAZE)).toBe(2);
    expect(session.getEpoch()).toBe(0);
  });

  it('routes each track of a shared transport to its own session', async () => {
    const scene = open('scene', URL_WORLD);
    const audio = open('audio', URL_WORLD);
    await waitUntil(() => scene.getState() === 'streaming' && audio.getState() === 'streaming');

    expect(factory.count(URL_WORLD)).toBe(1);
    expect(pool.refCount(URL_WORLD)).toBe(2);

    transport(URL_WORLD).emit('video', mediaUnit(SCENE_TRACK, 1n, new Uint8Array([0, 0, 0, 1, 0x65]), true));
    transport(URL_WORLD).emit('audio', mediaUnit(AUDIO_TRACK, 2n, new Uint8Array([0, 1])));

    expect((await scene.next(0))?.kind).toBe('scene');
    expect(await scene.next(0)).toBeNull();
    expect((await audio.next(0))?.kind).toBe('audio');

    scene.close();
    expect(transport(URL_WORLD).closed).toBe(false);
    audio.close();
    expect(transport(URL_WORLD).closed).toBe(true);
  });

  it('releases the transport when closed while connecting', async () => {
    factory.onCreate = (created) => {
      created.holdStart();
    };
    const session = open('gaze', URL_GAZE);
    expect(session.getState()).toBe('connecting');

    session.close();
    transport().release();
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(session.getState()).toBe('closed');
    expect(transport().closed).toBe(true);
    expect(transport().subscriberCount('data')).toBe(0);
  });

  it('ends iteration on close', async () => {
    const session = open('gaze', URL_GAZE);
    await waitUntil(() => session.getState() === 'streaming');
    transport().emit('data', mediaUnit(GAZE_TRACK, 1n, GAZE));

    const seen: bigint[] = [];
    const iteration = (async () => {
      for await (const sample of session.samples()) {
        seen.push(sample.deviceTimestampNs);
        session.setDesired(false);
      }
    })();
    await iteration;

    expect(seen).toEqual([1n]);
    expect(session.getState()).toBe('closed');
  });
});
