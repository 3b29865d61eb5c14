/**
 * RTSP transport tests against the in-process RTSP server.
 */

import { afterEach, describe, it, expect } from 'vitest';
import { RtspTransport } from '../src/adapters/rtsp/transport.js';
import { ClosedError, ConnectionError, RejectedError } from '../src/core/errors.js';
import type { MediaUnit } from '../src/streams/transport.js';
import { FakeRtspServer, GAZE_SDP, SCENE_AUDIO_SDP } from './support/fake-rtsp.js';
import { buildRtpPacket, buildSenderReport, gazePointPayload, unixSecondsToNtp } from './support/rtp.js';
import { waitUntil } from './support/wait.js';

const EPOCH_SECONDS = 1_700_000_000;
const EPOCH_NS = 1_700_000_000_000_000_000n;

let server: FakeRtspServer | null = null;
let transport: RtspTransport | null = null;

async function setUp(sdp: string, sessionTimeoutSec?: number, describeStatus?: number): Promise<{
  server: FakeRtspServer;
  transport: RtspTransport;
}> {
  server = await FakeRtspServer.start({ sdp, sessionTimeoutSec, describeStatus });
  transport = new RtspTransport(server.url(), { connectTimeoutMs: 2000, keepAliveIntervalMs: 20000 });
  return { server, transport };
}

function senderReport(rtpTimestamp: number): Buffer {
  return buildSenderReport({ ntpSeconds: unixSecondsToNtp(EPOCH_SECONDS), rtpTimestamp });
}

afterEach(async () => {
  transport?.close();
  transport = null;
  await server?.stop();
  server = null;
});

describe('RtspTransport', () => {
  it('negotiates every media section over interleaved TCP', async () => {
    const { server, transport } = await setUp(GAZE_SDP);
    await transport.start();

    expect(server.methods()).toEqual(['DESCRIBE', 'SETUP', 'PLAY']);
    expect(server.requests[1]?.headers['transport']).toBe('RTP/AVP/TCP;unicast;interleaved=0-1');
    expect(server.requests[2]?.headers['session']).toBe('fake-session');
    expect(transport.tracks()).toEqual([{ track: 'data', codec: 'X-GAZE', clockRate: 1_000_000, channels: 1, fmtp: {} }]);
  });

  it('shares one attempt between concurrent starts', async () => {
    const { server, transport } = await setUp(GAZE_SDP);
    await Promise.all([transport.start(), transport.start()]);

    expect(server.methods().filter((method) => method === 'DESCRIBE')).toHaveLength(1);
  });

  it('delivers units timed by the sender reports', async () => {
    const { server, transport } = await setUp(GAZE_SDP);
    const units: MediaUnit[] = [];
    await transport.start();
    transport.subscribe('data', (unit) => units.push(unit));
    await server.waitForPlaying();

    // Before the first sender report the unit cannot be placed in time
    server.send(0, buildRtpPacket({ payload: gazePointPayload(0.1, 0.1, true), timestamp: 0, sequence: 1, payloadType: 99, marker: true }));
    server.send(1, senderReport(0));
    server.send(0, buildRtpPacket({ payload: gazePointPayload(0.5, 0.25, true), timestamp: 10_000, sequence: 2, payloadType: 99, marker: true }));
    await waitUntil(() => units.length === 1);

    expect(units[0]?.deviceTimestampNs).toBe(EPOCH_NS + 10_000_000n);
    expect([...(units[0]?.data ?? [])]).toEqual([...gazePointPayload(0.5, 0.25, true)]);
  });

  it('demultiplexes video and audio from one connection', async () => {
    const { server, transport } = await setUp(SCENE_AUDIO_SDP);
    const video: MediaUnit[] = [];
    const audio: MediaUnit[] = [];
    await transport.start();
    transport.subscribe('video', (unit) => video.push(unit));
    transport.subscribe('audio', (unit) => audio.push(unit));
    await server.waitForPlaying();

    expect(server.requests[1]?.headers['transport']).toBe('RTP/AVP/TCP;unicast;interleaved=0-1');
    expect(server.requests[2]?.headers['transport']).toBe('RTP/AVP/TCP;unicast;interleaved=2-3');

    server.send(1, senderReport(0));
    server.send(3, senderReport(0));
    server.send(0, buildRtpPacket({ payload: new Uint8Array([0x65, 0x88]), timestamp: 90_000, sequence: 1, marker: true }));
    server.send(2, buildRtpPacket({ payload: new Uint8Array([0x01, 0x02]), timestamp: 8000, sequence: 1, payloadType: 97 }));
    await waitUntil(() => video.length === 1 && audio.length === 1);

    expect(video[0]?.keyframe).toBe(true);
    expect(video[0]?.deviceTimestampNs).toBe(EPOCH_NS + 1_000_000_000n);
    expect(video[0]?.info.codec).toBe('H264');
    // Parameter sets from the SDP lead the keyframe
    expect([...(video[0]?.data ?? []).slice(0, 5)]).toEqual([0, 0, 0, 1, 0x67]);
    expect(audio[0]?.deviceTimestampNs).toBe(EPOCH_NS + 1_000_000_000n);
    expect([...(audio[0]?.data ?? [])]).toEqual([0x01, 0x02]);
  });

  it('reports a dropped connection once', async () => {
    const { server, transport } = await setUp(GAZE_SDP);
    const reasons: string[] = [];
    transport.onClose((reason) => reasons.push(reason));
    await transport.start();

    server.dropConnections();
    await waitUntil(() => reasons.length > 0);

    expect(reasons).toEqual(['RTSP connection closed']);
    // A lost transport is finished; the pool creates a new one
    await expect(transport.start()).rejects.toBeInstanceOf(ClosedError);
  });

  it('sends keep-alives within the session timeout', async () => {
    const { server, transport } = await setUp(GAZE_SDP, 1);
    await transport.start();

    await server.waitForMethod('GET_PARAMETER');
    expect(server.requests.find((request) => request.method === 'GET_PARAMETER')?.headers['session']).toBe('fake-session');
  });

  it('tears the session down on close', async () => {
    const { server, transport } = await setUp(GAZE_SDP);
    const reasons: string[] = [];
    transport.onClose((reason) => reasons.push(reason));
    await transport.start();

    transport.close();
    await server.waitForMethod('TEARDOWN');

    expect(reasons).toEqual([]);
    await expect(transport.start()).rejects.toBeInstanceOf(ClosedError);
  });

  it('fails start when the server refuses DESCRIBE', async () => {
    const { transport } = await setUp(GAZE_SDP, undefined, 404);
    const reasons: string[] = [];
    transport.onClose((reason) => reasons.push(reason));

    const error: unknown = await transport.start().catch((e: unknown) => e);

    if (!(error instanceof RejectedError)) throw new Error('expected a RejectedError');
    expect(error.status).toBe(404);
    expect(reasons).toEqual(['Negotiation failed: RTSP DESCRIBE failed: 404 Not Found']);
  });

  it('fails start when nothing listens', async () => {
    const { server: gone } = await setUp(GAZE_SDP);
    const url = gone.url();
    await gone.stop();
    server = null;

    const orphan = new RtspTransport(url, { connectTimeoutMs: 2000, keepAliveIntervalMs: 20000 });
    await expect(orphan.start()).rejects.toBeInstanceOf(ConnectionError);
  });
});
