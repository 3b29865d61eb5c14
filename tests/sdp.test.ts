/**
 * SDP parsing and RTSP framing tests.
 */

import { describe, it, expect } from 'vitest';
import { ProtocolError } from '../src/core/errors.js';
import {
  RtspStreamReader,
  parseSessionHeader,
  resolveControlUrl,
  serialiseRequest,
} from '../src/adapters/rtsp/protocol.js';
import { parseSdp } from '../src/adapters/rtsp/sdp.js';
import { GAZE_SDP, SCENE_AUDIO_SDP } from './support/fake-rtsp.js';
import { interleave } from './support/rtp.js';

describe('parseSdp', () => {
  it('parses a video and audio description', () => {
    const description = parseSdp(SCENE_AUDIO_SDP);

    expect(description.control).toBe('*');
    expect(description.media).toEqual([
      {
        media: 'video',
        track: 'video',
        payloadType: 96,
        codec: 'H264',
        clockRate: 90000,
        channels: 1,
        control: 'trackID=0',
        fmtp: { 'packetization-mode': '1', 'sprop-parameter-sets': 'Z0IAKeKQ,aM48gA==' },
      },
      {
        media: 'audio',
        track: 'audio',
        payloadType: 97,
        codec: 'L16',
        clockRate: 8000,
        channels: 1,
        control: 'trackID=1',
        fmtp: {},
      },
    ]);
  });

  it('maps application media to the data track', () => {
    const description = parseSdp(GAZE_SDP);

    expect(description.control).toBeNull();
    expect(description.media[0]?.track).toBe('data');
    expect(description.media[0]?.codec).toBe('X-GAZE');
    expect(description.media[0]?.clockRate).toBe(1000000);
  });

  it('falls back to the static clock rate without rtpmap', () => {
    const description = parseSdp('v=0\r\nm=video 0 RTP/AVP 96\r\n');

    expect(description.media[0]?.codec).toBe('UNKNOWN');
    expect(description.media[0]?.clockRate).toBe(90000);
  });

  it('rejects a description without media', () => {
    expect(() => parseSdp('v=0\r\ns=empty\r\n')).toThrow(ProtocolError);
  });
});

describe('resolveControlUrl', () => {
  it('uses the base for a missing or aggregate control', () => {
    expect(resolveControlUrl('rtsp://host/live', null)).toBe('rtsp://host/live');
    expect(resolveControlUrl('rtsp://host/live', '*')).toBe('rtsp://host/live');
  });

  it('keeps absolute controls and appends relative ones', () => {
    expect(resolveControlUrl('rtsp://host/live', 'rtsp://other/track')).toBe('rtsp://other/track');
    expect(resolveControlUrl('rtsp://host/live', 'trackID=0')).toBe('rtsp://host/live/trackID=0');
    expect(resolveControlUrl('rtsp://host/live/', 'trackID=1')).toBe('rtsp://host/live/trackID=1');
  });
});

describe('parseSessionHeader', () => {
  it('splits the id from the timeout', () => {
    expect(parseSessionHeader('12345678;timeout=60')).toEqual({ id: '12345678', timeoutSec: 60 });
    expect(parseSessionHeader('abc')).toEqual({ id: 'abc', timeoutSec: null });
  });
});

describe('serialiseRequest', () => {
  it('writes the request line and headers', () => {
    const text = serialiseRequest(
      { method: 'DESCRIBE', url: 'rtsp://host/', cseq: 2, headers: { Accept: 'application/sdp' } },
      'gazecast'
    );
    expect(text).toBe('DESCRIBE rtsp://host/ RTSP/1.0\r\nCSeq: 2\r\nUser-Agent: gazecast\r\nAccept: application/sdp\r\n\r\n');
  });
});

describe('RtspStreamReader', () => {
  it('waits for a response body split across reads', () => {
    const reader = new RtspStreamReader();
    const message = 'RTSP/1.0 200 OK\r\nCSeq: 3\r\nContent-Length: 5\r\n\r\nhello';

    expect(reader.push(Buffer.from(message.slice(0, 30)))).toEqual([]);
    const items = reader.push(Buffer.from(message.slice(30)));

    expect(items).toHaveLength(1);
    const item = items[0];
    if (item?.type !== 'response') throw new Error('expected a response');
    expect(item.response.statusCode).toBe(200);
    expect(item.response.statusText).toBe('OK');
    expect(item.response.headers['cseq']).toBe('3');
    expect(item.response.body.toString()).toBe('hello');
  });

  it('separates interleaved frames from messages', () => {
    const reader = new RtspStreamReader();
    const chunk = Buffer.concat([
      interleave(1, Buffer.from([7, 8, 9])),
      Buffer.from('RTSP/1.0 200 OK\r\nCSeq: 4\r\n\r\n'),
    ]);

    const items = reader.push(chunk);
    expect(items.map((item) => item.type)).toEqual(['interleaved', 'response']);
    const frame = items[0];
    if (frame?.type !== 'interleaved') throw new Error('expected a frame');
    expect(frame.frame.channel).toBe(1);
    expect([...frame.frame.payload]).toEqual([7, 8, 9]);
  });

  it('parses requests sent by the server', () => {
    const reader = new RtspStreamReader();
    const items = reader.push(Buffer.from('OPTIONS * RTSP/1.0\r\nCSeq: 1\r\n\r\n'));

    expect(items).toEqual([{ type: 'request', method: 'OPTIONS', headers: { cseq: '1' } }]);
  });

  it('rejects a malformed status line', () => {
    const reader = new RtspStreamReader();
    expect(() => reader.push(Buffer.from('RTSP/1.0 OK\r\n\r\n'))).toThrow(ProtocolError);
  });
});
