import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { RawChunk, StationIdentity } from '@shared/schema';
import { StreamReader, type StreamReaderConfig, type StreamReaderEvents } from '../../server/stream/streamReader';
import type { ConnectionError } from '../../server/monitor/errors';
import { exponentialBackoff, fixedBackoff } from '../../lib/reliability';
import { FakeClock } from '../helpers/fakeClock';
import { audioResponse, bytesOf, openAudioResponse, statusResponse } from '../helpers/fakeStream';

const STATION: StationIdentity = {
  id: 'kxyz',
  displayName: 'KXYZ Test FM',
  streamURL: 'http://radio.test/kxyz.mp3',
};

interface Recorder {
  events: StreamReaderEvents;
  chunks: RawChunk[];
  connected: number[];
  disconnects: Array<{ error: ConnectionError; attempt: number }>;
}

function recorder(onDisconnect?: (count: number) => void): Recorder {
  const chunks: RawChunk[] = [];
  const connected: number[] = [];
  const disconnects: Array<{ error: ConnectionError; attempt: number }> = [];
  return {
    chunks,
    connected,
    disconnects,
    events: {
      onConnected: (attempt) => connected.push(attempt),
      onChunk: (chunk) => chunks.push(chunk),
      onDisconnected: (error, attempt) => {
        disconnects.push({ error, attempt });
        onDisconnect?.(disconnects.length);
      },
    },
  };
}

describe('StreamReader', () => {
  let clock: FakeClock;
  let config: StreamReaderConfig;

  beforeEach(() => {
    clock = new FakeClock(1_000);
    config = {
      chunkSizeBytes: 4,
      connectTimeoutMs: 60_000,
      readTimeoutMs: 60_000,
      backoff: fixedBackoff(5000),
      userAgent: 'test-agent/1.0',
      clock,
    };
  });

  it('should re-chunk the body and deliver the tail before reporting the end', async () => {
    let reader: StreamReader | null = null;
    const rec = recorder(() => {
      void reader?.stop();
    });
    const fetchImpl = vi.fn<typeof fetch>(async () => audioResponse([bytesOf(1, 2, 3), bytesOf(4, 5, 6, 7, 8, 9)]));
    reader = new StreamReader(STATION, rec.events, { ...config, fetchImpl });

    await reader.start();

    expect(rec.connected).toEqual([1]);
    expect(rec.chunks.map((chunk) => [...chunk.bytes])).toEqual([[1, 2, 3, 4], [5, 6, 7, 8], [9]]);
    expect(rec.chunks.every((chunk) => chunk.stationId === 'kxyz' && chunk.receivedAt === 1_000)).toBe(true);
    expect(rec.disconnects).toHaveLength(1);
    expect(rec.disconnects[0]?.error.kind).toBe('ended');
    expect(rec.disconnects[0]?.error.message).toBe('stream ended');
    expect(reader.getStatus().bytesRead).toBe(9);
  });

  it('should send the configured user agent', async () => {
    let reader: StreamReader | null = null;
    const rec = recorder(() => {
      void reader?.stop();
    });
    const fetchImpl = vi.fn<typeof fetch>(async () => audioResponse([]));
    reader = new StreamReader(STATION, rec.events, { ...config, fetchImpl });

    await reader.start();

    expect(fetchImpl).toHaveBeenCalledWith(
      'http://radio.test/kxyz.mp3',
      expect.objectContaining({
        method: 'GET',
        headers: { 'User-Agent': 'test-agent/1.0', Accept: 'audio/*' },
      })
    );
  });

  it('should retry after a bad status and reset the failure count on success', async () => {
    let reader: StreamReader | null = null;
    const rec = recorder((count) => {
      if (count === 2) void reader?.stop();
    });
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(statusResponse(503))
      .mockResolvedValueOnce(audioResponse([bytesOf(1, 2, 3, 4)]));
    reader = new StreamReader(STATION, rec.events, { ...config, fetchImpl });

    await reader.start();

    expect(rec.disconnects[0]?.error.kind).toBe('status');
    expect(rec.disconnects[0]?.error.status).toBe(503);
    expect(rec.disconnects[0]?.error.message).toBe('unexpected HTTP status 503');
    expect(rec.connected).toEqual([2]);
    expect(rec.chunks).toHaveLength(1);
    expect(clock.sleeps[0]).toBe(5000);
    expect(reader.getStatus()).toEqual({
      running: false,
      connected: false,
      attempts: 2,
      consecutiveFailures: 1,
      disconnects: 2,
      bytesRead: 4,
    });
  });

  it('should accept 206 responses', async () => {
    let reader: StreamReader | null = null;
    const rec = recorder(() => {
      void reader?.stop();
    });
    const fetchImpl = vi.fn<typeof fetch>(
      async () => new Response(bytesOf(1, 2, 3, 4), { status: 206 })
    );
    reader = new StreamReader(STATION, rec.events, { ...config, fetchImpl });

    await reader.start();

    expect(rec.connected).toEqual([1]);
    expect(rec.chunks).toHaveLength(1);
  });

  it('should back off exponentially across consecutive network failures', async () => {
    let reader: StreamReader | null = null;
    const rec = recorder((count) => {
      if (count === 4) void reader?.stop();
    });
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw new TypeError('fetch failed');
    });
    reader = new StreamReader(STATION, rec.events, {
      ...config,
      fetchImpl,
      backoff: exponentialBackoff({ baseDelayMs: 100, maxDelayMs: 1000 }),
    });

    await reader.start();

    expect(rec.disconnects.map((d) => d.attempt)).toEqual([1, 2, 3, 4]);
    expect(rec.disconnects[0]?.error.kind).toBe('network');
    expect(rec.disconnects[0]?.error.message).toBe('network error: fetch failed');
    expect(clock.sleeps).toEqual([100, 200, 400, 800]);
    expect(rec.connected).toEqual([]);
  });

  it('should report a response without a body', async () => {
    let reader: StreamReader | null = null;
    const rec = recorder(() => {
      void reader?.stop();
    });
    const fetchImpl = vi.fn<typeof fetch>(async () => statusResponse(200));
    reader = new StreamReader(STATION, rec.events, { ...config, fetchImpl });

    await reader.start();

    expect(rec.disconnects[0]?.error.kind).toBe('no_body');
  });

  it('should time out a connect that never answers', async () => {
    let reader: StreamReader | null = null;
    const rec = recorder(() => {
      void reader?.stop();
    });
    const fetchImpl = vi.fn<typeof fetch>(() => new Promise<Response>(() => undefined));
    reader = new StreamReader(STATION, rec.events, { ...config, connectTimeoutMs: 20, fetchImpl });

    await reader.start();

    expect(rec.disconnects[0]?.error.kind).toBe('timeout');
    expect(rec.disconnects[0]?.error.message).toBe('connect timed out after 20ms');
  });

  it('should time out a read that stalls', async () => {
    let reader: StreamReader | null = null;
    const rec = recorder(() => {
      void reader?.stop();
    });
    const fetchImpl = vi.fn<typeof fetch>(async () => openAudioResponse([bytesOf(1, 2, 3, 4, 5, 6)]));
    reader = new StreamReader(STATION, rec.events, { ...config, readTimeoutMs: 20, fetchImpl });

    await reader.start();

    expect(rec.chunks.map((chunk) => [...chunk.bytes])).toEqual([[1, 2, 3, 4], [5, 6]]);
    expect(rec.disconnects[0]?.error.message).toBe('read timed out after 20ms');
  });

  it('should stop mid-stream without reporting a disconnect', async () => {
    const rec = recorder();
    const fetchImpl = vi.fn<typeof fetch>(async () => openAudioResponse([bytesOf(1, 2, 3, 4, 5, 6, 7, 8)]));
    const reader = new StreamReader(STATION, rec.events, { ...config, fetchImpl });

    const running = reader.start();
    await vi.waitFor(() => expect(rec.chunks).toHaveLength(2));

    await reader.stop();
    await running;

    expect(reader.isRunning()).toBe(false);
    expect(rec.disconnects).toEqual([]);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('should not start after it has been stopped', async () => {
    const rec = recorder();
    const fetchImpl = vi.fn<typeof fetch>(async () => audioResponse([]));
    const reader = new StreamReader(STATION, rec.events, { ...config, fetchImpl });

    await reader.stop();
    await reader.start();

    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('should reject a non-positive chunk size', () => {
    expect(() => new StreamReader(STATION, recorder().events, { ...config, chunkSizeBytes: 0 })).toThrow(RangeError);
  });
});
