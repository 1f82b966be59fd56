import { describe, it, expect, beforeEach } from 'vitest';
import { SegmentAccumulator, type SegmentAccumulatorConfig } from '../../server/stream/segmentAccumulator';
import type { AudioSegment } from '@shared/schema';
import { FakeClock } from '../helpers/fakeClock';

const CONFIG: SegmentAccumulatorConfig = {
  targetBytes: 100,
  maxWaitMs: 1000,
  hardCapBytes: 250,
  assumedBytesPerSecond: 50,
};

function bytes(length: number, fill: number = 1): Buffer {
  return Buffer.alloc(length, fill);
}

describe('SegmentAccumulator', () => {
  let clock: FakeClock;
  let accumulator: SegmentAccumulator;

  beforeEach(() => {
    clock = new FakeClock(0);
    accumulator = new SegmentAccumulator('station-a', CONFIG, clock);
  });

  describe('size trigger', () => {
    it('should hold chunks below the target', () => {
      expect(accumulator.addChunk(bytes(40), 10)).toEqual([]);
      expect(accumulator.bufferedBytes).toBe(40);
    });

    it('should flush once the target is reached', () => {
      accumulator.addChunk(bytes(40, 1), 10);
      const segments = accumulator.addChunk(bytes(60, 2), 20);
      const [segment] = segments;

      expect(segments).toHaveLength(1);
      expect(segment?.stationId).toBe('station-a');
      expect(segment?.payload.length).toBe(100);
      expect(segment?.payload[0]).toBe(1);
      expect(segment?.payload[99]).toBe(2);
      expect(segment?.approxDurationSeconds).toBe(2);
      expect(segment?.sequenceNumber).toBe(0);
      expect(segment?.flushReason).toBe('size');
      expect(segment?.createdAt).toBe(20);
      expect(accumulator.bufferedBytes).toBe(0);
      expect(accumulator.lastFlushTime).toBe(20);
    });
  });

  describe('time trigger', () => {
    it('should flush a small buffer once the max wait has elapsed', () => {
      expect(accumulator.addChunk(bytes(10), 500)).toEqual([]);
      const [segment] = accumulator.addChunk(bytes(10), 1000);

      expect(segment?.flushReason).toBe('time');
      expect(segment?.payload.length).toBe(20);
      expect(segment?.approxDurationSeconds).toBe(0.4);
    });

    it('should measure the wait from the last flush, not from construction', () => {
      accumulator.addChunk(bytes(100), 900);
      expect(accumulator.addChunk(bytes(10), 1500)).toEqual([]);
      expect(accumulator.addChunk(bytes(10), 1900).map((segment) => segment.flushReason)).toEqual(['time']);
    });

    it('should read the clock when no timestamp is given', () => {
      accumulator.addChunk(bytes(5));
      clock.advance(1000);
      expect(accumulator.addChunk(bytes(5)).map((segment) => segment.payload.length)).toEqual([10]);
    });

    it('should never emit an empty segment', () => {
      expect(accumulator.addChunk(bytes(0), 5000)).toEqual([]);
      expect(accumulator.nextSequenceNumber).toBe(0);
      expect(accumulator.lastFlushTime).toBe(0);
    });
  });

  describe('hard cap', () => {
    it('should force out the buffered bytes before a chunk that would pass the cap', () => {
      const capped = new SegmentAccumulator('station-a', { ...CONFIG, hardCapBytes: 120 }, clock);
      capped.addChunk(bytes(90, 1), 10);
      const [forced, ...rest] = capped.addChunk(bytes(40, 2), 20);

      expect(rest).toEqual([]);
      expect(forced?.flushReason).toBe('hard_cap');
      expect(forced?.payload.length).toBe(90);
      expect(forced?.payload[89]).toBe(1);
      expect(capped.bufferedBytes).toBe(40);

      const [next] = capped.addChunk(bytes(60, 3), 30);
      expect(next?.flushReason).toBe('size');
      expect(next?.sequenceNumber).toBe(1);
      expect(next?.payload.length).toBe(100);
      expect(next?.payload[0]).toBe(2);
    });

    it('should also flush the incoming chunk when it reaches the target on its own', () => {
      accumulator.addChunk(bytes(90, 1), 10);
      const segments = accumulator.addChunk(bytes(200, 2), 20);

      expect(segments.map((segment) => [segment.sequenceNumber, segment.flushReason, segment.payload.length])).toEqual([
        [0, 'hard_cap', 90],
        [1, 'size', 200],
      ]);
      expect(segments[1]?.payload[0]).toBe(2);
      expect(accumulator.bufferedBytes).toBe(0);
    });

    it('should never leave a full buffer behind when the cap equals the target', () => {
      const tight = new SegmentAccumulator('station-a', { ...CONFIG, hardCapBytes: 100 }, clock);

      expect(tight.addChunk(bytes(50), 10)).toEqual([]);
      const segments = tight.addChunk(bytes(100), 20);

      expect(segments.map((segment) => [segment.flushReason, segment.payload.length])).toEqual([
        ['hard_cap', 50],
        ['size', 100],
      ]);
      expect(tight.bufferedBytes).toBe(0);
      expect(tight.nextSequenceNumber).toBe(2);
    });

    it('should emit an oversized chunk on its own', () => {
      const segments = accumulator.addChunk(bytes(300), 10);
      const [segment] = segments;

      expect(segments).toHaveLength(1);
      expect(segment?.flushReason).toBe('hard_cap');
      expect(segment?.payload.length).toBe(300);
      expect(accumulator.bufferedBytes).toBe(0);
    });

    it('should reject a cap below the target', () => {
      expect(() => new SegmentAccumulator('x', { ...CONFIG, hardCapBytes: 50 }, clock)).toThrow(RangeError);
    });
  });

  it('should freeze emitted segments and copy the payload', () => {
    const chunk = bytes(100, 7);
    const [segment] = accumulator.addChunk(chunk, 10);
    chunk.fill(0);

    expect(segment && Object.isFrozen(segment)).toBe(true);
    expect(segment?.payload[0]).toBe(7);
  });

  it('should number segments without gaps and lose no bytes', () => {
    const sizes = [7, 33, 64, 1, 120, 250, 3, 99, 0, 180];
    const segments: AudioSegment[] = [];
    let total = 0;

    for (let round = 0; round < 5; round++) {
      sizes.forEach((size, index) => {
        total += size;
        segments.push(...accumulator.addChunk(bytes(size), round * 10_000 + index * 300));
        expect(accumulator.bufferedBytes).toBeLessThan(CONFIG.targetBytes);
      });
    }

    expect(segments.map((segment) => segment.sequenceNumber)).toEqual(segments.map((_segment, index) => index));
    expect(segments.every((segment) => segment.payload.length > 0)).toBe(true);
    expect(segments.every((segment) => segment.payload.length <= CONFIG.hardCapBytes)).toBe(true);
    expect(segments.reduce((sum, segment) => sum + segment.payload.length, 0) + accumulator.bufferedBytes).toBe(total);
  });
});
