import type { AudioSegment } from '@shared/schema';
import type { PcmAudio } from '../../server/stt/audio_decoder';

export function makeSegment(stationId: string, sequenceNumber: number, payload: Buffer = Buffer.alloc(64, 1)): AudioSegment {
  return {
    stationId,
    payload,
    approxDurationSeconds: payload.length / 32_000,
    sequenceNumber,
    flushReason: 'size',
    createdAt: 0,
  };
}

export function makePcm(seconds: number = 1, sampleRate: number = 16_000): PcmAudio {
  const data = Buffer.alloc(Math.round(seconds * sampleRate) * 2);
  return { data, sampleRate, channels: 1, durationSeconds: seconds };
}
