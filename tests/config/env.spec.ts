import { describe, it, expect } from 'vitest';
import { parseEnv } from '../../server/src/config/env';
import { DEFAULT_MONITOR_CONFIG, monitorConfigFromEnv } from '../../server/config/monitor';

describe('parseEnv', () => {
  it('should fill in defaults for an empty environment', () => {
    const result = parseEnv({});

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data).toMatchObject({
      APP_NAME: 'radio-contest-monitor',
      PORT: 5000,
      LOG_LEVEL: 'info',
      TRANSCRIPTION_MODEL: 'whisper-1',
      MAX_CONCURRENT_STATIONS: 5,
      SEGMENT_QUEUE_SIZE: 3,
      AUTO_START: 'false',
    });
    expect(result.data.SEGMENT_HARD_CAP_BYTES).toBeUndefined();
    expect(result.data.OPENAI_API_KEY).toBeUndefined();
  });

  it('should coerce numeric strings', () => {
    const result = parseEnv({ PORT: '8080', MAX_CONCURRENT_STATIONS: '12', OPENAI_API_KEY: 'test-secret' });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.PORT).toBe(8080);
    expect(result.data.MAX_CONCURRENT_STATIONS).toBe(12);
    expect(result.data.OPENAI_API_KEY).toBe('test-secret');
  });

  it('should reject invalid values', () => {
    const result = parseEnv({ MAX_CONCURRENT_STATIONS: '0', STATION_COUNTRY: 'USA', LOG_LEVEL: 'loud' });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues.map((issue) => issue.path.join('.')).sort()).toEqual([
      'LOG_LEVEL',
      'MAX_CONCURRENT_STATIONS',
      'STATION_COUNTRY',
    ]);
  });

  it('should reject a hard cap below the segment target', () => {
    const result = parseEnv({ SEGMENT_TARGET_BYTES: '1000', SEGMENT_HARD_CAP_BYTES: '999' });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues.map((issue) => [issue.path.join('.'), issue.message])).toEqual([
      ['SEGMENT_HARD_CAP_BYTES', 'Must be at least SEGMENT_TARGET_BYTES (1000)'],
    ]);
  });

  it('should accept a hard cap equal to the segment target', () => {
    expect(parseEnv({ SEGMENT_TARGET_BYTES: '1000', SEGMENT_HARD_CAP_BYTES: '1000' }).success).toBe(true);
  });
});

describe('monitorConfigFromEnv', () => {
  it('should map the default environment onto the default config', () => {
    const result = parseEnv({});
    if (!result.success) throw result.error;

    expect(monitorConfigFromEnv(result.data)).toEqual(DEFAULT_MONITOR_CONFIG);
  });

  it('should derive the hard cap from the segment target unless set', () => {
    const derived = parseEnv({ SEGMENT_TARGET_BYTES: '1000' });
    const explicit = parseEnv({ SEGMENT_TARGET_BYTES: '1000', SEGMENT_HARD_CAP_BYTES: '1500' });
    if (!derived.success) throw derived.error;
    if (!explicit.success) throw explicit.error;

    expect(monitorConfigFromEnv(derived.data).segmentHardCapBytes).toBe(4000);
    expect(monitorConfigFromEnv(explicit.data).segmentHardCapBytes).toBe(1500);
  });

  it('should name the user agent after the app', () => {
    const result = parseEnv({ APP_NAME: 'scanner' });
    if (!result.success) throw result.error;

    expect(monitorConfigFromEnv(result.data).userAgent).toBe('scanner/1.0');
  });
});
