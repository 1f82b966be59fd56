import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import {
  RadioBrowserDirectory,
  pickStreamUrl,
  toStationIdentity,
  type RadioBrowserStation,
} from '../../server/directory/radioBrowser';
import { CircuitBreaker } from '../../lib/reliability';
import { FakeClock } from '../helpers/fakeClock';

function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

const ROWS: RadioBrowserStation[] = [
  {
    stationuuid: 'uuid-1',
    name: 'Hits 101',
    url: 'http://hits.test/playlist.m3u',
    url_resolved: 'https://hits.test/live.mp3',
    lastcheckok: 1,
  },
  { stationuuid: 'uuid-2', name: 'Broken FM', url: 'http://broken.test/live', lastcheckok: 0 },
  { stationuuid: 'uuid-3', name: 'Old Protocol', url: 'ftp://old.test/stream' },
  { stationuuid: 'uuid-4', name: '   ', url: 'http://unnamed.test/stream' },
];

describe('pickStreamUrl / toStationIdentity', () => {
  it('should prefer the resolved URL', () => {
    expect(pickStreamUrl(ROWS[0])).toBe('https://hits.test/live.mp3');
  });

  it('should fall back to the plain URL and skip non-http ones', () => {
    expect(pickStreamUrl({ stationuuid: 'a', name: 'A', url: 'http://a.test/s', url_resolved: 'rtsp://a.test/s' })).toBe(
      'http://a.test/s'
    );
    expect(pickStreamUrl({ stationuuid: 'b', name: 'B', url: 'ftp://b.test/s' })).toBeNull();
  });

  it('should use the uuid when the name is blank', () => {
    expect(toStationIdentity({ stationuuid: 'uuid-4', name: '  ', url: 'http://unnamed.test/stream' })).toEqual({
      id: 'uuid-4',
      displayName: 'uuid-4',
      streamURL: 'http://unnamed.test/stream',
    });
  });
});

describe('RadioBrowserDirectory', () => {
  let fetchImpl: Mock<typeof fetch>;
  let clock: FakeClock;
  let directory: RadioBrowserDirectory;

  beforeEach(() => {
    fetchImpl = vi.fn<typeof fetch>();
    clock = new FakeClock();
    directory = new RadioBrowserDirectory({
      apiBaseUrl: 'https://api.radio.test/',
      userAgent: 'test-agent/1.0',
      fetchImpl,
      breaker: new CircuitBreaker({ name: 'directory-test', failureThreshold: 5, clock }),
      retry: { clock, jitterFactor: 0 },
    });
  });

  it('should build a search URL from the filter', () => {
    expect(RadioBrowserDirectory.buildSearchUrl('https://api.radio.test', { countryCode: 'us', tag: 'pop', limit: 5 })).toBe(
      'https://api.radio.test/json/stations/search?countrycode=US&tag=pop&limit=5&hidebroken=true&order=clickcount&reverse=true'
    );
    expect(RadioBrowserDirectory.buildSearchUrl('https://api.radio.test', {})).toBe(
      'https://api.radio.test/json/stations/search?limit=25&hidebroken=true&order=clickcount&reverse=true'
    );
  });

  it('should map working stations and skip broken or unplayable ones', async () => {
    fetchImpl.mockResolvedValueOnce(jsonResponse(ROWS));

    const stations = await directory.resolveStations({ language: 'english' });

    expect(stations).toEqual([
      { id: 'uuid-1', displayName: 'Hits 101', streamURL: 'https://hits.test/live.mp3' },
      { id: 'uuid-4', displayName: 'uuid-4', streamURL: 'http://unnamed.test/stream' },
    ]);
    expect(fetchImpl).toHaveBeenCalledWith(
      'https://api.radio.test/json/stations/search?language=english&limit=25&hidebroken=true&order=clickcount&reverse=true',
      expect.objectContaining({ headers: { 'User-Agent': 'test-agent/1.0', Accept: 'application/json' } })
    );
  });

  it('should retry a 503 and succeed', async () => {
    fetchImpl
      .mockResolvedValueOnce(new Response('busy', { status: 503, statusText: 'Service Unavailable' }))
      .mockResolvedValueOnce(jsonResponse(ROWS.slice(0, 1)));

    const stations = await directory.resolveStations({});

    expect(stations.map((station) => station.id)).toEqual(['uuid-1']);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(clock.sleeps).toEqual([1000]);
  });

  it('should report no stations after a non-retryable error', async () => {
    fetchImpl.mockResolvedValueOnce(new Response('missing', { status: 404, statusText: 'Not Found' }));

    await expect(directory.resolveStations({})).resolves.toEqual([]);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('should report no stations for an unexpected payload', async () => {
    fetchImpl.mockResolvedValueOnce(jsonResponse({ error: 'not a list' }));

    await expect(directory.resolveStations({})).resolves.toEqual([]);
  });

  it('should resolve a stream URL by uuid', async () => {
    fetchImpl.mockResolvedValueOnce(jsonResponse(ROWS.slice(0, 1)));

    await expect(directory.resolveStreamURL('uuid 1')).resolves.toBe('https://hits.test/live.mp3');
    expect(fetchImpl.mock.calls[0]?.[0]).toBe('https://api.radio.test/json/stations/byuuid/uuid%201');
  });

  it('should return null for an unknown uuid or a failed lookup', async () => {
    fetchImpl.mockResolvedValueOnce(jsonResponse([]));
    await expect(directory.resolveStreamURL('missing')).resolves.toBeNull();

    fetchImpl.mockRejectedValue(new Error('fetch failed'));
    await expect(directory.resolveStreamURL('uuid-1')).resolves.toBeNull();
    expect(clock.sleeps).toEqual([1000, 2000]);
  });
});
