import { describe, it, expect } from 'vitest';
import Settings from '../settings';
import { ServiceType } from '../enums/ServiceType';
import {
  MUSICBRAINZ_DELAY_MS,
  MUSICBRAINZ_USER_AGENT,
  REQUEST_DELAY_MS,
} from '../config/constants';

describe('Settings', () => {
  it('falls back to defaults for an empty environment', () => {
    const settings = Settings.fromEnv({});

    expect(settings.values).toEqual({
      platform: ServiceType.APPLE_MUSIC,
      itunesCountry: null,
      spotifyClientId: null,
      spotifyClientSecret: null,
      musicBrainzUserAgent: MUSICBRAINZ_USER_AGENT,
      musicBrainzDelayMs: MUSICBRAINZ_DELAY_MS,
      requestDelayMs: REQUEST_DELAY_MS,
      requestTimeoutMs: 10000,
    });
    expect(settings.hasSpotifyCredentials).toBe(false);
  });

  it('reads platform aliases, credentials and delays', () => {
    const settings = Settings.fromEnv({
      MUSIC_PLATFORM: 'Spotify',
      SPOTIFY_CLIENT_ID: 'test-client',
      SPOTIFY_CLIENT_SECRET: 'test-secret',
      ITUNES_COUNTRY: ' de ',
      MUSICBRAINZ_DELAY_MS: '1500',
      REQUEST_DELAY_MS: '0',
    });

    expect(settings.values.platform).toBe(ServiceType.SPOTIFY);
    expect(settings.values.itunesCountry).toBe('de');
    expect(settings.values.musicBrainzDelayMs).toBe(1500);
    expect(settings.values.requestDelayMs).toBe(0);
    expect(settings.hasSpotifyCredentials).toBe(true);

    expect(Settings.fromEnv({ MUSIC_PLATFORM: 'apple' }).values.platform).toBe(
      ServiceType.APPLE_MUSIC
    );
  });

  it('treats blank values as unset', () => {
    const settings = Settings.fromEnv({
      SPOTIFY_CLIENT_ID: '   ',
      REQUEST_TIMEOUT_MS: '',
    });
    expect(settings.values.spotifyClientId).toBeNull();
    expect(settings.values.requestTimeoutMs).toBe(10000);
  });

  it('rejects an unknown platform', () => {
    expect(() => Settings.fromEnv({ MUSIC_PLATFORM: 'cassette' })).toThrow(
      'MUSIC_PLATFORM must be one of apple_music, spotify (got "cassette")'
    );
  });

  it('rejects delays that are not whole milliseconds', () => {
    expect(() => Settings.fromEnv({ REQUEST_DELAY_MS: '1.5' })).toThrow(
      'REQUEST_DELAY_MS must be a non-negative whole number of milliseconds (got "1.5")'
    );
    expect(() => Settings.fromEnv({ MUSICBRAINZ_DELAY_MS: '-1' })).toThrow(
      'MUSICBRAINZ_DELAY_MS'
    );
  });

  it('applies overrides on top of defaults', () => {
    const settings = Settings.with({ requestDelayMs: 0, musicBrainzDelayMs: 0 });
    expect(settings.values.requestDelayMs).toBe(0);
    expect(settings.values.musicBrainzDelayMs).toBe(0);
    expect(settings.values.platform).toBe(ServiceType.APPLE_MUSIC);
  });
});
