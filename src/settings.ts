import dotenv from 'dotenv';
import { ServiceType, parseServiceType } from './enums/ServiceType';
import {
  MUSICBRAINZ_DELAY_MS,
  MUSICBRAINZ_USER_AGENT,
  REQUEST_DELAY_MS,
  REQUEST_TIMEOUT_MS,
} from './config/constants';

type Env = Record<string, string | undefined>;

export interface SettingsValues {
  platform: ServiceType;
  itunesCountry: string | null;
  spotifyClientId: string | null;
  spotifyClientSecret: string | null;
  musicBrainzUserAgent: string;
  musicBrainzDelayMs: number;
  requestDelayMs: number;
  requestTimeoutMs: number;
}

/**
 * Runtime configuration read from the environment (and `.env`, when present).
 */
class Settings {
  private static instance: Settings;
  readonly values: SettingsValues;

  constructor(values: SettingsValues) {
    this.values = values;
  }

  public static getInstance(): Settings {
    if (!Settings.instance) {
      dotenv.config({ quiet: true });
      Settings.instance = Settings.fromEnv(process.env);
    }
    return Settings.instance;
  }

  /**
   * Build settings from an environment map. Throws on values that cannot be used.
   */
  public static fromEnv(env: Env): Settings {
    const platformValue = env['MUSIC_PLATFORM'];
    let platform = ServiceType.APPLE_MUSIC;
    if (platformValue) {
      const parsed = parseServiceType(platformValue);
      if (!parsed) {
        throw new Error(
          `MUSIC_PLATFORM must be one of ${Object.values(ServiceType).join(', ')} (got "${platformValue}")`
        );
      }
      platform = parsed;
    }

    return new Settings({
      platform,
      itunesCountry: Settings.optional(env['ITUNES_COUNTRY']),
      spotifyClientId: Settings.optional(env['SPOTIFY_CLIENT_ID']),
      spotifyClientSecret: Settings.optional(env['SPOTIFY_CLIENT_SECRET']),
      musicBrainzUserAgent:
        Settings.optional(env['MUSICBRAINZ_USER_AGENT']) ??
        MUSICBRAINZ_USER_AGENT,
      musicBrainzDelayMs: Settings.parseMs(
        'MUSICBRAINZ_DELAY_MS',
        env['MUSICBRAINZ_DELAY_MS'],
        MUSICBRAINZ_DELAY_MS
      ),
      requestDelayMs: Settings.parseMs(
        'REQUEST_DELAY_MS',
        env['REQUEST_DELAY_MS'],
        REQUEST_DELAY_MS
      ),
      requestTimeoutMs: Settings.parseMs(
        'REQUEST_TIMEOUT_MS',
        env['REQUEST_TIMEOUT_MS'],
        REQUEST_TIMEOUT_MS
      ),
    });
  }

  /**
   * Settings for tests and scripts: defaults with overrides applied.
   */
  public static with(overrides: Partial<SettingsValues>): Settings {
    return new Settings({ ...Settings.fromEnv({}).values, ...overrides });
  }

  get hasSpotifyCredentials(): boolean {
    return !!this.values.spotifyClientId && !!this.values.spotifyClientSecret;
  }

  private static optional(value: string | undefined): string | null {
    if (value === undefined) return null;
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }

  private static parseMs(
    name: string,
    value: string | undefined,
    fallback: number
  ): number {
    if (value === undefined || value.trim() === '') {
      return fallback;
    }
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
      throw new Error(
        `${name} must be a non-negative whole number of milliseconds (got "${value}")`
      );
    }
    return parsed;
  }
}

export default Settings;
