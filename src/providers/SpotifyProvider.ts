import axios, { AxiosInstance } from 'axios';
import Bottleneck from 'bottleneck';
import { color } from 'console-log-colors';
import { ServiceType, ServiceTypeDisplayNames } from '../enums/ServiceType';
import {
  IMusicProvider,
  MusicProviderConfig,
  ProviderSearchResult,
  ProviderTrackData,
} from '../interfaces/IMusicProvider';
import { ApiResult } from '../interfaces/ApiResult';
import { SPOTIFY_API_BASE, SPOTIFY_TOKEN_URL } from '../config/constants';
import Logger from '../logger';
import Settings from '../settings';
import Utils from '../utils';

interface SpotifyTokenResponse {
  access_token: string;
  token_type: string;
  expires_in: number;
}

interface SpotifyErrorResponse {
  error: {
    status: number;
    message: string;
  };
}

interface SpotifyTrack {
  id: string;
  name: string;
  artists: Array<{ name: string }>;
  album?: { name?: string; release_date?: string };
  external_urls?: { spotify?: string };
}

interface SpotifySearchResponse {
  tracks?: {
    items: SpotifyTrack[];
    total: number;
  };
}

// Refresh a little before Spotify says the token expires
const TOKEN_EXPIRY_MARGIN_MS = 60 * 1000;

/**
 * Spotify provider using the client-credentials flow. Search needs no user
 * authorization, so the token lives in memory only.
 */
class SpotifyProvider implements IMusicProvider {
  private static instance: SpotifyProvider;
  private logger = new Logger('spotify');
  private utils = new Utils();
  private settings: Settings;
  private axiosInstance: AxiosInstance;
  private limiter: Bottleneck;
  private accessToken: string | null = null;
  private tokenExpiresAt = 0;
  private warnedMissingCredentials = false;

  readonly serviceType = ServiceType.SPOTIFY;

  readonly config: MusicProviderConfig = {
    serviceType: ServiceType.SPOTIFY,
    displayName: ServiceTypeDisplayNames[ServiceType.SPOTIFY],
    requiresCredentials: true,
  };

  constructor(settings: Settings = Settings.getInstance(), axiosInstance?: AxiosInstance) {
    this.settings = settings;
    this.axiosInstance =
      axiosInstance ??
      axios.create({ timeout: settings.values.requestTimeoutMs });
    this.limiter = new Bottleneck({
      maxConcurrent: 1,
      minTime: settings.values.requestDelayMs,
    });
  }

  public static getInstance(): SpotifyProvider {
    if (!SpotifyProvider.instance) {
      SpotifyProvider.instance = new SpotifyProvider();
    }
    return SpotifyProvider.instance;
  }

  /**
   * Spotify's field-filter syntax for a title/artist pair.
   */
  public buildSearchQuery(title: string, artist: string | null): string {
    const cleanTitle = title.replace(/"/g, '').trim();
    const firstArtist = artist?.split(/[,&]/)[0]?.replace(/"/g, '').trim();
    if (!firstArtist) {
      return cleanTitle;
    }
    return `track:"${cleanTitle}" artist:"${firstArtist}"`;
  }

  /**
   * Retrieves a valid access token, requesting a new one when the cached one expired.
   */
  public async getAccessToken(): Promise<string | null> {
    const { spotifyClientId, spotifyClientSecret } = this.settings.values;
    if (!spotifyClientId || !spotifyClientSecret) {
      if (!this.warnedMissingCredentials) {
        this.logger.warn(
          'SPOTIFY_CLIENT_ID / SPOTIFY_CLIENT_SECRET not set, Spotify links will be empty'
        );
        this.warnedMissingCredentials = true;
      }
      return null;
    }

    if (this.accessToken && Date.now() < this.tokenExpiresAt) {
      return this.accessToken;
    }

    const credentials = Buffer.from(
      `${spotifyClientId}:${spotifyClientSecret}`
    ).toString('base64');

    const response = await this.limiter.schedule(() =>
      this.axiosInstance.post<SpotifyTokenResponse>(
        SPOTIFY_TOKEN_URL,
        new URLSearchParams({ grant_type: 'client_credentials' }).toString(),
        {
          headers: {
            Authorization: `Basic ${credentials}`,
            'Content-Type': 'application/x-www-form-urlencoded',
          },
        }
      )
    );

    this.accessToken = response.data.access_token;
    this.tokenExpiresAt =
      Date.now() + response.data.expires_in * 1000 - TOKEN_EXPIRY_MARGIN_MS;
    this.logger.logDev(color.green('Obtained Spotify access token'));
    return this.accessToken;
  }

  async searchTracks(
    query: string,
    limit: number = 1
  ): Promise<ApiResult<ProviderSearchResult>> {
    if (!query.trim()) {
      return { success: false, error: 'Search term is required' };
    }

    limit = Math.min(limit, 50); // Enforce Spotify API limit

    try {
      const accessToken = await this.getAccessToken();
      if (!accessToken) {
        return { success: false, error: 'Spotify credentials not configured' };
      }

      this.logger.logDev(`Searching Spotify for ${color.white.bold(query)}`);
      const response = await this.limiter.schedule(() =>
        this.axiosInstance.get<SpotifySearchResponse>(
          `${SPOTIFY_API_BASE}/search`,
          {
            params: { q: query, type: 'track', limit },
            headers: { Authorization: `Bearer ${accessToken}` },
          }
        )
      );

      const items = response.data.tracks?.items ?? [];
      return {
        success: true,
        data: {
          tracks: items.map((track) => this.convertTrack(track)),
          total: response.data.tracks?.total ?? items.length,
        },
      };
    } catch (error) {
      return this.handleApiError(error, `searching tracks for "${query}"`);
    }
  }

  private convertTrack(track: SpotifyTrack): ProviderTrackData {
    return {
      id: track.id,
      name: track.name,
      artist: track.artists.map((artist) => artist.name).join(', '),
      album: track.album?.name || null,
      genre: null,
      composer: null,
      releaseDate: track.album?.release_date || null,
      serviceType: ServiceType.SPOTIFY,
      serviceLink:
        track.external_urls?.spotify || `https://open.spotify.com/track/${track.id}`,
    };
  }

  /**
   * Maps Spotify API errors to an ApiResult and logs them.
   */
  private handleApiError(
    error: unknown,
    context: string
  ): ApiResult<ProviderSearchResult> {
    if (axios.isAxiosError<SpotifyErrorResponse>(error)) {
      const status = error.response?.status;
      const message =
        error.response?.data?.error?.message || error.message;

      if (status === 401) {
        // Force a fresh token on the next call
        this.accessToken = null;
        this.tokenExpiresAt = 0;
        this.logger.warn(`Spotify rejected the access token while ${context}`);
        return {
          success: false,
          error: 'Spotify authorization error (token likely expired/invalid)',
        };
      }

      if (status === 429) {
        const retryAfter = error.response?.headers?.['retry-after'];
        const retryAfterSeconds =
          typeof retryAfter === 'string' ? parseInt(retryAfter, 10) : NaN;
        const errorMessage = `Spotify API error: 429 Too Many Requests. ${
          retryAfter
            ? `Retry after: ${retryAfter} seconds.`
            : 'No Retry-After header.'
        }`;
        this.logger.warn(errorMessage);
        return {
          success: false,
          error: errorMessage,
          retryAfter: Number.isNaN(retryAfterSeconds)
            ? undefined
            : retryAfterSeconds,
        };
      }

      this.logger.error(
        `Spotify API error while ${context}: ${status || 'Unknown'} - ${message}`
      );
      return {
        success: false,
        error: `Spotify API error: ${status || 'Unknown'}`,
      };
    }

    this.logger.error(
      `Non-API error ${context}: ${this.utils.describeError(error)}`
    );
    return {
      success: false,
      error: `Internal error ${context}`,
    };
  }
}

export default SpotifyProvider;
