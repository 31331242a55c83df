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
import { ITUNES_SEARCH_URL } from '../config/constants';
import Logger from '../logger';
import Settings from '../settings';
import Utils from '../utils';

interface ItunesSearchResponse {
  resultCount: number;
  results: ItunesTrack[];
}

interface ItunesTrack {
  trackId?: number;
  trackName?: string;
  artistName?: string;
  collectionName?: string;
  primaryGenreName?: string;
  releaseDate?: string;
  trackViewUrl?: string;
  composer?: string; // Only present for some classical catalog entries
}

/**
 * Apple Music provider backed by the public iTunes Search API.
 * No token is needed; the top hit is the catalog's best guess for a query.
 */
class AppleMusicProvider implements IMusicProvider {
  private static instance: AppleMusicProvider;
  private logger = new Logger('apple_music');
  private utils = new Utils();
  private settings: Settings;
  private axiosInstance: AxiosInstance;
  private limiter: Bottleneck;

  readonly serviceType = ServiceType.APPLE_MUSIC;

  readonly config: MusicProviderConfig = {
    serviceType: ServiceType.APPLE_MUSIC,
    displayName: ServiceTypeDisplayNames[ServiceType.APPLE_MUSIC],
    requiresCredentials: false,
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

  public static getInstance(): AppleMusicProvider {
    if (!AppleMusicProvider.instance) {
      AppleMusicProvider.instance = new AppleMusicProvider();
    }
    return AppleMusicProvider.instance;
  }

  async searchTracks(
    query: string,
    limit: number = 1
  ): Promise<ApiResult<ProviderSearchResult>> {
    if (!query.trim()) {
      return { success: false, error: 'Search term is required' };
    }

    const params: Record<string, string | number> = {
      term: query,
      media: 'music',
      entity: 'song',
      limit,
    };
    if (this.settings.values.itunesCountry) {
      params['country'] = this.settings.values.itunesCountry;
    }

    try {
      this.logger.logDev(`Searching catalog for ${color.white.bold(query)}`);
      const response = await this.limiter.schedule(() =>
        this.axiosInstance.get<ItunesSearchResponse>(ITUNES_SEARCH_URL, {
          params,
        })
      );

      const results = response.data.results ?? [];
      const tracks = results.map((track) => this.convertTrack(track));

      return {
        success: true,
        data: { tracks, total: response.data.resultCount ?? tracks.length },
      };
    } catch (error) {
      const message = this.utils.describeError(error);
      this.logger.error(`Catalog search failed for "${query}": ${message}`);
      return { success: false, error: `Apple Music search error: ${message}` };
    }
  }

  private convertTrack(track: ItunesTrack): ProviderTrackData {
    const composer = track.composer?.trim();
    return {
      id: track.trackId !== undefined ? String(track.trackId) : '',
      name: track.trackName ?? '',
      artist: track.artistName ?? '',
      album: track.collectionName || null,
      genre: track.primaryGenreName || null,
      composer: composer ? composer : null,
      releaseDate: track.releaseDate || null,
      serviceType: ServiceType.APPLE_MUSIC,
      serviceLink: track.trackViewUrl ?? '',
    };
  }
}

export default AppleMusicProvider;
