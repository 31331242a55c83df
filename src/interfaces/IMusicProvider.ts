import { ServiceType } from '../enums/ServiceType';
import { ApiResult } from './ApiResult';

/**
 * Normalized track data returned by any music provider
 */
export interface ProviderTrackData {
  id: string; // Service-specific track ID
  name: string;
  artist: string;
  album: string | null;
  genre: string | null;
  composer: string | null; // Only the catalog lists composers
  releaseDate: string | null;
  serviceType: ServiceType;
  serviceLink: string; // Direct link to track on this service
}

/**
 * Search result from a music provider
 */
export interface ProviderSearchResult {
  tracks: ProviderTrackData[];
  total: number;
}

export interface MusicProviderConfig {
  serviceType: ServiceType;
  displayName: string;
  requiresCredentials: boolean;
}

/**
 * Interface that all music service providers must implement.
 */
export interface IMusicProvider {
  readonly serviceType: ServiceType;

  readonly config: MusicProviderConfig;

  /**
   * Search for tracks matching free text
   */
  searchTracks(
    query: string,
    limit?: number
  ): Promise<ApiResult<ProviderSearchResult>>;

  /**
   * Provider-specific query for a known title/artist pair (optional - free text otherwise)
   */
  buildSearchQuery?(title: string, artist: string | null): string;
}
