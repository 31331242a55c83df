import { ServiceType, isValidServiceType } from '../enums/ServiceType';
import { IMusicProvider } from '../interfaces/IMusicProvider';
import AppleMusicProvider from './AppleMusicProvider';
import SpotifyProvider from './SpotifyProvider';

/**
 * Maps each platform to the TrackRecord field holding its link
 */
export const serviceLinkField = {
  [ServiceType.APPLE_MUSIC]: 'appleMusicLink',
  [ServiceType.SPOTIFY]: 'spotifyLink',
} as const satisfies Record<ServiceType, string>;

/**
 * Factory for music provider instances. Uses singleton pattern so every
 * caller shares one rate limiter per service.
 */
class MusicProviderFactory {
  private static instance: MusicProviderFactory;

  private constructor() {}

  public static getInstance(): MusicProviderFactory {
    if (!MusicProviderFactory.instance) {
      MusicProviderFactory.instance = new MusicProviderFactory();
    }
    return MusicProviderFactory.instance;
  }

  /**
   * Get the music provider for a service type
   */
  getProvider(serviceType: ServiceType): IMusicProvider {
    switch (serviceType) {
      case ServiceType.SPOTIFY:
        return SpotifyProvider.getInstance();
      case ServiceType.APPLE_MUSIC:
      default:
        return AppleMusicProvider.getInstance();
    }
  }

  isSupported(serviceType: string): serviceType is ServiceType {
    return isValidServiceType(serviceType);
  }
}

export default MusicProviderFactory;
