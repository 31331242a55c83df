import { describe, it, expect } from 'vitest';
import MusicProviderFactory from '../MusicProviderFactory';
import { ServiceType, parseServiceType } from '../../enums/ServiceType';

describe('MusicProviderFactory', () => {
  const factory = MusicProviderFactory.getInstance();

  it('returns one shared provider per platform', () => {
    const apple = factory.getProvider(ServiceType.APPLE_MUSIC);
    expect(apple.serviceType).toBe(ServiceType.APPLE_MUSIC);
    expect(factory.getProvider(ServiceType.APPLE_MUSIC)).toBe(apple);
    expect(apple.config.displayName).toBe('Apple Music');

    const spotify = factory.getProvider(ServiceType.SPOTIFY);
    expect(spotify.serviceType).toBe(ServiceType.SPOTIFY);
    expect(spotify.config.displayName).toBe('Spotify');
  });

  it('knows which platforms it supports', () => {
    expect(factory.isSupported('spotify')).toBe(true);
    expect(factory.isSupported('deezer')).toBe(false);
  });
});

describe('parseServiceType', () => {
  it('accepts enum values and aliases in any case', () => {
    expect(parseServiceType(' Spotify ')).toBe(ServiceType.SPOTIFY);
    expect(parseServiceType('apple_music')).toBe(ServiceType.APPLE_MUSIC);
    expect(parseServiceType('iTunes')).toBe(ServiceType.APPLE_MUSIC);
    expect(parseServiceType('tidal')).toBeNull();
  });
});
