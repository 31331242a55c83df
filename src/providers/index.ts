export { default as AppleMusicProvider } from './AppleMusicProvider';
export { default as SpotifyProvider } from './SpotifyProvider';
export { default as MusicProviderFactory, serviceLinkField } from './MusicProviderFactory';
