export { default as MusicFetcher } from './musicfetcher';
export type { MusicFetcherDependencies } from './musicfetcher';
export { default as MusicBrainz } from './musicbrainz';
export { default as KnowledgeGraph } from './knowledgegraph';
export { default as Settings } from './settings';
export type { SettingsValues } from './settings';
export { default as Logger } from './logger';
export * from './providers';
export { ServiceType, ServiceTypeDisplayNames, parseServiceType } from './enums/ServiceType';
export type { TrackRecord, ComposerSource, CompositionYearSource } from './interfaces/Track';
export type { ApiResult } from './interfaces/ApiResult';
export type {
  IMusicProvider,
  ProviderTrackData,
  ProviderSearchResult,
} from './interfaces/IMusicProvider';
export * from './config/constants';
