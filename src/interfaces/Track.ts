export type ComposerSource =
  | 'catalog'
  | 'musicbrainz_recording'
  | 'musicbrainz_work';

export type CompositionYearSource = 'musicbrainz' | 'wikidata';

/**
 * Reconciled metadata for one card. Year fields hold a 4-digit year or
 * UNKNOWN_YEAR.
 */
export interface TrackRecord {
  query: string;
  title: string;
  artist: string;
  composer: string;
  album: string;
  genre: string;
  recordingYear: string;
  compositionYear: string;
  appleMusicLink: string;
  spotifyLink: string;
  link: string; // Link for the configured platform, used for the QR code
  composerSource: ComposerSource | null;
  compositionYearSource: CompositionYearSource | null;
}
