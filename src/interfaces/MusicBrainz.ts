/**
 * The subset of MusicBrainz ws/2 JSON the pipeline reads.
 */
export interface MbArtist {
  id: string;
  name: string;
}

export interface MbRelation {
  type: string;
  'target-type': string;
  direction?: 'forward' | 'backward';
  begin?: string | null;
  end?: string | null;
  artist?: MbArtist;
  work?: { id: string; title: string };
}

export interface MbLifeSpan {
  begin?: string | null;
  end?: string | null;
}

export interface MbRecordingSearchResponse {
  recordings?: Array<{ id: string; title: string; score?: number }>;
}

export interface MbWorkSearchResponse {
  works?: Array<{ id: string; title: string; score?: number }>;
}

export interface MbRecording {
  id: string;
  title: string;
  relations?: MbRelation[];
}

export interface MbWork {
  id: string;
  title: string;
  'life-span'?: MbLifeSpan;
  relations?: MbRelation[];
}

/**
 * A work reached while resolving a composer.
 */
export interface WorkMatch {
  composer: string | null;
  work: MbWork | null;
}
