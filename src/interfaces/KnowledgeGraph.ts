export interface WikipediaSearchHit {
  title: string;
  pageid: number;
  snippet?: string;
}

export interface WikipediaSearchResponse {
  query?: {
    search?: WikipediaSearchHit[];
  };
}

export interface WikipediaPagePropsResponse {
  query?: {
    pages?: Record<
      string,
      { pageid?: number; title?: string; pageprops?: { wikibase_item?: string } }
    >;
  };
}

export interface WikidataTimeValue {
  time: string; // e.g. "+1724-00-00T00:00:00Z"
  precision?: number;
}

export interface WikidataClaim {
  mainsnak: {
    snaktype: string;
    datavalue?: {
      type: string;
      value: unknown;
    };
  };
  rank?: 'preferred' | 'normal' | 'deprecated';
}

export interface WikidataEntitiesResponse {
  entities?: Record<string, { id: string; claims?: Record<string, WikidataClaim[]> }>;
}

export interface ScoredSearchHit {
  hit: WikipediaSearchHit;
  score: number;
}
