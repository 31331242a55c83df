// Sentinels written into a TrackRecord when a source has no answer
export const UNKNOWN_TITLE = 'Unknown Title';
export const UNKNOWN_ARTIST = 'Unknown Artist';
export const UNKNOWN_COMPOSER = 'Unknown Composer';
export const UNKNOWN_ALBUM = 'Unknown Album';
export const UNKNOWN_GENRE = 'Unknown Genre';
export const UNKNOWN_YEAR = 'Unknown';

export const ITUNES_SEARCH_URL = 'https://itunes.apple.com/search';
export const MUSICBRAINZ_API_BASE = 'https://musicbrainz.org/ws/2/';
export const SPOTIFY_API_BASE = 'https://api.spotify.com/v1';
export const SPOTIFY_TOKEN_URL = 'https://accounts.spotify.com/api/token';
export const WIKIPEDIA_API_URL = 'https://en.wikipedia.org/w/api.php';
export const WIKIDATA_API_URL = 'https://www.wikidata.org/w/api.php';

// Request pacing (ms between two calls to the same service)
export const MUSICBRAINZ_DELAY_MS = 1200;
export const REQUEST_DELAY_MS = 1000;
export const REQUEST_TIMEOUT_MS = 10000;

export const MUSICBRAINZ_USER_AGENT =
  'MusicFlashcards/0.1.0 ( contact@example.com )';

// Fallback work search takes the top few candidates only
export const MB_WORK_SEARCH_LIMIT = 3;
export const WIKIPEDIA_SEARCH_LIMIT = 5;

// Wikidata properties read for a composition date, in order
export const WIKIDATA_INCEPTION = 'P571';
export const WIKIDATA_PUBLICATION_DATE = 'P577';

// Words that mark a Wikipedia hit as an article about a composition
export const WORK_GENRE_KEYWORDS = [
  'opera',
  'symphony',
  'concerto',
  'sonata',
  'oratorio',
  'cantata',
  'mass',
  'requiem',
  'ballet',
  'suite',
  'quartet',
  'overture',
];
