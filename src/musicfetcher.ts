import { color, white } from 'console-log-colors';
import Logger from './logger';
import Settings from './settings';
import Utils from './utils';
import MusicBrainz from './musicbrainz';
import KnowledgeGraph from './knowledgegraph';
import { ServiceType } from './enums/ServiceType';
import { IMusicProvider, ProviderTrackData } from './interfaces/IMusicProvider';
import { MbWork } from './interfaces/MusicBrainz';
import {
  ComposerSource,
  CompositionYearSource,
  TrackRecord,
} from './interfaces/Track';
import MusicProviderFactory, {
  serviceLinkField,
} from './providers/MusicProviderFactory';
import {
  UNKNOWN_ALBUM,
  UNKNOWN_ARTIST,
  UNKNOWN_COMPOSER,
  UNKNOWN_GENRE,
  UNKNOWN_TITLE,
  UNKNOWN_YEAR,
} from './config/constants';

export interface MusicFetcherDependencies {
  settings: Settings;
  catalog: IMusicProvider;
  streaming: IMusicProvider;
  musicBrainz: MusicBrainz;
  knowledgeGraph: KnowledgeGraph;
}

interface ComposerResolution {
  composer: string | null;
  source: ComposerSource | null;
  work: MbWork | null;
  workLookedUp: boolean;
}

interface YearResolution {
  year: string | null;
  source: CompositionYearSource | null;
}

/**
 * Resolves free-text track queries into card records. Sources are consulted in a
 * fixed order and the first usable answer for each field wins; a failing source
 * only costs that source's fields.
 */
class MusicFetcher {
  private static instance: MusicFetcher;
  private logger = new Logger();
  private utils = new Utils();
  private settings: Settings;
  private catalog: IMusicProvider;
  private streaming: IMusicProvider;
  private musicBrainz: MusicBrainz;
  private knowledgeGraph: KnowledgeGraph;

  constructor(dependencies: Partial<MusicFetcherDependencies> = {}) {
    const providers = MusicProviderFactory.getInstance();
    this.settings = dependencies.settings ?? Settings.getInstance();
    this.catalog =
      dependencies.catalog ?? providers.getProvider(ServiceType.APPLE_MUSIC);
    this.streaming =
      dependencies.streaming ?? providers.getProvider(ServiceType.SPOTIFY);
    this.musicBrainz = dependencies.musicBrainz ?? MusicBrainz.getInstance();
    this.knowledgeGraph =
      dependencies.knowledgeGraph ?? KnowledgeGraph.getInstance();
  }

  public static getInstance(): MusicFetcher {
    if (!MusicFetcher.instance) {
      MusicFetcher.instance = new MusicFetcher();
    }
    return MusicFetcher.instance;
  }

  /**
   * Resolve every query in order. Queries without a catalog match are skipped.
   */
  public async fetchAll(queries: string[]): Promise<TrackRecord[]> {
    const results: TrackRecord[] = [];
    const missed: string[] = [];

    this.logger.log(
      color.blue.bold(
        `Starting music metadata fetch for ${white.bold(queries.length)} titles`
      )
    );

    for (const query of queries) {
      this.logger.log(color.blue(`Processing: ${white.bold(query)}`));
      const record = await this.fetchMetadata(query);
      if (record) {
        results.push(record);
      } else {
        missed.push(query);
        this.logger.warn(`Could not find data for: ${query}`);
      }
    }

    this.logger.log(
      color.green.bold(
        `Fetched ${white.bold(results.length)} of ${white.bold(queries.length)} titles` +
          (missed.length > 0 ? ` (missed: ${missed.join(', ')})` : '')
      )
    );
    return results;
  }

  /**
   * Build one record. Returns null only when the catalog has nothing for the query.
   */
  public async fetchMetadata(query: string): Promise<TrackRecord | null> {
    const search = await this.catalog.searchTracks(query, 1);
    if (!search.success) {
      this.logger.error(`Catalog lookup failed for '${query}': ${search.error}`);
      return null;
    }

    const track = search.data?.tracks[0];
    if (!track) {
      this.logger.warn(`No results found for '${query}'`);
      return null;
    }

    const title = track.name || UNKNOWN_TITLE;
    const artist = track.artist || UNKNOWN_ARTIST;

    const composer = await this.resolveComposer(track, query);
    const composition = await this.resolveCompositionYear(
      track,
      composer,
      title
    );

    let recordingYear = this.utils.extractYear(track.releaseDate) ?? UNKNOWN_YEAR;
    let compositionYear = composition.year ?? UNKNOWN_YEAR;
    let compositionYearSource = composition.source;

    // A work cannot be composed after it was recorded
    if (
      this.utils.isYear(recordingYear) &&
      this.utils.isYear(compositionYear) &&
      parseInt(compositionYear, 10) > parseInt(recordingYear, 10)
    ) {
      this.logger.logDev(
        `Swapping years for '${query}': composition ${compositionYear} > recording ${recordingYear}`
      );
      [compositionYear, recordingYear] = [recordingYear, compositionYear];
      // The composition year is now the catalog's release year
      compositionYearSource = null;
    }

    const spotifyLink = await this.resolveStreamingLink(track);

    const record: TrackRecord = {
      query,
      title,
      artist,
      composer: composer.composer ?? UNKNOWN_COMPOSER,
      album: track.album || UNKNOWN_ALBUM,
      genre: track.genre || UNKNOWN_GENRE,
      recordingYear,
      compositionYear,
      appleMusicLink: track.serviceLink,
      spotifyLink,
      link: '',
      composerSource: composer.source,
      compositionYearSource,
    };
    record.link = this.selectLink(record);

    return record;
  }

  /**
   * Link for the configured platform, falling back to whichever link exists.
   */
  public selectLink(
    record: Pick<TrackRecord, 'appleMusicLink' | 'spotifyLink'>
  ): string {
    const preferred = this.settings.values.platform;
    const fallback =
      preferred === ServiceType.SPOTIFY
        ? ServiceType.APPLE_MUSIC
        : ServiceType.SPOTIFY;
    return (
      record[serviceLinkField[preferred]] ||
      record[serviceLinkField[fallback]] ||
      ''
    );
  }

  private async resolveComposer(
    track: ProviderTrackData,
    query: string
  ): Promise<ComposerResolution> {
    if (track.composer) {
      return {
        composer: track.composer,
        source: 'catalog',
        work: null,
        workLookedUp: false,
      };
    }

    this.logger.log(
      color.blue(
        `Composer not found in catalog, querying MusicBrainz for '${track.name}' by '${track.artist}'...`
      )
    );

    const byRecording = await this.musicBrainz.findComposerByRecording(
      track.name,
      track.artist
    );
    if (byRecording.composer) {
      return {
        composer: byRecording.composer,
        source: 'musicbrainz_recording',
        work: byRecording.work,
        workLookedUp: true,
      };
    }

    const byWorkSearch = await this.musicBrainz.findComposerByWorkSearch(
      query,
      track.artist
    );
    if (byWorkSearch.composer) {
      return {
        composer: byWorkSearch.composer,
        source: 'musicbrainz_work',
        work: byWorkSearch.work,
        workLookedUp: true,
      };
    }

    return {
      composer: null,
      source: null,
      work: byRecording.work,
      workLookedUp: true,
    };
  }

  private async resolveCompositionYear(
    track: ProviderTrackData,
    composer: ComposerResolution,
    title: string
  ): Promise<YearResolution> {
    let work = composer.work;
    if (!work && !composer.workLookedUp) {
      work = await this.musicBrainz.findWorkByRecording(track.name, track.artist);
    }

    if (work) {
      const year = this.musicBrainz.getWorkYear(work);
      if (year) {
        return { year, source: 'musicbrainz' };
      }
    }

    const workTitle = this.workTitle(work, title);
    const year = await this.knowledgeGraph.findCompositionYear(
      workTitle,
      composer.composer,
      track.genre
    );
    return year ? { year, source: 'wikidata' } : { year: null, source: null };
  }

  /**
   * Title to look a work up by: MusicBrainz's own title when known, else the catalog
   * title without a "Composer: " style prefix.
   */
  private workTitle(work: MbWork | null, title: string): string {
    if (work?.title) {
      return work.title;
    }
    const prefixIndex = title.indexOf(': ');
    return prefixIndex !== -1 ? title.slice(prefixIndex + 2).trim() : title;
  }

  private async resolveStreamingLink(track: ProviderTrackData): Promise<string> {
    const result = await this.streaming.searchTracks(
      this.streamingQuery(track),
      1
    );
    if (!result.success) {
      this.logger.logDev(
        `No ${this.streaming.config.displayName} link for '${track.name}': ${result.error}`
      );
      return '';
    }
    return result.data?.tracks[0]?.serviceLink ?? '';
  }

  private streamingQuery(track: ProviderTrackData): string {
    if (this.streaming.buildSearchQuery) {
      return this.streaming.buildSearchQuery(track.name, track.artist || null);
    }
    return `${track.name} ${track.artist}`.trim();
  }
}

export default MusicFetcher;
