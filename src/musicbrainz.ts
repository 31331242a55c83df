import { color } from 'console-log-colors';
import axios, { AxiosInstance } from 'axios';
import Bottleneck from 'bottleneck';
import Logger from './logger';
import Settings from './settings';
import Utils from './utils';
import {
  MbRecording,
  MbRecordingSearchResponse,
  MbRelation,
  MbWork,
  MbWorkSearchResponse,
  WorkMatch,
} from './interfaces/MusicBrainz';
import {
  MB_WORK_SEARCH_LIMIT,
  MUSICBRAINZ_API_BASE,
} from './config/constants';

// Relation types whose date marks when a work was written or first heard
const WORK_DATE_RELATIONS = ['premiere', 'performance'];

/**
 * MusicBrainz lookups for composers and composition dates.
 *
 * Recording search → recording work-rels → work artist-rels is the main path;
 * a free-text work search guarded by name heuristics is the fallback.
 */
class MusicBrainz {
  private static instance: MusicBrainz;
  private logger = new Logger('musicbrainz');
  private utils = new Utils();
  private axiosInstance: AxiosInstance;
  private limiter: Bottleneck;

  constructor(settings: Settings = Settings.getInstance(), axiosInstance?: AxiosInstance) {
    this.axiosInstance =
      axiosInstance ??
      axios.create({
        baseURL: MUSICBRAINZ_API_BASE,
        timeout: settings.values.requestTimeoutMs,
        headers: {
          'User-Agent': settings.values.musicBrainzUserAgent,
        },
      });
    this.limiter = new Bottleneck({
      maxConcurrent: 1,
      minTime: settings.values.musicBrainzDelayMs,
    });
  }

  public static getInstance(): MusicBrainz {
    if (!MusicBrainz.instance) {
      MusicBrainz.instance = new MusicBrainz();
    }
    return MusicBrainz.instance;
  }

  /**
   * `artist:("A" OR "B")` from a credit such as "Raphaël Pichon, Pygmalion & Sabine Devieilhe".
   */
  public buildArtistQuery(artist: string): string {
    const artists = artist
      .split(/[,&]/)
      .map((name) => name.trim().replace(/"/g, ''))
      .filter((name) => name.length > 0);

    if (artists.length === 0) {
      return '';
    }
    return `artist:(${artists.map((name) => `"${name}"`).join(' OR ')})`;
  }

  /**
   * Title variants tried in order: as listed, after a "Composer: " style prefix,
   * and without parenthesised text.
   */
  public buildTitleVariants(title: string): string[] {
    const cleanTitle = title.replace(/"/g, '').trim();
    const variants = [cleanTitle];

    const prefixIndex = cleanTitle.indexOf(': ');
    if (prefixIndex !== -1) {
      variants.push(cleanTitle.slice(prefixIndex + 2).trim());
    }

    const baseTitle = cleanTitle.replace(/\(.*?\)/g, '').trim();
    if (baseTitle && baseTitle !== cleanTitle) {
      variants.push(baseTitle);
    }

    return [...new Set(variants.filter((variant) => variant.length > 0))];
  }

  /**
   * Composer from the recording's linked work. Also returns the first work reached,
   * with or without a composer, so its dates can still be used.
   */
  public async findComposerByRecording(
    title: string,
    artist: string
  ): Promise<WorkMatch> {
    return this.walkRecordingWorks(title, artist, true);
  }

  /**
   * The work linked to the best matching recording, composer or not.
   */
  public async findWorkByRecording(
    title: string,
    artist: string
  ): Promise<MbWork | null> {
    const match = await this.walkRecordingWorks(title, artist, false);
    return match.work;
  }

  /**
   * Free-text work search. A candidate's composer is only accepted when it
   * matches the performing artist or is named in the query itself.
   */
  public async findComposerByWorkSearch(
    originalQuery: string,
    artist: string
  ): Promise<WorkMatch> {
    let works: NonNullable<MbWorkSearchResponse['works']> = [];
    try {
      const response = await this.get<MbWorkSearchResponse>('work', {
        query: originalQuery,
        limit: MB_WORK_SEARCH_LIMIT,
      });
      works = response.works ?? [];
    } catch (error) {
      this.logger.warn(
        `Work search failed for "${originalQuery}": ${this.utils.describeError(error)}`
      );
      return { composer: null, work: null };
    }

    for (const candidate of works.slice(0, MB_WORK_SEARCH_LIMIT)) {
      try {
        const work = await this.lookupWork(candidate.id);
        for (const composer of this.composersOf(work)) {
          if (this.composerMatches(composer, artist, originalQuery)) {
            this.logger.log(
              color.green(
                `Composer ${color.white.bold(composer)} accepted from work "${work.title}"`
              )
            );
            return { composer, work };
          }
          this.logger.logDev(
            `Rejected composer "${composer}" of work "${work.title}" for "${originalQuery}"`
          );
        }
      } catch (error) {
        this.logger.warn(
          `Work lookup failed for ${candidate.id}: ${this.utils.describeError(error)}`
        );
      }
    }

    return { composer: null, work: null };
  }

  /**
   * Accept a composer whose name appears in the artist credit (the artist is the
   * composer, e.g. a jazz leader) or whose surname-length name part appears in the query.
   */
  public composerMatches(
    composer: string,
    artist: string,
    originalQuery: string
  ): boolean {
    const composerLower = composer.toLowerCase();
    if (artist && artist.toLowerCase().includes(composerLower)) {
      return true;
    }

    const queryLower = originalQuery.toLowerCase();
    return this.utils
      .significantNameParts(composer)
      .some((part) => queryLower.includes(part));
  }

  /**
   * Year a work was written or first performed, if MusicBrainz knows it.
   */
  public getWorkYear(work: MbWork): string | null {
    const lifeSpanYear = this.utils.extractYear(work['life-span']?.begin);
    if (lifeSpanYear) {
      return lifeSpanYear;
    }

    const relations = work.relations ?? [];
    for (const relation of relations) {
      if (WORK_DATE_RELATIONS.includes(relation.type)) {
        const year = this.utils.extractYear(relation.begin);
        if (year) return year;
      }
    }

    for (const relation of relations) {
      if (relation.type === 'composer') {
        const year = this.utils.extractYear(relation.begin);
        if (year) return year;
      }
    }

    return null;
  }

  public composersOf(work: MbWork): string[] {
    return (work.relations ?? [])
      .filter(
        (relation): relation is MbRelation & { artist: { name: string } } =>
          relation.type === 'composer' && !!relation.artist?.name
      )
      .map((relation) => relation.artist.name);
  }

  private async walkRecordingWorks(
    title: string,
    artist: string,
    requireComposer: boolean
  ): Promise<WorkMatch> {
    const artistQuery = this.buildArtistQuery(artist);
    if (!artistQuery) {
      return { composer: null, work: null };
    }

    let firstWork: MbWork | null = null;

    for (const variant of this.buildTitleVariants(title)) {
      try {
        const search = await this.get<MbRecordingSearchResponse>('recording', {
          query: `recording:"${variant}" AND ${artistQuery}`,
          limit: 1,
        });
        const recording = search.recordings?.[0];
        if (!recording) {
          this.logger.logDev(`No recording for "${variant}"`);
          continue;
        }

        const details = await this.get<MbRecording>(
          `recording/${recording.id}`,
          { inc: 'work-rels' }
        );
        const workId = details.relations?.find(
          (relation) => relation['target-type'] === 'work' && relation.work
        )?.work?.id;
        if (!workId) {
          continue;
        }

        const work = await this.lookupWork(workId);
        firstWork = firstWork ?? work;

        if (!requireComposer) {
          return { composer: null, work };
        }

        const composer = this.composersOf(work)[0];
        if (composer) {
          this.logger.log(
            color.green(
              `Composer ${color.white.bold(composer)} found via recording "${variant}"`
            )
          );
          return { composer, work };
        }
      } catch (error) {
        this.logger.warn(
          `Lookup error for "${variant}": ${this.utils.describeError(error)}`
        );
      }
    }

    return { composer: null, work: firstWork };
  }

  private async lookupWork(workId: string): Promise<MbWork> {
    return this.get<MbWork>(`work/${workId}`, {
      inc: 'artist-rels+place-rels+event-rels',
    });
  }

  private async get<T>(
    path: string,
    params: Record<string, string | number>
  ): Promise<T> {
    const response = await this.limiter.schedule(() =>
      this.axiosInstance.get<T>(path, { params: { ...params, fmt: 'json' } })
    );
    return response.data;
  }
}

export default MusicBrainz;
