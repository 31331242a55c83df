import { color } from 'console-log-colors';
import axios, { AxiosInstance } from 'axios';
import Bottleneck from 'bottleneck';
import Logger from './logger';
import Settings from './settings';
import Utils from './utils';
import {
  ScoredSearchHit,
  WikidataClaim,
  WikidataEntitiesResponse,
  WikipediaPagePropsResponse,
  WikipediaSearchHit,
  WikipediaSearchResponse,
} from './interfaces/KnowledgeGraph';
import {
  WIKIDATA_API_URL,
  WIKIDATA_INCEPTION,
  WIKIDATA_PUBLICATION_DATE,
  WIKIPEDIA_API_URL,
  WIKIPEDIA_SEARCH_LIMIT,
  WORK_GENRE_KEYWORDS,
} from './config/constants';

const GENRE_KEYWORD_BONUS = 2;
const CATALOG_GENRE_BONUS = 1;
const COMPOSER_PART_BONUS = 3;

/**
 * Composition dates from Wikipedia and Wikidata, for works MusicBrainz has no date for.
 */
class KnowledgeGraph {
  private static instance: KnowledgeGraph;
  private logger = new Logger('wikidata');
  private utils = new Utils();
  private axiosInstance: AxiosInstance;
  private limiter: Bottleneck;

  constructor(settings: Settings = Settings.getInstance(), axiosInstance?: AxiosInstance) {
    this.axiosInstance =
      axiosInstance ??
      axios.create({
        timeout: settings.values.requestTimeoutMs,
        headers: {
          // Wikimedia asks API clients to identify themselves
          'User-Agent': settings.values.musicBrainzUserAgent,
        },
      });
    this.limiter = new Bottleneck({
      maxConcurrent: 1,
      minTime: settings.values.requestDelayMs,
    });
  }

  public static getInstance(): KnowledgeGraph {
    if (!KnowledgeGraph.instance) {
      KnowledgeGraph.instance = new KnowledgeGraph();
    }
    return KnowledgeGraph.instance;
  }

  public async findCompositionYear(
    title: string,
    composer: string | null,
    genre: string | null = null
  ): Promise<string | null> {
    const searchText = composer ? `${title} ${composer}` : title;

    try {
      const hits = await this.searchWikipedia(searchText);
      const best = this.pickBestHit(hits, title, composer, genre);
      if (!best) {
        this.logger.logDev(`No relevant Wikipedia article for "${searchText}"`);
        return null;
      }

      const entityId = await this.getEntityId(best.hit.title);
      if (!entityId) {
        this.logger.logDev(`"${best.hit.title}" has no Wikidata item`);
        return null;
      }

      const claims = await this.getClaims(entityId);
      const year =
        this.readYear(claims[WIKIDATA_INCEPTION]) ??
        this.readYear(claims[WIKIDATA_PUBLICATION_DATE]);

      if (year) {
        this.logger.log(
          color.green(
            `Composition year ${color.white.bold(year)} from ${entityId} ("${best.hit.title}")`
          )
        );
      }
      return year;
    } catch (error) {
      this.logger.warn(
        `Knowledge graph lookup failed for "${searchText}": ${this.utils.describeError(error)}`
      );
      return null;
    }
  }

  /**
   * Rank search hits by how much they look like an article about this work.
   * Ties keep search order.
   */
  public pickBestHit(
    hits: WikipediaSearchHit[],
    title: string,
    composer: string | null,
    genre: string | null
  ): ScoredSearchHit | null {
    let best: ScoredSearchHit | null = null;
    for (const hit of hits) {
      const score = this.scoreHit(hit, title, composer, genre);
      if (score > 0 && (!best || score > best.score)) {
        best = { hit, score };
      }
    }
    return best;
  }

  public scoreHit(
    hit: WikipediaSearchHit,
    title: string,
    composer: string | null,
    genre: string | null
  ): number {
    const hitTitle = hit.title.toLowerCase();
    const text = `${hitTitle} ${this.utils.stripHtml(hit.snippet ?? '').toLowerCase()}`;
    let score = 0;

    for (const word of new Set(this.utils.keywords(title))) {
      if (hitTitle.includes(word)) score += 1;
    }

    if (WORK_GENRE_KEYWORDS.some((keyword) => new RegExp(`\\b${keyword}\\b`).test(text))) {
      score += GENRE_KEYWORD_BONUS;
    }

    const genreLower = genre?.trim().toLowerCase();
    if (genreLower && new RegExp(`\\b${this.utils.escapeRegExp(genreLower)}\\b`).test(text)) {
      score += CATALOG_GENRE_BONUS;
    }

    if (composer) {
      for (const part of new Set(this.utils.significantNameParts(composer))) {
        if (text.includes(part)) score += COMPOSER_PART_BONUS;
      }
    }

    return score;
  }

  /**
   * 4-digit year of the first usable time value, preferred-rank claims first.
   */
  public readYear(claims: WikidataClaim[] | undefined): string | null {
    if (!claims || claims.length === 0) return null;

    const ordered = [
      ...claims.filter((claim) => claim.rank === 'preferred'),
      ...claims.filter((claim) => claim.rank !== 'preferred' && claim.rank !== 'deprecated'),
    ];

    for (const claim of ordered) {
      const value = claim.mainsnak.datavalue?.value;
      if (
        claim.mainsnak.datavalue?.type === 'time' &&
        typeof value === 'object' &&
        value !== null &&
        'time' in value &&
        typeof value.time === 'string'
      ) {
        const year = this.utils.extractYear(value.time);
        if (year) return year;
      }
    }
    return null;
  }

  private async searchWikipedia(text: string): Promise<WikipediaSearchHit[]> {
    const data = await this.get<WikipediaSearchResponse>(WIKIPEDIA_API_URL, {
      action: 'query',
      list: 'search',
      srsearch: text,
      srlimit: WIKIPEDIA_SEARCH_LIMIT,
      format: 'json',
    });
    return data.query?.search ?? [];
  }

  private async getEntityId(pageTitle: string): Promise<string | null> {
    const data = await this.get<WikipediaPagePropsResponse>(WIKIPEDIA_API_URL, {
      action: 'query',
      prop: 'pageprops',
      ppprop: 'wikibase_item',
      titles: pageTitle,
      redirects: 1,
      format: 'json',
    });
    const pages = Object.values(data.query?.pages ?? {});
    return pages.find((page) => page.pageprops?.wikibase_item)?.pageprops?.wikibase_item ?? null;
  }

  private async getClaims(entityId: string): Promise<Record<string, WikidataClaim[]>> {
    const data = await this.get<WikidataEntitiesResponse>(WIKIDATA_API_URL, {
      action: 'wbgetentities',
      ids: entityId,
      props: 'claims',
      format: 'json',
    });
    return data.entities?.[entityId]?.claims ?? {};
  }

  private async get<T>(url: string, params: Record<string, string | number>): Promise<T> {
    const response = await this.limiter.schedule(() =>
      this.axiosInstance.get<T>(url, { params })
    );
    return response.data;
  }
}

export default KnowledgeGraph;
