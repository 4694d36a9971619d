import { z } from 'zod';
import { FeedError } from '../errors';
import { FeedEvents } from '../events/feed-events';
import {
  CategoryMembersResponseSchema,
  LanguageCodeSchema,
  PageDetailsResponseSchema,
  SearchResponseSchema,
  WikiPage,
  WikiPageSchema,
} from '../schemas';
import { ContentItem, ContentSource, TransportRequestOptions } from '../types';
import { chunkArray, runTaskGroup, TaskGroupResult } from '../utils/concurrency';
import { debugLogger } from '../utils/debug-logger';
import { ExpiringSet } from '../utils/expiring-set';
import { shuffle } from '../utils/shuffle';
import { Clock, ONE_HOUR_MS, systemClock } from '../utils/time';
import { ALL_TOPICS, TopicCatalog } from './topics';

/** Subset of HttpTransport the source needs */
export interface JsonTransport {
  getJson<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: TransportRequestOptions): Promise<T>;
}

export interface WikipediaSourceOptions {
  transport: JsonTransport;
  catalog: TopicCatalog;
  /** Clears used search terms whenever the language or topics change */
  events?: FeedEvents;
  /** Used search terms become eligible again after this long. Default: 24h */
  usedTermTtlMs?: number;
  /** Thumbnail width requested from the API. Default: 800 */
  thumbnailSize?: number;
  random?: () => number;
  clock?: Clock;
  apiUrlFor?: (languageCode: string) => string;
}

/** Most categories or topics a single call fans out to */
const MAX_PARALLEL_QUERIES = 3;
/** The extracts module returns at most 20 intro extracts per request */
const DETAILS_CHUNK_SIZE = 20;

const defaultApiUrl = (languageCode: string): string => `https://${languageCode}.wikipedia.org/w/api.php`;

/**
 * Content source backed by the Wikipedia Action API. Every public call makes
 * one attempt per underlying request and rejects with a FeedError when
 * nothing could be fetched; partial failures are logged and skipped.
 */
export class WikipediaContentSource implements ContentSource {
  private readonly transport: JsonTransport;
  private readonly catalog: TopicCatalog;
  private readonly usedSearchTerms: ExpiringSet<string>;
  private readonly thumbnailSize: number;
  private readonly random: () => number;
  private readonly apiUrlFor: (languageCode: string) => string;
  private readonly unsubscribers: Array<() => void> = [];

  constructor(options: WikipediaSourceOptions) {
    this.transport = options.transport;
    this.catalog = options.catalog;
    this.usedSearchTerms = new ExpiringSet(options.usedTermTtlMs ?? 24 * ONE_HOUR_MS, options.clock ?? systemClock);
    this.thumbnailSize = options.thumbnailSize ?? 800;
    this.random = options.random ?? Math.random;
    this.apiUrlFor = options.apiUrlFor ?? defaultApiUrl;

    if (options.events) {
      this.unsubscribers.push(
        options.events.on('languageChanged', () => this.clearUsedSearchTerms()),
        options.events.on('topicsChanged', () => this.clearUsedSearchTerms())
      );
    }
  }

  /**
   * Random articles from up to three of the given categories, combined,
   * shuffled and truncated to `count`.
   */
  async fetchByCategory(categories: string[], count: number, languageCode: string, signal?: AbortSignal): Promise<ContentItem[]> {
    this.assertLanguage(languageCode);

    const filtered = categories.filter(category => category !== ALL_TOPICS);
    if (count <= 0 || categories.length === 0) {
      return [];
    }
    if (filtered.length === 0) {
      return this.fetchBatch([ALL_TOPICS], count, languageCode, signal);
    }

    const selected = filtered.slice(0, MAX_PARALLEL_QUERIES);
    const perCategory = Math.max(1, Math.ceil(count / selected.length));

    const stepId = debugLogger.stepStart('SOURCE', `Fetching ${count} articles from ${selected.length} categories`, {
      categories: selected,
      perCategory,
      languageCode
    });

    const result = await runTaskGroup(
      selected,
      (category, _index, taskSignal) => this.categoryMemberIds(category, perCategory * 2, languageCode, taskSignal),
      { concurrency: MAX_PARALLEL_QUERIES, label: 'Category members', signal }
    );
    const idLists = this.survivingResults(result, selected, stepId);

    const pageIds = unique(idLists.flatMap(ids => shuffle(ids, this.random).slice(0, perCategory)));
    const items = await this.pageDetails(pageIds, languageCode, signal);
    const batch = shuffle(items, this.random).slice(0, count);

    debugLogger.stepFinish(stepId, { returned: batch.length });
    return batch;
  }

  /**
   * Articles found by searching unused terms of up to three topics, one hit
   * per term.
   */
  async fetchBatch(topics: string[], count: number, languageCode: string, signal?: AbortSignal): Promise<ContentItem[]> {
    this.assertLanguage(languageCode);

    if (count <= 0 || topics.length === 0) {
      return [];
    }

    const selected = this.catalog.normalizeTopics(topics).slice(0, MAX_PARALLEL_QUERIES);
    const perTopic = Math.max(1, Math.ceil(count / selected.length));
    const terms = unique(selected.flatMap(topic => this.pickSearchTerms(topic, perTopic)));

    const stepId = debugLogger.stepStart('SOURCE', `Searching ${terms.length} terms for ${selected.join(', ')}`, {
      perTopic,
      languageCode
    });

    const result = await runTaskGroup(
      terms,
      (term, _index, taskSignal) => this.searchPageIds(term, languageCode, taskSignal),
      { concurrency: MAX_PARALLEL_QUERIES, label: 'Topic search', signal }
    );
    const idLists = this.survivingResults(result, terms, stepId);

    const items = await this.pageDetails(unique(idLists.flat()), languageCode, signal);
    const batch = shuffle(items, this.random).slice(0, count);

    debugLogger.stepFinish(stepId, { returned: batch.length });
    return batch;
  }

  clearUsedSearchTerms(): void {
    this.usedSearchTerms.clear();
    debugLogger.info('SOURCE', 'Cleared used search terms');
  }

  usedSearchTermCount(): number {
    return this.usedSearchTerms.size;
  }

  dispose(): void {
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
  }

  private assertLanguage(languageCode: string): void {
    if (!LanguageCodeSchema.safeParse(languageCode).success) {
      throw new FeedError('client', `Unsupported language code: ${languageCode}`);
    }
  }

  /**
   * Unused terms first; once every term of a topic has been used the whole
   * list is eligible again.
   */
  private pickSearchTerms(topic: string, count: number): string[] {
    const allTerms = this.catalog.searchTermsFor(topic);
    const unused = allTerms.filter(term => !this.usedSearchTerms.has(term));
    const pool = unused.length > 0 ? unused : allTerms;
    const picked = shuffle(pool, this.random).slice(0, count);
    this.usedSearchTerms.addAll(picked);
    return picked;
  }

  /**
   * Throws the first failure when every task failed, otherwise logs the
   * failures and returns what succeeded.
   */
  private survivingResults<T>(result: TaskGroupResult<T>, labels: readonly string[], stepId: string): T[] {
    if (result.successful.length === 0 && result.failed.length > 0) {
      const first = result.failed.reduce((a, b) => (b.index < a.index ? b : a));
      debugLogger.stepError(stepId, 'SOURCE', 'Every upstream request failed', first.error);
      throw first.error;
    }
    if (result.failed.length > 0) {
      debugLogger.warn('SOURCE', `${result.failed.length}/${labels.length} upstream requests failed`, {
        failed: result.failed.map(f => labels[f.index])
      });
    }
    return result.successful;
  }

  private async categoryMemberIds(category: string, limit: number, languageCode: string, signal?: AbortSignal): Promise<number[]> {
    const url = this.buildUrl(languageCode, {
      list: 'categorymembers',
      cmtitle: `Category:${category}`,
      cmnamespace: '0',
      cmtype: 'page',
      cmlimit: String(limit),
    });
    const response = await this.transport.getJson(url, CategoryMembersResponseSchema, { signal });
    const members = response.query?.categorymembers ?? [];
    return members.filter(member => member.ns === 0).map(member => member.pageid);
  }

  private async searchPageIds(term: string, languageCode: string, signal?: AbortSignal): Promise<number[]> {
    const url = this.buildUrl(languageCode, {
      list: 'search',
      srsearch: term,
      srnamespace: '0',
      srlimit: '1',
    });
    const response = await this.transport.getJson(url, SearchResponseSchema, { signal });
    return (response.query?.search ?? []).map(hit => hit.pageid);
  }

  private async pageDetails(pageIds: readonly number[], languageCode: string, signal?: AbortSignal): Promise<ContentItem[]> {
    const items: ContentItem[] = [];
    let skipped = 0;

    for (const chunk of chunkArray(pageIds, DETAILS_CHUNK_SIZE)) {
      const url = this.buildUrl(languageCode, {
        pageids: chunk.join('|'),
        prop: 'extracts|pageimages|info',
        exintro: '1',
        explaintext: '1',
        exlimit: String(chunk.length),
        piprop: 'thumbnail',
        pithumbsize: String(this.thumbnailSize),
        inprop: 'url',
      });
      const response = await this.transport.getJson(url, PageDetailsResponseSchema, { signal });

      for (const raw of response.query?.pages ?? []) {
        const page = WikiPageSchema.safeParse(raw);
        if (page.success) {
          items.push(toContentItem(page.data));
        } else {
          skipped++;
        }
      }
    }

    if (skipped > 0) {
      debugLogger.warn('SOURCE', `Skipped ${skipped} malformed or missing pages`);
    }
    return items;
  }

  private buildUrl(languageCode: string, params: Record<string, string>): string {
    const search = new URLSearchParams({
      action: 'query',
      format: 'json',
      formatversion: '2',
      ...params,
    });
    return `${this.apiUrlFor(languageCode)}?${search.toString()}`;
  }
}

function toContentItem(page: WikiPage): ContentItem {
  return {
    id: page.pageid,
    title: page.title,
    excerpt: page.extract.trim(),
    assetUrl: page.thumbnail?.source,
    sourceUrl: page.fullurl,
  };
}

function unique<T>(values: readonly T[]): T[] {
  return Array.from(new Set(values));
}
