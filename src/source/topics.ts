import { z } from 'zod';
import catalogData from '../data/topic-catalog.json';
import { debugLogger } from '../utils/debug-logger';
import { shuffle } from '../utils/shuffle';

export const ALL_TOPICS = 'All Topics';
export const MINIMUM_FEED_CATEGORIES = 5;

const TopicCatalogSchema = z.object({
  topics: z
    .array(
      z.object({
        key: z.string().min(1),
        label: z.string().min(1),
        searchTerms: z.array(z.string().min(1)).min(1),
        categories: z.array(z.string().min(1)),
      })
    )
    .min(1),
});

export type TopicCatalogData = z.infer<typeof TopicCatalogSchema>;
type TopicEntry = TopicCatalogData['topics'][number];

/**
 * Topic keys/labels, their search terms and their Wikipedia categories.
 * Settings may carry either storage keys (`history_and_events`) or display
 * labels (`History and Events`); everything is normalized to labels.
 */
export class TopicCatalog {
  private readonly byLabel = new Map<string, TopicEntry>();
  private readonly keyToLabel = new Map<string, string>();
  private readonly random: () => number;

  constructor(data: unknown = catalogData, random: () => number = Math.random) {
    const parsed = TopicCatalogSchema.parse(data);
    for (const topic of parsed.topics) {
      this.byLabel.set(topic.label, topic);
      this.keyToLabel.set(topic.key, topic.label);
    }
    this.random = random;
  }

  /**
   * Canonical labels for a raw selection. Unknown topics are dropped,
   * "All Topics" absorbs every other choice, an empty result means
   * "All Topics".
   */
  normalizeTopics(rawTopics: readonly string[]): string[] {
    const canonical: string[] = [];

    for (const topic of rawTopics) {
      const label = this.keyToLabel.get(topic) ?? (this.byLabel.has(topic) ? topic : undefined);
      if (!label) {
        debugLogger.warn('SOURCE', `Unknown topic encountered during normalization: ${topic}`);
        continue;
      }
      if (!canonical.includes(label)) {
        canonical.push(label);
      }
    }

    if (canonical.length === 0 || canonical.includes(ALL_TOPICS)) {
      return [ALL_TOPICS];
    }
    return canonical;
  }

  isSupported(topic: string): boolean {
    return this.byLabel.has(topic) || this.keyToLabel.has(topic);
  }

  allTopics(): string[] {
    return Array.from(this.byLabel.keys()).sort();
  }

  keyFor(label: string): string {
    return this.byLabel.get(label)?.key ?? label;
  }

  searchTermsFor(topic: string): string[] {
    const label = this.keyToLabel.get(topic) ?? topic;
    const entry = this.byLabel.get(label) ?? this.byLabel.get(ALL_TOPICS);
    return entry ? [...entry.searchTerms] : [];
  }

  categoriesForTopics(topics: readonly string[]): string[] {
    const categories: string[] = [];
    for (const topic of topics) {
      const label = this.keyToLabel.get(topic) ?? topic;
      for (const category of this.byLabel.get(label)?.categories ?? []) {
        if (!categories.includes(category)) {
          categories.push(category);
        }
      }
    }
    return categories;
  }

  /**
   * Categories to fetch a feed batch from: the selection's own categories,
   * topped up at random from the whole catalog to at least five (or five
   * random ones for "All Topics"), in random order.
   */
  feedCategories(rawTopics: readonly string[]): string[] {
    const topics = this.normalizeTopics(rawTopics);
    const categories = this.categoriesForTopics(topics);

    if (categories.length < MINIMUM_FEED_CATEGORIES || topics.includes(ALL_TOPICS)) {
      const additionalNeeded = MINIMUM_FEED_CATEGORIES - categories.length;
      const available = this.categoriesForTopics(this.allTopics()).filter(c => !categories.includes(c));
      categories.push(...shuffle(available, this.random).slice(0, Math.max(0, additionalNeeded)));
    }

    return shuffle(categories, this.random);
  }
}
