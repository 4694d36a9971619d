import { TopicCatalog } from '../src/source/topics';

/** Random source that makes shuffle() return its input order */
export const keepOrder = (): number => 0.9999;

export const testCatalogData = {
  topics: [
    { key: 'all_topics', label: 'All Topics', searchTerms: ['Random', 'Knowledge'], categories: [] },
    {
      key: 'history_and_events',
      label: 'History and Events',
      searchTerms: ['War', 'Empire', 'Treaty'],
      categories: ['Battles', 'Empires'],
    },
    {
      key: 'culture_and_arts',
      label: 'Culture and the Arts',
      searchTerms: ['Art', 'Music'],
      categories: ['Painting', 'Opera', 'Ballet'],
    },
    {
      key: 'mathematics_and_logic',
      label: 'Mathematics and Logic',
      searchTerms: ['Logic'],
      categories: ['Algorithms', 'Logic', 'Theorems'],
    },
  ],
};

export function testCatalog(): TopicCatalog {
  return new TopicCatalog(testCatalogData, keepOrder);
}
