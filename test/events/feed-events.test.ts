import { describe, it, expect, vi } from 'vitest';
import { FeedEvents } from '../../src/events/feed-events';

describe('FeedEvents', () => {
  it('delivers typed payloads to subscribers of that event only', () => {
    const events = new FeedEvents();
    const onLanguage = vi.fn();
    const onTopics = vi.fn();
    events.on('languageChanged', onLanguage);
    events.on('topicsChanged', onTopics);

    events.emit('languageChanged', 'de');

    expect(onLanguage).toHaveBeenCalledWith('de');
    expect(onTopics).not.toHaveBeenCalled();
  });

  it('stops delivering after unsubscribe', () => {
    const events = new FeedEvents();
    const listener = vi.fn();
    const unsubscribe = events.on('topicsChanged', listener);

    unsubscribe();
    events.emit('topicsChanged', ['History and Events']);

    expect(listener).not.toHaveBeenCalled();
    expect(events.listenerCount('topicsChanged')).toBe(0);
  });
});
