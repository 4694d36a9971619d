import { ExpiringSet } from '../utils/expiring-set';
import { Clock, ONE_HOUR_MS, systemClock } from '../utils/time';

export const DEFAULT_SEEN_TTL_MS = 24 * ONE_HOUR_MS;

/**
 * Ids already delivered into the visible feed for one language/topic
 * configuration. The whole set expires after the TTL so older content can
 * resurface.
 *
 * The TTL window is wall-clock based and is not coordinated with the
 * source's used-term window; the two may expire at slightly different times.
 */
export class SeenIdSet extends ExpiringSet<number> {
  constructor(ttlMs: number = DEFAULT_SEEN_TTL_MS, clock: Clock = systemClock) {
    super(ttlMs, clock);
  }
}
