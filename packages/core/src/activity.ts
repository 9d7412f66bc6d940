import { generateId, now } from './utils.js';

export type ActivityType =
  | 'candidate_admitted'
  | 'candidate_evicted'
  | 'hypothesis_recorded'
  | 'hypothesis_retracted'
  | 'solving_changed'
  | 'feedback_sent'
  | 'feed_built'
  | 'strategy_exhausted';

export interface ActivityEvent {
  id: string;
  type: ActivityType;
  description: string;
  details: string;
  timestamp: string;
}

export type ActivityListener = (event: ActivityEvent) => void;

const MAX_EVENTS = 500;

/** In-memory event trail for one session. Listener sees every event as it lands. */
export class ActivityLog {
  private events: ActivityEvent[] = [];

  constructor(private readonly onActivity?: ActivityListener) {}

  append(type: ActivityType, description: string, details = ''): ActivityEvent {
    const event: ActivityEvent = {
      id: generateId('act'),
      type,
      description,
      details,
      timestamp: now(),
    };

    // Cap at MAX_EVENTS, keeping newest
    this.events = [...this.events, event].slice(-MAX_EVENTS);
    this.onActivity?.(event);
    return event;
  }

  getRecent(count = 200): ActivityEvent[] {
    return this.events.slice(-count).reverse(); // newest first
  }

  getAll(): ActivityEvent[] {
    return this.events.slice().reverse(); // newest first
  }

  ofType(type: ActivityType): ActivityEvent[] {
    return this.getAll().filter((e) => e.type === type);
  }
}
