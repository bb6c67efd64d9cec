import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';

import type { AnalyticsEvent, AnalyticsEventType } from '../types';
import { isPlainObject, JsonFileCollection } from './jsonFile';

const isAnalyticsEvent = (value: unknown): value is AnalyticsEvent =>
  isPlainObject(value) &&
  typeof value.id === 'string' &&
  typeof value.userId === 'string' &&
  typeof value.eventType === 'string' &&
  isPlainObject(value.data);

export class EventLog {
  private readonly collection: JsonFileCollection<AnalyticsEvent>;

  constructor(dataDir: string, private readonly now: () => Date = () => new Date()) {
    this.collection = new JsonFileCollection(path.join(dataDir, 'events.json'), isAnalyticsEvent);
  }

  log(userId: string, eventType: AnalyticsEventType, data: AnalyticsEvent['data'] = {}): AnalyticsEvent {
    return this.collection.insert({
      id: uuidv4(),
      userId,
      eventType,
      data,
      timestamp: this.now().toISOString(),
    });
  }

  list(filter: { userId?: string; eventType?: AnalyticsEventType } = {}): AnalyticsEvent[] {
    return this.collection
      .values()
      .filter((event) => filter.userId === undefined || event.userId === filter.userId)
      .filter((event) => filter.eventType === undefined || event.eventType === filter.eventType)
      .sort((left, right) => left.timestamp.localeCompare(right.timestamp));
  }
}
