import { Injectable } from '@nestjs/common';
import type {
  EntityExtractor,
  ExtractionContext,
  TimelineEvent,
} from '../types/clinical.types';
import { DATE_PATTERN, matchAll } from './patterns';

export const MAX_TIMELINE_EVENTS = 10;
const CONTEXT_BEFORE = 100;
const CONTEXT_AFTER = 200;

/**
 * Dated events, ordered by the literal date string (not calendar order).
 */
@Injectable()
export class TimelineExtractor implements EntityExtractor<TimelineEvent[]> {
  extract({ fullText }: ExtractionContext): TimelineEvent[] {
    const events: TimelineEvent[] = [];

    for (const match of matchAll(fullText, DATE_PATTERN)) {
      const date = match[0];
      const start = match.index;
      const end = start + date.length;
      const context = fullText
        .slice(Math.max(0, start - CONTEXT_BEFORE), end + CONTEXT_AFTER)
        .trim();

      const event = context
        .split(/[.!?]/)
        .find((sentence) => sentence.includes(date))
        ?.trim();

      if (event && event.length > 10) {
        events.push({ date, event, source: { offset: [start, end], context } });
      }
    }

    return events
      .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0))
      .slice(0, MAX_TIMELINE_EVENTS);
  }
}
