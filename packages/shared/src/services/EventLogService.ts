import { subHours } from 'date-fns';
import { EventRepository } from '../repositories/EventRepository.js';
import type { EventSeverity, EventView } from '../types/records.js';
import { toEventView } from '../utils/serializers.js';

export interface RecentEventsQuery {
    hours?: number;
    source?: string;
    eventType?: string;
    severity?: string;
}

export class EventLogService {
    constructor(private readonly eventRepository: EventRepository) {}

    async logEvent(
        source: string,
        eventType: string,
        description: string,
        severity: EventSeverity = 'info'
    ): Promise<boolean> {
        try {
            await this.eventRepository.create({ source, eventType, description, severity });
            console.log(`[EventLog] ${source} - ${eventType} - ${description} (${severity})`);
            return true;
        } catch (error) {
            console.error('[EventLog] Error logging event:', error);
            return false;
        }
    }

    async getRecentEvents(query: RecentEventsQuery = {}): Promise<EventView[]> {
        const hours = query.hours ?? 24;

        try {
            const events = await this.eventRepository.findSince(subHours(new Date(), hours), {
                source: query.source,
                eventType: query.eventType,
                severity: query.severity
            });
            return events.map(toEventView);
        } catch (error) {
            console.error('[EventLog] Error retrieving events:', error);
            return [];
        }
    }

    async getLatestEvents(limit: number): Promise<EventView[]> {
        const events = await this.eventRepository.findLatest(limit);
        return events.map(toEventView);
    }

    async getEventsBySourcePrefix(prefix: string, limit: number): Promise<EventView[]> {
        const events = await this.eventRepository.findBySourcePrefix(prefix, limit);
        return events.map(toEventView);
    }
}
