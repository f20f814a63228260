import { and, desc, eq, gte, like, type SQL } from 'drizzle-orm';
import type { CareDatabase } from '../clients/DatabaseClient.js';
import { events, type EventRecord, type NewEventRecord } from '../db/schema.js';

export interface EventFilters {
    source?: string;
    eventType?: string;
    severity?: string;
}

export class EventRepository {
    constructor(private readonly db: CareDatabase) {}

    async create(data: NewEventRecord): Promise<EventRecord> {
        try {
            return this.db.insert(events).values(data).returning().get();
        } catch (error) {
            console.error('[EventRepository] Unable to create event:', error);
            throw error;
        }
    }

    async findSince(since: Date, filters: EventFilters = {}): Promise<EventRecord[]> {
        const conditions: SQL[] = [gte(events.timestamp, since)];

        if (filters.source) {
            conditions.push(like(events.source, `%${filters.source}%`));
        }
        if (filters.eventType) {
            conditions.push(like(events.eventType, `%${filters.eventType}%`));
        }
        if (filters.severity) {
            conditions.push(eq(events.severity, filters.severity));
        }

        try {
            return this.db.select()
                .from(events)
                .where(and(...conditions))
                .orderBy(desc(events.timestamp), desc(events.id))
                .all();
        } catch (error) {
            console.error('[EventRepository] Unable to query events:', error);
            throw error;
        }
    }

    async findLatest(limit: number): Promise<EventRecord[]> {
        try {
            return this.db.select()
                .from(events)
                .orderBy(desc(events.timestamp), desc(events.id))
                .limit(limit)
                .all();
        } catch (error) {
            console.error('[EventRepository] Unable to get latest events:', error);
            throw error;
        }
    }

    async findBySourcePrefix(prefix: string, limit: number): Promise<EventRecord[]> {
        try {
            return this.db.select()
                .from(events)
                .where(like(events.source, `${prefix}%`))
                .orderBy(desc(events.timestamp), desc(events.id))
                .limit(limit)
                .all();
        } catch (error) {
            console.error('[EventRepository] Unable to get events by source:', error);
            throw error;
        }
    }
}
