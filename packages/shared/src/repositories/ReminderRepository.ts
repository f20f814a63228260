import { and, asc, count, eq, inArray, lt, lte } from 'drizzle-orm';
import type { CareDatabase } from '../clients/DatabaseClient.js';
import { reminders, type NewReminder, type Reminder } from '../db/schema.js';

export class ReminderRepository {
    constructor(private readonly db: CareDatabase) {}

    async create(data: NewReminder): Promise<Reminder> {
        try {
            return this.db.insert(reminders).values(data).returning().get();
        } catch (error) {
            console.error('[ReminderRepository] Unable to create reminder:', error);
            throw error;
        }
    }

    async findById(id: number): Promise<Reminder | undefined> {
        return this.db.select().from(reminders).where(eq(reminders.id, id)).get();
    }

    async findDistinctDeviceIds(): Promise<string[]> {
        try {
            const rows = this.db.selectDistinct({ deviceId: reminders.patientId })
                .from(reminders)
                .orderBy(asc(reminders.patientId))
                .all();
            return rows.map(row => row.deviceId);
        } catch (error) {
            console.error('[ReminderRepository] Unable to list device IDs:', error);
            throw error;
        }
    }

    async findByDevice(deviceId: string): Promise<Reminder[]> {
        try {
            return this.db.select()
                .from(reminders)
                .where(eq(reminders.patientId, deviceId))
                .orderBy(asc(reminders.scheduledTime), asc(reminders.id))
                .all();
        } catch (error) {
            console.error('[ReminderRepository] Unable to get reminders for device:', error);
            throw error;
        }
    }

    async findUpcomingByDevice(deviceId: string, limit: number): Promise<Reminder[]> {
        try {
            return this.db.select()
                .from(reminders)
                .where(and(eq(reminders.patientId, deviceId), eq(reminders.completed, false)))
                .orderBy(asc(reminders.scheduledTime), asc(reminders.id))
                .limit(limit)
                .all();
        } catch (error) {
            console.error('[ReminderRepository] Unable to get upcoming reminders:', error);
            throw error;
        }
    }

    async findDuplicate(deviceId: string, scheduledTime: Date, reminderType: string): Promise<Reminder | undefined> {
        return this.db.select()
            .from(reminders)
            .where(and(
                eq(reminders.patientId, deviceId),
                eq(reminders.scheduledTime, scheduledTime),
                eq(reminders.reminderType, reminderType)
            ))
            .get();
    }

    async findFirstByDevice(deviceId: string): Promise<Reminder | undefined> {
        return this.db.select()
            .from(reminders)
            .where(eq(reminders.patientId, deviceId))
            .orderBy(asc(reminders.id))
            .get();
    }

    async findDueForDispatch(deviceId: string, until: Date): Promise<Reminder[]> {
        try {
            return this.db.select()
                .from(reminders)
                .where(and(
                    eq(reminders.patientId, deviceId),
                    eq(reminders.completed, false),
                    eq(reminders.reminderSent, false),
                    lte(reminders.scheduledTime, until)
                ))
                .orderBy(asc(reminders.scheduledTime), asc(reminders.id))
                .all();
        } catch (error) {
            console.error('[ReminderRepository] Unable to get due reminders:', error);
            throw error;
        }
    }

    async findMissed(deviceId: string, scheduledBefore: Date): Promise<Reminder[]> {
        try {
            return this.db.select()
                .from(reminders)
                .where(and(
                    eq(reminders.patientId, deviceId),
                    eq(reminders.completed, false),
                    eq(reminders.reminderSent, true),
                    eq(reminders.acknowledged, false),
                    lt(reminders.scheduledTime, scheduledBefore)
                ))
                .orderBy(asc(reminders.scheduledTime), asc(reminders.id))
                .all();
        } catch (error) {
            console.error('[ReminderRepository] Unable to get missed reminders:', error);
            throw error;
        }
    }

    async markSent(ids: number[]): Promise<void> {
        if (ids.length === 0) return;

        try {
            this.db.update(reminders)
                .set({ reminderSent: true })
                .where(inArray(reminders.id, ids))
                .run();
        } catch (error) {
            console.error('[ReminderRepository] Unable to mark reminders sent:', error);
            throw error;
        }
    }

    async markCompleted(id: number, completedAt: Date): Promise<Reminder | undefined> {
        try {
            return this.db.update(reminders)
                .set({ completed: true, completedTimestamp: completedAt })
                .where(eq(reminders.id, id))
                .returning()
                .get();
        } catch (error) {
            console.error('[ReminderRepository] Unable to complete reminder:', error);
            throw error;
        }
    }

    async countPendingByDevice(deviceId: string): Promise<number> {
        const row = this.db.select({ value: count() })
            .from(reminders)
            .where(and(eq(reminders.patientId, deviceId), eq(reminders.completed, false)))
            .get();
        return row?.value ?? 0;
    }

    async count(): Promise<number> {
        const row = this.db.select({ value: count() }).from(reminders).get();
        return row?.value ?? 0;
    }
}
