import { and, asc, count, desc, eq, inArray } from 'drizzle-orm';
import type { CareDatabase } from '../clients/DatabaseClient.js';
import { safetyAlerts, type NewSafetyAlert, type SafetyAlert } from '../db/schema.js';

export class SafetyAlertRepository {
    constructor(private readonly db: CareDatabase) {}

    async create(data: NewSafetyAlert): Promise<SafetyAlert> {
        try {
            return this.db.insert(safetyAlerts).values(data).returning().get();
        } catch (error) {
            console.error('[SafetyAlertRepository] Unable to create safety alert:', error);
            throw error;
        }
    }

    async findById(id: number): Promise<SafetyAlert | undefined> {
        return this.db.select().from(safetyAlerts).where(eq(safetyAlerts.id, id)).get();
    }

    async findDistinctDeviceIds(): Promise<string[]> {
        try {
            const rows = this.db.selectDistinct({ deviceId: safetyAlerts.patientId })
                .from(safetyAlerts)
                .orderBy(asc(safetyAlerts.patientId))
                .all();
            return rows.map(row => row.deviceId);
        } catch (error) {
            console.error('[SafetyAlertRepository] Unable to list device IDs:', error);
            throw error;
        }
    }

    async findLatestByDevice(deviceId: string, limit: number): Promise<SafetyAlert[]> {
        try {
            return this.db.select()
                .from(safetyAlerts)
                .where(eq(safetyAlerts.patientId, deviceId))
                .orderBy(desc(safetyAlerts.timestamp), desc(safetyAlerts.id))
                .limit(limit)
                .all();
        } catch (error) {
            console.error('[SafetyAlertRepository] Unable to get latest alerts:', error);
            throw error;
        }
    }

    async findByDeviceAndTimestamp(deviceId: string, timestamp: Date): Promise<SafetyAlert | undefined> {
        return this.db.select()
            .from(safetyAlerts)
            .where(and(eq(safetyAlerts.patientId, deviceId), eq(safetyAlerts.timestamp, timestamp)))
            .get();
    }

    async findFirstByDevice(deviceId: string): Promise<SafetyAlert | undefined> {
        return this.db.select()
            .from(safetyAlerts)
            .where(eq(safetyAlerts.patientId, deviceId))
            .orderBy(asc(safetyAlerts.id))
            .get();
    }

    async findUnresolvedByDevice(deviceId: string): Promise<SafetyAlert[]> {
        try {
            return this.db.select()
                .from(safetyAlerts)
                .where(and(eq(safetyAlerts.patientId, deviceId), eq(safetyAlerts.resolved, false)))
                .orderBy(asc(safetyAlerts.timestamp), asc(safetyAlerts.id))
                .all();
        } catch (error) {
            console.error('[SafetyAlertRepository] Unable to get unresolved alerts:', error);
            throw error;
        }
    }

    async findPendingNotification(deviceId: string): Promise<SafetyAlert[]> {
        try {
            return this.db.select()
                .from(safetyAlerts)
                .where(and(
                    eq(safetyAlerts.patientId, deviceId),
                    eq(safetyAlerts.fallDetected, true),
                    eq(safetyAlerts.resolved, false),
                    eq(safetyAlerts.caregiverNotified, false)
                ))
                .orderBy(asc(safetyAlerts.timestamp))
                .all();
        } catch (error) {
            console.error('[SafetyAlertRepository] Unable to get unnotified falls:', error);
            throw error;
        }
    }

    async resolve(id: number, resolvedAt: Date): Promise<SafetyAlert | undefined> {
        try {
            return this.db.update(safetyAlerts)
                .set({ resolved: true, resolvedTimestamp: resolvedAt })
                .where(eq(safetyAlerts.id, id))
                .returning()
                .get();
        } catch (error) {
            console.error('[SafetyAlertRepository] Unable to resolve alert:', error);
            throw error;
        }
    }

    async markCaregiverNotified(ids: number[]): Promise<void> {
        if (ids.length === 0) return;

        try {
            this.db.update(safetyAlerts)
                .set({ caregiverNotified: true })
                .where(inArray(safetyAlerts.id, ids))
                .run();
        } catch (error) {
            console.error('[SafetyAlertRepository] Unable to mark caregiver notified:', error);
            throw error;
        }
    }

    async count(): Promise<number> {
        const row = this.db.select({ value: count() }).from(safetyAlerts).get();
        return row?.value ?? 0;
    }
}
