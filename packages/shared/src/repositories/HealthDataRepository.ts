import { and, asc, count, desc, eq, gte, inArray } from 'drizzle-orm';
import type { CareDatabase } from '../clients/DatabaseClient.js';
import { healthData, type HealthReading, type NewHealthReading } from '../db/schema.js';

export class HealthDataRepository {
    constructor(private readonly db: CareDatabase) {}

    async create(data: NewHealthReading): Promise<HealthReading> {
        try {
            return this.db.insert(healthData).values(data).returning().get();
        } catch (error) {
            console.error('[HealthDataRepository] Unable to create health reading:', error);
            throw error;
        }
    }

    async findDistinctDeviceIds(): Promise<string[]> {
        try {
            const rows = this.db.selectDistinct({ deviceId: healthData.patientId })
                .from(healthData)
                .orderBy(asc(healthData.patientId))
                .all();
            return rows.map(row => row.deviceId);
        } catch (error) {
            console.error('[HealthDataRepository] Unable to list device IDs:', error);
            throw error;
        }
    }

    async findLatestByDevice(deviceId: string, limit: number): Promise<HealthReading[]> {
        try {
            return this.db.select()
                .from(healthData)
                .where(eq(healthData.patientId, deviceId))
                .orderBy(desc(healthData.timestamp), desc(healthData.id))
                .limit(limit)
                .all();
        } catch (error) {
            console.error('[HealthDataRepository] Unable to get latest readings:', error);
            throw error;
        }
    }

    async findByDevice(deviceId: string, order: 'asc' | 'desc' = 'desc'): Promise<HealthReading[]> {
        try {
            const direction = order === 'asc' ? asc : desc;
            return this.db.select()
                .from(healthData)
                .where(eq(healthData.patientId, deviceId))
                .orderBy(direction(healthData.timestamp), direction(healthData.id))
                .all();
        } catch (error) {
            console.error('[HealthDataRepository] Unable to get readings for device:', error);
            throw error;
        }
    }

    async findByDeviceSince(deviceId: string, since: Date): Promise<HealthReading[]> {
        try {
            return this.db.select()
                .from(healthData)
                .where(and(eq(healthData.patientId, deviceId), gte(healthData.timestamp, since)))
                .orderBy(asc(healthData.timestamp), asc(healthData.id))
                .all();
        } catch (error) {
            console.error('[HealthDataRepository] Unable to get readings in window:', error);
            throw error;
        }
    }

    async findByDeviceAndTimestamp(deviceId: string, timestamp: Date): Promise<HealthReading | undefined> {
        return this.db.select()
            .from(healthData)
            .where(and(eq(healthData.patientId, deviceId), eq(healthData.timestamp, timestamp)))
            .get();
    }

    async findFirstByDevice(deviceId: string): Promise<HealthReading | undefined> {
        return this.db.select()
            .from(healthData)
            .where(eq(healthData.patientId, deviceId))
            .orderBy(asc(healthData.id))
            .get();
    }

    async findPendingNotification(deviceId: string): Promise<HealthReading[]> {
        try {
            return this.db.select()
                .from(healthData)
                .where(and(
                    eq(healthData.patientId, deviceId),
                    eq(healthData.alertTriggered, true),
                    eq(healthData.caregiverNotified, false)
                ))
                .orderBy(asc(healthData.timestamp))
                .all();
        } catch (error) {
            console.error('[HealthDataRepository] Unable to get unnotified alerts:', error);
            throw error;
        }
    }

    async markCaregiverNotified(ids: number[]): Promise<void> {
        if (ids.length === 0) return;

        try {
            this.db.update(healthData)
                .set({ caregiverNotified: true })
                .where(inArray(healthData.id, ids))
                .run();
        } catch (error) {
            console.error('[HealthDataRepository] Unable to mark caregiver notified:', error);
            throw error;
        }
    }

    async count(): Promise<number> {
        const row = this.db.select({ value: count() }).from(healthData).get();
        return row?.value ?? 0;
    }
}
