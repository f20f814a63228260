import { addHours, subDays, subHours } from 'date-fns';
import type { CareDataContext } from '../context.js';
import type { NewHealthReading, NewReminder, NewSafetyAlert } from '../db/schema.js';

export const SAMPLE_DEVICE_IDS = ['D2000', 'D3000'] as const;

export type SampleDeviceId = typeof SAMPLE_DEVICE_IDS[number];

type DeviceProfile = {
    health: Omit<NewHealthReading, 'patientId' | 'timestamp'>;
    safety: Omit<NewSafetyAlert, 'patientId' | 'timestamp'>;
    reminder: Omit<NewReminder, 'patientId' | 'timestamp' | 'scheduledTime'>;
};

// D2000 stays within normal ranges, D3000 carries open alerts
const DEVICE_PROFILES: Record<SampleDeviceId, DeviceProfile> = {
    D2000: {
        health: {
            heartRate: 75,
            bloodPressureSystolic: 125,
            bloodPressureDiastolic: 85,
            glucoseLevel: 110,
            oxygenSaturation: 97,
        },
        safety: {
            movementActivity: 'Normal',
            fallDetected: false,
            impactForceLevel: 'Low',
            postFallInactivity: 0,
            location: 'Living Room',
            severity: 'info',
            resolved: true,
        },
        reminder: {
            reminderType: 'Medication',
            description: 'Take blood pressure medication',
            recurrence: 'daily',
            priority: 'high',
        },
    },
    D3000: {
        health: {
            heartRate: 82,
            bloodPressureSystolic: 145,
            bloodPressureDiastolic: 90,
            bloodPressureAlert: true,
            glucoseLevel: 130,
            oxygenSaturation: 94,
            alertTriggered: true,
            caregiverNotified: true,
        },
        safety: {
            movementActivity: 'Abnormal',
            fallDetected: true,
            impactForceLevel: 'Medium',
            postFallInactivity: 120,
            location: 'Living Room',
            alertTriggered: true,
            caregiverNotified: true,
            severity: 'warning',
            resolved: false,
        },
        reminder: {
            reminderType: 'Appointment',
            description: 'Doctor appointment',
            recurrence: 'weekly',
            priority: 'medium',
        },
    },
};

export interface SeedResult {
    health: number;
    safety: number;
    reminders: number;
}

export class SampleDataService {
    constructor(private readonly data: CareDataContext) {}

    async createSamplePatientAndCaregiver(): Promise<{ patientCreated: boolean; caregiverCreated: boolean }> {
        const { people } = this.data;
        let patientCreated = false;
        let caregiverCreated = false;

        if (!await people.findPatient('P001')) {
            console.log('[SampleDataService] Creating sample patient');
            await people.createPatient({
                patientId: 'P001',
                name: 'John Smith',
                age: 78,
                gender: 'Male',
                address: '123 Elder St, Caretown',
                phone: '555-123-4567',
                emergencyContact: 'Mary Smith (Daughter): 555-987-6543',
                medicalConditions: 'Hypertension, Type 2 Diabetes, Mild Arthritis',
            });
            patientCreated = true;
        }

        if (!await people.findCaregiver('C001')) {
            console.log('[SampleDataService] Creating sample caregiver');
            await people.createCaregiver({
                caregiverId: 'C001',
                name: 'Jane Morgan',
                role: 'Primary Nurse',
                phone: '555-765-4321',
                email: 'jane.morgan@example.com',
                patients: 'P001,D1000,D2000,D3000',
            });
            caregiverCreated = true;
        }

        return { patientCreated, caregiverCreated };
    }

    // Only seeds the tables a sample device has no rows in yet
    async createAdditionalSampleDevices(now: Date = new Date()): Promise<SeedResult> {
        const { healthData, safetyAlerts, reminders } = this.data;
        const result: SeedResult = { health: 0, safety: 0, reminders: 0 };

        for (const deviceId of SAMPLE_DEVICE_IDS) {
            const profile = DEVICE_PROFILES[deviceId];

            if (!await healthData.findFirstByDevice(deviceId)) {
                console.log(`[SampleDataService] Creating sample health data for device ${deviceId}`);
                await healthData.create({ ...profile.health, patientId: deviceId, timestamp: subDays(now, 1) });
                result.health++;
            }

            if (!await safetyAlerts.findFirstByDevice(deviceId)) {
                console.log(`[SampleDataService] Creating sample safety data for device ${deviceId}`);
                await safetyAlerts.create({ ...profile.safety, patientId: deviceId, timestamp: subDays(now, 2) });
                result.safety++;
            }

            if (!await reminders.findFirstByDevice(deviceId)) {
                console.log(`[SampleDataService] Creating sample reminder for device ${deviceId}`);
                await reminders.create({
                    ...profile.reminder,
                    patientId: deviceId,
                    timestamp: now,
                    scheduledTime: addHours(now, 3)
                });
                result.reminders++;
            }
        }

        return result;
    }

    async addDeviceData(now: Date = new Date()): Promise<SeedResult> {
        const { healthData, safetyAlerts, reminders } = this.data;

        for (const deviceId of SAMPLE_DEVICE_IDS) {
            const profile = DEVICE_PROFILES[deviceId];
            console.log(`[SampleDataService] Adding data for device ${deviceId}`);

            await healthData.create({ ...profile.health, patientId: deviceId, timestamp: subHours(now, 2) });
            await safetyAlerts.create({ ...profile.safety, patientId: deviceId, timestamp: subHours(now, 3) });
            await reminders.create({
                ...profile.reminder,
                patientId: deviceId,
                timestamp: now,
                scheduledTime: addHours(now, 3)
            });
        }

        const count = SAMPLE_DEVICE_IDS.length;
        return { health: count, safety: count, reminders: count };
    }
}
