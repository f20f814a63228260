import { findKnownDeviceIds, type CareDataContext } from '../context.js';
import type { HealthReadingView } from '../types/records.js';
import { toHealthReadingView } from '../utils/serializers.js';

export interface DeviceListing {
    patients: { patient_id: string; name: string }[];
    health: string[];
    safety: string[];
    reminders: string[];
    all: string[];
}

export interface DeviceCheck {
    device_id: string;
    health: boolean;
    safety: boolean;
    reminders: boolean;
    first_health_reading: HealthReadingView | null;
}

export interface RecordTotals {
    health_records: number;
    safety_records: number;
    reminder_records: number;
}

export class DeviceInventoryService {
    constructor(private readonly data: CareDataContext) {}

    async listDevices(): Promise<DeviceListing> {
        const [patients, health, safety, reminders, all] = await Promise.all([
            this.data.people.findAllPatients(),
            this.data.healthData.findDistinctDeviceIds(),
            this.data.safetyAlerts.findDistinctDeviceIds(),
            this.data.reminders.findDistinctDeviceIds(),
            findKnownDeviceIds(this.data)
        ]);

        return {
            patients: patients.map(patient => ({ patient_id: patient.patientId, name: patient.name })),
            health,
            safety,
            reminders,
            all
        };
    }

    async checkDevice(deviceId: string): Promise<DeviceCheck> {
        const [health, safety, reminder] = await Promise.all([
            this.data.healthData.findFirstByDevice(deviceId),
            this.data.safetyAlerts.findFirstByDevice(deviceId),
            this.data.reminders.findFirstByDevice(deviceId)
        ]);

        return {
            device_id: deviceId,
            health: health !== undefined,
            safety: safety !== undefined,
            reminders: reminder !== undefined,
            first_health_reading: health ? toHealthReadingView(health) : null
        };
    }

    async summary(): Promise<RecordTotals> {
        const [health, safety, reminders] = await Promise.all([
            this.data.healthData.count(),
            this.data.safetyAlerts.count(),
            this.data.reminders.count()
        ]);
        return { health_records: health, safety_records: safety, reminder_records: reminders };
    }
}

export function describeDeviceCheck(check: DeviceCheck): string[] {
    const found = (value: boolean) => value ? 'Found' : 'Not found';
    const lines = [
        `Device ${check.device_id}`,
        `  Health data: ${found(check.health)}`,
        `  Safety data: ${found(check.safety)}`,
        `  Reminder data: ${found(check.reminders)}`
    ];

    const reading = check.first_health_reading;
    if (reading) {
        lines.push(
            `  Health details: Heart Rate: ${reading.heart_rate}, ` +
            `BP: ${reading.blood_pressure_systolic}/${reading.blood_pressure_diastolic}, ` +
            `Glucose: ${reading.glucose_level}, O2: ${reading.oxygen_saturation}`
        );
    }
    return lines;
}
