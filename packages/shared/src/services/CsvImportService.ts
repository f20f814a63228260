import { existsSync, readFileSync, statSync } from 'fs';
import { join } from 'path';
import { parse as parseCsv } from 'csv-parse/sync';
import { format, isValid, parse as parseDate } from 'date-fns';
import { z } from 'zod';
import type { CareDataContext } from '../context.js';
import { formatTimestamp } from '../utils/dates.js';
import { SampleDataService } from './SampleDataService.js';

export const CSV_COLUMNS = {
    deviceId: 'Device-ID/User-ID',
    timestamp: 'Timestamp',
    heartRate: 'Heart Rate',
    heartRateAlert: 'Heart Rate Below/Above Threshold (Yes/No)',
    bloodPressure: 'Blood Pressure',
    bloodPressureAlert: 'Blood Pressure Below/Above Threshold (Yes/No)',
    glucose: 'Glucose Levels',
    glucoseAlert: 'Glucose Levels Below/Above Threshold (Yes/No)',
    oxygen: 'Oxygen Saturation (SpO₂%)',
    oxygenAlert: 'SpO₂ Below Threshold (Yes/No)',
    alertTriggered: 'Alert Triggered (Yes/No)',
    caregiverNotified: 'Caregiver Notified (Yes/No)',
    movementActivity: 'Movement Activity',
    fallDetected: 'Fall Detected (Yes/No)',
    impactForce: 'Impact Force Level',
    inactivity: 'Post-Fall Inactivity Duration (Seconds)',
    location: 'Location',
    reminderType: 'Reminder Type',
    scheduledTime: 'Scheduled Time',
    reminderSent: 'Reminder Sent (Yes/No)',
    acknowledged: 'Acknowledged (Yes/No)',
} as const;

export const CSV_FILES = {
    health: 'health_monitoring.csv',
    safety: 'safety_monitoring.csv',
    reminder: 'daily_reminder.csv',
} as const;

export type CsvKind = keyof typeof CSV_FILES;

const DATE_FORMATS = ['M/d/yyyy H:mm', 'yyyy-MM-dd HH:mm:ss', 'yyyy-MM-dd HH:mm', 'd/M/yyyy H:mm'];

const KIND_MARKERS: Record<CsvKind, string[]> = {
    health: ['Heart Rate', 'Blood Pressure', 'Glucose', 'SpO₂'],
    safety: ['Fall Detected', 'Movement Activity', 'Impact Force'],
    reminder: ['Reminder Type', 'Scheduled Time'],
};

const IMPACT_SEVERITY: Record<string, string> = {
    High: 'critical',
    Medium: 'warning',
    Low: 'info',
};

const PROGRESS_EVERY = 100;

const CsvRowsSchema = z.array(z.record(z.string(), z.string()));
const CsvLinesSchema = z.array(z.array(z.string()));

export type CsvRow = Record<string, string>;

export interface ImportCounts {
    health: number;
    safety: number;
    reminders: number;
}

export function parseCsvDate(value: string, fallback: () => Date = () => new Date()): Date {
    const trimmed = value.trim();
    for (const pattern of DATE_FORMATS) {
        const parsed = parseDate(trimmed, pattern, new Date());
        if (isValid(parsed)) return parsed;
    }
    console.warn(`[CsvImport] Could not parse date: ${value}, using current time`);
    return fallback();
}

export function parseBloodPressure(value: string | undefined): { systolic: number; diastolic: number } {
    if (!value || value.trim().length === 0) {
        return { systolic: 0, diastolic: 0 };
    }
    const [systolic = '0', diastolic = '0'] = value.split('/');
    return {
        systolic: toInteger(systolic, CSV_COLUMNS.bloodPressure),
        diastolic: toInteger(diastolic.trim().split(/\s+/)[0] ?? '0', CSV_COLUMNS.bloodPressure),
    };
}

// A blank cell reads as 0, anything else must be a whole number
export function toInteger(value: string | undefined, field: string): number {
    const trimmed = value?.trim() ?? '';
    if (trimmed.length === 0) return 0;
    if (!/^-?\d+$/.test(trimmed)) {
        throw new Error(`Invalid integer for ${field}: ${value}`);
    }
    return parseInt(trimmed, 10);
}

export function yesNo(value: string | undefined): boolean {
    return value?.trim() === 'Yes';
}

export function reminderPriority(reminderType: string | undefined): string {
    if (reminderType === 'Medication') return 'high';
    if (reminderType === 'Appointment') return 'medium';
    return 'low';
}

export function impactSeverity(impact: string | null): string | null {
    return (impact && IMPACT_SEVERITY[impact]) || null;
}

export function validateCsvRow(row: CsvRow): string | null {
    if (row[CSV_COLUMNS.deviceId] === CSV_COLUMNS.deviceId) {
        return 'Skipping repeated header row';
    }
    for (const field of [CSV_COLUMNS.deviceId, CSV_COLUMNS.timestamp]) {
        if (!row[field]) return `Missing required field: ${field}`;
    }
    return null;
}

export function detectCsvType(headers: string[]): CsvKind | 'unknown' {
    for (const kind of ['health', 'safety', 'reminder'] as const) {
        if (KIND_MARKERS[kind].some(marker => headers.some(header => header.includes(marker)))) {
            return kind;
        }
    }
    return 'unknown';
}

// Blank header cells drop their column
export function readCsvRows(path: string): CsvRow[] {
    const rows: unknown = parseCsv(readFileSync(path, 'utf8'), {
        bom: true,
        columns: (header: string[]) => header.map(name => name.trim().length > 0 ? name.trim() : false),
        skip_empty_lines: true,
        relax_column_count: true,
        trim: true,
    });
    return CsvRowsSchema.parse(rows);
}

function readCsvHeaders(path: string): string[] {
    const lines: unknown = parseCsv(readFileSync(path, 'utf8'), { bom: true, to_line: 1, relax_column_count: true });
    return CsvLinesSchema.parse(lines)[0] ?? [];
}

export class CsvImportService {
    private readonly sampleData: SampleDataService;

    constructor(private readonly data: CareDataContext, private readonly dataDir: string) {
        this.sampleData = new SampleDataService(data);
    }

    async importHealthData(path: string): Promise<number> {
        return this.importRows('health', path, async row => {
            const deviceId = row[CSV_COLUMNS.deviceId] ?? '';
            const timestamp = parseCsvDate(row[CSV_COLUMNS.timestamp] ?? '');

            if (await this.data.healthData.findByDeviceAndTimestamp(deviceId, timestamp)) {
                console.log(`[CsvImport] Skipping duplicate health record for device ${deviceId} at ${formatTimestamp(timestamp)}`);
                return false;
            }

            const { systolic, diastolic } = parseBloodPressure(row[CSV_COLUMNS.bloodPressure]);

            await this.data.healthData.create({
                patientId: deviceId,
                timestamp,
                heartRate: toInteger(row[CSV_COLUMNS.heartRate], CSV_COLUMNS.heartRate),
                heartRateAlert: yesNo(row[CSV_COLUMNS.heartRateAlert]),
                bloodPressureSystolic: systolic,
                bloodPressureDiastolic: diastolic,
                bloodPressureAlert: yesNo(row[CSV_COLUMNS.bloodPressureAlert]),
                glucoseLevel: toInteger(row[CSV_COLUMNS.glucose], CSV_COLUMNS.glucose),
                glucoseLevelAlert: yesNo(row[CSV_COLUMNS.glucoseAlert]),
                oxygenSaturation: toInteger(row[CSV_COLUMNS.oxygen], CSV_COLUMNS.oxygen),
                oxygenSaturationAlert: yesNo(row[CSV_COLUMNS.oxygenAlert]),
                alertTriggered: yesNo(row[CSV_COLUMNS.alertTriggered]),
                caregiverNotified: yesNo(row[CSV_COLUMNS.caregiverNotified]),
            });
            return true;
        });
    }

    async importSafetyData(path: string): Promise<number> {
        return this.importRows('safety', path, async row => {
            const deviceId = row[CSV_COLUMNS.deviceId] ?? '';
            const timestamp = parseCsvDate(row[CSV_COLUMNS.timestamp] ?? '');

            if (await this.data.safetyAlerts.findByDeviceAndTimestamp(deviceId, timestamp)) {
                return false;
            }

            const rawImpact = row[CSV_COLUMNS.impactForce] ?? '-';
            const impact = rawImpact === '-' || rawImpact.length === 0 ? null : rawImpact;

            const rawInactivity = row[CSV_COLUMNS.inactivity]?.trim() ?? '';
            const inactivity = /^\d+$/.test(rawInactivity) ? parseInt(rawInactivity, 10) : 0;

            await this.data.safetyAlerts.create({
                patientId: deviceId,
                timestamp,
                movementActivity: row[CSV_COLUMNS.movementActivity] || 'Unknown',
                fallDetected: yesNo(row[CSV_COLUMNS.fallDetected]),
                impactForceLevel: impact,
                postFallInactivity: inactivity,
                location: row[CSV_COLUMNS.location] || 'Unknown',
                alertTriggered: yesNo(row[CSV_COLUMNS.alertTriggered]),
                caregiverNotified: yesNo(row[CSV_COLUMNS.caregiverNotified]),
                severity: impactSeverity(impact),
                resolved: false,
            });
            return true;
        });
    }

    async importReminderData(path: string): Promise<number> {
        return this.importRows('reminder', path, async row => {
            const deviceId = row[CSV_COLUMNS.deviceId] ?? '';
            const timestamp = parseCsvDate(row[CSV_COLUMNS.timestamp] ?? '');
            const scheduledTime = this.scheduledAt(timestamp, row[CSV_COLUMNS.scheduledTime] ?? '');
            const reminderType = row[CSV_COLUMNS.reminderType] || 'Unknown';

            if (await this.data.reminders.findDuplicate(deviceId, scheduledTime, reminderType)) {
                return false;
            }

            await this.data.reminders.create({
                patientId: deviceId,
                timestamp,
                reminderType,
                description: `${row[CSV_COLUMNS.reminderType] || 'General'} reminder`,
                scheduledTime,
                recurrence: null,
                priority: reminderPriority(row[CSV_COLUMNS.reminderType]),
                completed: false,
                reminderSent: yesNo(row[CSV_COLUMNS.reminderSent]),
                acknowledged: yesNo(row[CSV_COLUMNS.acknowledged]),
            });
            return true;
        });
    }

    // Returns 0 instead of throwing so one bad file does not stop the others
    async secureImport(kind: CsvKind, path: string): Promise<number> {
        try {
            if (!existsSync(path)) {
                console.error(`[CsvImport] CSV file not found: ${path}`);
                return 0;
            }
            if (statSync(path).size === 0) {
                console.error(`[CsvImport] CSV file is empty: ${path}`);
                return 0;
            }

            const detected = detectCsvType(readCsvHeaders(path));
            if (detected !== 'unknown' && detected !== kind) {
                console.warn(`[CsvImport] Potential CSV type mismatch. Importing ${kind} data from a file detected as ${detected}.`);
            }

            switch (kind) {
                case 'health':
                    return await this.importHealthData(path);
                case 'safety':
                    return await this.importSafetyData(path);
                case 'reminder':
                    return await this.importReminderData(path);
            }
        } catch (error) {
            console.error(`[CsvImport] Error importing ${path}:`, error);
            return 0;
        }
    }

    async importAll(): Promise<ImportCounts> {
        await this.sampleData.createSamplePatientAndCaregiver();
        await this.sampleData.createAdditionalSampleDevices();

        const health = await this.secureImport('health', join(this.dataDir, CSV_FILES.health));
        const safety = await this.secureImport('safety', join(this.dataDir, CSV_FILES.safety));
        const reminders = await this.secureImport('reminder', join(this.dataDir, CSV_FILES.reminder));

        console.log(`[CsvImport] Import complete. Imported ${health} health records, ${safety} safety records, and ${reminders} reminder records.`);
        return { health, safety, reminders };
    }

    private scheduledAt(timestamp: Date, time: string): Date {
        const datePart = format(timestamp, 'yyyy-MM-dd');
        for (const pattern of ['yyyy-MM-dd HH:mm:ss', 'yyyy-MM-dd HH:mm']) {
            const parsed = parseDate(`${datePart} ${time.trim()}`, pattern, new Date());
            if (isValid(parsed)) return parsed;
        }
        throw new Error(`Invalid scheduled time: ${time}`);
    }

    private async importRows(kind: CsvKind, path: string, importRow: (row: CsvRow) => Promise<boolean>): Promise<number> {
        console.log(`[CsvImport] Importing ${kind} data from ${path}`);
        let count = 0;

        for (const row of readCsvRows(path)) {
            const problem = validateCsvRow(row);
            if (problem) {
                console.warn(`[CsvImport] ${problem}`);
                continue;
            }

            try {
                if (await importRow(row)) {
                    count++;
                    if (count % PROGRESS_EVERY === 0) {
                        console.log(`[CsvImport] Imported ${count} ${kind} records so far`);
                    }
                }
            } catch (error) {
                console.error('[CsvImport] Error importing row:', error);
            }
        }

        console.log(`[CsvImport] Imported ${count} ${kind} records`);
        return count;
    }
}
