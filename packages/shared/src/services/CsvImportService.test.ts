import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DatabaseClient } from '../clients/DatabaseClient.js';
import { createDataContext, type CareDataContext } from '../context.js';
import { formatTimestamp } from '../utils/dates.js';
import {
    CSV_FILES,
    CsvImportService,
    detectCsvType,
    parseBloodPressure,
    parseCsvDate,
    toInteger
} from './CsvImportService.js';

const HEALTH_HEADER = 'Device-ID/User-ID,Timestamp,Heart Rate,Heart Rate Below/Above Threshold (Yes/No),Blood Pressure,' +
    'Blood Pressure Below/Above Threshold (Yes/No),Glucose Levels,Glucose Levels Below/Above Threshold (Yes/No),' +
    'Oxygen Saturation (SpO₂%),SpO₂ Below Threshold (Yes/No),Alert Triggered (Yes/No),Caregiver Notified (Yes/No),,';

const HEALTH_CSV = [
    HEALTH_HEADER,
    'D1000,1/22/2025 20:42,102,Yes,115/80 mmHg,No,140,No,96,No,Yes,No,,',
    'D1000,1/22/2025 20:42,102,Yes,115/80 mmHg,No,140,No,96,No,Yes,No,,',
    HEALTH_HEADER,
    ',1/23/2025 08:00,70,No,120/80,No,100,No,97,No,No,No,,',
    'D1000,2025-01-23 09:15:00,abc,No,120/80,No,100,No,97,No,No,No,,',
    'D2000,23/1/2025 10:00,65,No,,No,90,No,98,No,No,No,,'
].join('\n');

const SAFETY_CSV = [
    'Device-ID/User-ID,Timestamp,Movement Activity,Fall Detected (Yes/No),Impact Force Level,' +
    'Post-Fall Inactivity Duration (Seconds),Location,Alert Triggered (Yes/No),Caregiver Notified (Yes/No)',
    'D1000,1/22/2025 21:00,No Movement,Yes,High,45,Bathroom,Yes,No',
    'D1000,1/22/2025 22:00,Walking,No,-,-,Kitchen,No,No'
].join('\n');

const REMINDER_CSV = [
    'Device-ID/User-ID,Timestamp,Reminder Type,Scheduled Time,Reminder Sent (Yes/No),Acknowledged (Yes/No)',
    'D1000,1/22/2025 7:00,Medication,08:00:00,Yes,No',
    'D1000,1/22/2025 7:00,Medication,08:00:00,Yes,No',
    'D1000,1/22/2025 7:00,Exercise,17:30,No,No',
    'D1000,1/22/2025 7:00,Hydration,noon,No,No'
].join('\n');

describe('CSV value parsing', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('accepts the export date formats', () => {
        expect(formatTimestamp(parseCsvDate('1/22/2025 20:42'))).toBe('2025-01-22 20:42:00');
        expect(formatTimestamp(parseCsvDate('2025-01-23 09:15:00'))).toBe('2025-01-23 09:15:00');
        expect(formatTimestamp(parseCsvDate('2025-01-23 09:15'))).toBe('2025-01-23 09:15:00');
        expect(formatTimestamp(parseCsvDate('23/1/2025 10:00'))).toBe('2025-01-23 10:00:00');
    });

    it('falls back when no format matches', () => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const fallback = new Date(2000, 0, 1);

        expect(parseCsvDate('yesterday', () => fallback)).toBe(fallback);
    });

    it('splits blood pressure and drops the unit', () => {
        expect(parseBloodPressure('115/80 mmHg')).toEqual({ systolic: 115, diastolic: 80 });
        expect(parseBloodPressure('  ')).toEqual({ systolic: 0, diastolic: 0 });
        expect(parseBloodPressure(undefined)).toEqual({ systolic: 0, diastolic: 0 });
    });

    it('reads blank numbers as zero and rejects fractions', () => {
        expect(toInteger('', 'Heart Rate')).toBe(0);
        expect(toInteger(' 72 ', 'Heart Rate')).toBe(72);
        expect(() => toInteger('72.5', 'Heart Rate')).toThrow('Invalid integer for Heart Rate: 72.5');
    });

    it('detects the file type from its headers', () => {
        expect(detectCsvType(['Device-ID/User-ID', 'Timestamp', 'Heart Rate'])).toBe('health');
        expect(detectCsvType(['Device-ID/User-ID', 'Fall Detected (Yes/No)'])).toBe('safety');
        expect(detectCsvType(['Device-ID/User-ID', 'Scheduled Time'])).toBe('reminder');
        expect(detectCsvType(['Name', 'Email'])).toBe('unknown');
    });
});

describe('CsvImportService', () => {
    let client: DatabaseClient;
    let data: CareDataContext;
    let dataDir: string;
    let importer: CsvImportService;

    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        client = DatabaseClient.createInMemory();
        data = createDataContext(client.db);
        dataDir = mkdtempSync(join(tmpdir(), 'carewatch-csv-'));
        importer = new CsvImportService(data, dataDir);
    });

    afterEach(() => {
        client.close();
        rmSync(dataDir, { recursive: true, force: true });
        vi.restoreAllMocks();
    });

    function writeCsv(name: string, content: string): string {
        const path = join(dataDir, name);
        writeFileSync(path, content, 'utf8');
        return path;
    }

    it('imports health rows and skips duplicates, headers and bad rows', async () => {
        const path = writeCsv(CSV_FILES.health, HEALTH_CSV);

        expect(await importer.importHealthData(path)).toBe(2);

        const [reading] = await data.healthData.findByDevice('D1000');
        expect(reading).toMatchObject({
            heartRate: 102,
            heartRateAlert: true,
            bloodPressureSystolic: 115,
            bloodPressureDiastolic: 80,
            glucoseLevel: 140,
            oxygenSaturation: 96,
            alertTriggered: true,
            caregiverNotified: false
        });
        expect(formatTimestamp(reading.timestamp)).toBe('2025-01-22 20:42:00');

        const [second] = await data.healthData.findByDevice('D2000');
        expect(second).toMatchObject({ heartRate: 65, bloodPressureSystolic: 0, bloodPressureDiastolic: 0 });
    });

    it('maps impact force to severity and treats dashes as empty', async () => {
        const path = writeCsv(CSV_FILES.safety, SAFETY_CSV);

        expect(await importer.importSafetyData(path)).toBe(2);

        const alerts = await data.safetyAlerts.findLatestByDevice('D1000', 10);
        expect(alerts.map(a => [a.location, a.fallDetected, a.impactForceLevel, a.severity, a.postFallInactivity])).toEqual([
            ['Kitchen', false, null, null, 0],
            ['Bathroom', true, 'High', 'critical', 45]
        ]);
    });

    it('schedules reminders on the row date and derives priority', async () => {
        const path = writeCsv(CSV_FILES.reminder, REMINDER_CSV);

        expect(await importer.importReminderData(path)).toBe(2);

        const rows = await data.reminders.findByDevice('D1000');
        expect(rows.map(r => [r.reminderType, r.description, formatTimestamp(r.scheduledTime), r.priority, r.reminderSent]).sort()).toEqual([
            ['Exercise', 'Exercise reminder', '2025-01-22 17:30:00', 'low', false],
            ['Medication', 'Medication reminder', '2025-01-22 08:00:00', 'high', true]
        ]);
    });

    it('returns zero for missing or empty files', async () => {
        const empty = writeCsv('empty.csv', '');

        expect(await importer.secureImport('health', join(dataDir, 'missing.csv'))).toBe(0);
        expect(await importer.secureImport('health', empty)).toBe(0);
    });

    it('warns when a file looks like another kind', async () => {
        const path = writeCsv('mislabelled.csv', SAFETY_CSV);

        await importer.secureImport('reminder', path);

        expect(console.warn).toHaveBeenCalledWith(
            '[CsvImport] Potential CSV type mismatch. Importing reminder data from a file detected as safety.'
        );
    });

    it('seeds the sample people and devices before importing every file', async () => {
        writeCsv(CSV_FILES.health, HEALTH_CSV);
        writeCsv(CSV_FILES.safety, SAFETY_CSV);
        writeCsv(CSV_FILES.reminder, REMINDER_CSV);

        const counts = await importer.importAll();

        expect(counts).toEqual({ health: 2, safety: 2, reminders: 2 });
        expect(await data.people.findPatient('P001')).toBeDefined();
        expect(await data.healthData.findFirstByDevice('D3000')).toBeDefined();
    });
});
