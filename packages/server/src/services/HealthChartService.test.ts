import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DatabaseClient, createDataContext, type CareDataContext } from '@carewatch/shared';
import { prepareHealthChartData } from './HealthChartService.js';

describe('prepareHealthChartData', () => {
    let client: DatabaseClient;
    let data: CareDataContext;

    beforeEach(() => {
        client = DatabaseClient.createInMemory();
        data = createDataContext(client.db);
    });

    afterEach(() => {
        client.close();
    });

    it('returns empty series when there are no readings', () => {
        expect(prepareHealthChartData([])).toEqual({
            heart_rate: { labels: [], values: [] },
            blood_pressure: { labels: [], systolic: [], diastolic: [] },
            glucose_level: { labels: [], values: [] },
            oxygen_saturation: { labels: [], values: [] }
        });
    });

    it('orders points chronologically and skips missing values', async () => {
        await data.healthData.create({
            patientId: 'D1000',
            timestamp: new Date(2025, 0, 22, 8, 0),
            heartRate: 70,
            bloodPressureSystolic: 120,
            bloodPressureDiastolic: 80,
            glucoseLevel: null,
            oxygenSaturation: 97
        });
        await data.healthData.create({
            patientId: 'D1000',
            timestamp: new Date(2025, 0, 22, 9, 30),
            heartRate: null,
            bloodPressureSystolic: null,
            bloodPressureDiastolic: 85,
            glucoseLevel: 110,
            oxygenSaturation: 98
        });

        const newestFirst = await data.healthData.findByDevice('D1000', 'desc');

        expect(prepareHealthChartData(newestFirst)).toEqual({
            heart_rate: { labels: ['2025-01-22 08:00'], values: [70] },
            blood_pressure: {
                labels: ['2025-01-22 08:00', '2025-01-22 09:30'],
                systolic: [120, 0],
                diastolic: [80, 85]
            },
            glucose_level: { labels: ['2025-01-22 09:30'], values: [110] },
            oxygen_saturation: { labels: ['2025-01-22 08:00', '2025-01-22 09:30'], values: [97, 98] }
        });
    });

    it('does not reorder the caller\'s array', async () => {
        await data.healthData.create({ patientId: 'D1000', timestamp: new Date(2025, 0, 1), heartRate: 60 });
        await data.healthData.create({ patientId: 'D1000', timestamp: new Date(2025, 0, 2), heartRate: 61 });
        const newestFirst = await data.healthData.findByDevice('D1000', 'desc');

        prepareHealthChartData(newestFirst);

        expect(newestFirst.map(r => r.heartRate)).toEqual([61, 60]);
    });
});
