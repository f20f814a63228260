import { join } from 'path';
import { tmpdir } from 'os';
import request from 'supertest';
import type { Express } from 'express';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
    AgentService,
    HEALTH_ALL_CLEAR,
    KnowledgeBase,
    type CaregiverMessage,
    type NotificationResult,
    type Notifier
} from '@carewatch/agents';
import {
    CsvImportService,
    DatabaseClient,
    DeviceInventoryService,
    createDataContext,
    loadConfig,
    type AgentRunJobData,
    type CareDataContext
} from '@carewatch/shared';
import { createApp } from './app.js';
import { AgentRunQueue, type AgentRunJobSink } from './queues/AgentRunQueue.js';

class SilentNotifier implements Notifier {
    readonly channel = 'test';

    async send(_message: CaregiverMessage): Promise<NotificationResult> {
        return { delivered: true, channel: this.channel };
    }
}

class MemorySink implements AgentRunJobSink {
    readonly jobs: AgentRunJobData[] = [];

    async add(_name: string, data: AgentRunJobData): Promise<{ id?: string }> {
        this.jobs.push(data);
        return { id: `job-${this.jobs.length}` };
    }

    async close(): Promise<void> {}
}

describe('CareWatch HTTP API', () => {
    let client: DatabaseClient;
    let data: CareDataContext;
    let agentService: AgentService;
    let importService: CsvImportService;
    let sink: MemorySink;
    let agentQueue: AgentRunQueue;
    let app: Express;

    function buildApp(queue: AgentRunQueue | null): Express {
        return createApp({
            config: loadConfig({}),
            data,
            agentService,
            importService,
            inventory: new DeviceInventoryService(data),
            agentQueue: queue
        });
    }

    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);

        client = DatabaseClient.createInMemory();
        data = createDataContext(client.db);
        agentService = new AgentService({ data, notifier: new SilentNotifier(), knowledgeBase: new KnowledgeBase([]) });
        importService = new CsvImportService(data, join(tmpdir(), 'carewatch-no-such-dir'));
        sink = new MemorySink();
        agentQueue = new AgentRunQueue(sink);
        app = buildApp(agentQueue);
    });

    afterEach(async () => {
        await agentQueue.close();
        client.close();
        vi.restoreAllMocks();
    });

    describe('GET /status', () => {
        it('reports the service as healthy', async () => {
            const res = await request(app).get('/status');

            expect(res.status).toBe(200);
            expect(res.body).toMatchObject({ status: 'healthy', service: 'carewatch-server' });
        });
    });

    describe('pages', () => {
        it('falls back to the default device on an empty dashboard and logs the visit', async () => {
            const res = await request(app).get('/');

            expect(res.status).toBe(200);
            expect(res.body).toEqual({
                device_id: 'D1000',
                all_device_ids: [{ device_id: 'D1000' }],
                health_data: [],
                safety_alerts: [],
                reminders: [],
                events: []
            });

            const [event] = await data.eventLog.getLatestEvents(1);
            expect(event).toMatchObject({ source: 'UI', event_type: 'dashboard_access', description: 'Dashboard accessed' });
        });

        it('returns readings newest first with chart series for the health page', async () => {
            await data.healthData.create({ patientId: 'D2000', timestamp: new Date(2025, 0, 20, 8, 0), heartRate: 72 });
            await data.healthData.create({ patientId: 'D2000', timestamp: new Date(2025, 0, 21, 8, 0), heartRate: 75 });

            const res = await request(app).get('/health').query({ device_id: 'D2000' });

            expect(res.status).toBe(200);
            expect(res.body.all_device_ids).toEqual([{ device_id: 'D2000' }]);
            expect(res.body.health_data.map((r: { timestamp: string }) => r.timestamp)).toEqual([
                '2025-01-21 08:00:00',
                '2025-01-20 08:00:00'
            ]);
            expect(res.body.charts_data.heart_rate).toEqual({
                labels: ['2025-01-20 08:00', '2025-01-21 08:00'],
                values: [72, 75]
            });
        });

        it('only lists safety events on the safety page', async () => {
            await data.eventLog.logEvent('safety_agent', 'fall_detected', 'Fall in kitchen', 'critical');
            await data.eventLog.logEvent('health_agent', 'vital_alert', 'Heart rate high', 'warning');

            const res = await request(app).get('/safety');

            expect(res.status).toBe(200);
            expect(res.body.safety_events.map((e: { event_type: string }) => e.event_type)).toEqual(['fall_detected']);
        });

        it('splits upcoming and completed reminders', async () => {
            await data.reminders.create({ patientId: 'D1000', reminderType: 'Medication', description: 'Morning pills', scheduledTime: new Date(2025, 0, 1, 8, 0) });
            await data.reminders.create({ patientId: 'D1000', reminderType: 'Hydration', description: 'Drink water', scheduledTime: new Date(2025, 0, 1, 7, 0), completed: true });

            const res = await request(app).get('/reminders');

            expect(res.body.upcoming_reminders.map((r: { description: string }) => r.description)).toEqual(['Morning pills']);
            expect(res.body.completed_reminders.map((r: { description: string }) => r.description)).toEqual(['Drink water']);
        });

        it('answers 500 with the page name when loading fails', async () => {
            vi.spyOn(data.reminders, 'findByDevice').mockRejectedValue(new Error('database is locked'));

            const res = await request(app).get('/reminders');

            expect(res.status).toBe(500);
            expect(res.body).toEqual({ error: 'Error loading reminders page: database is locked' });
        });
    });

    describe('agent runs', () => {
        it('rejects an unknown agent type', async () => {
            const res = await request(app).post('/api/run_agent/weather');

            expect(res.status).toBe(400);
            expect(res.body).toEqual({ error: 'Invalid agent type' });
        });

        it('runs a single agent for the requested device', async () => {
            const res = await request(app).post('/api/run_agent/health').send({ device_id: 'D1000' });

            expect(res.status).toBe(200);
            expect(res.body).toMatchObject({
                status: 'success',
                message: 'Health agent completed its task',
                result: HEALTH_ALL_CLEAR
            });
        });

        it('answers 500 when the run fails', async () => {
            vi.spyOn(agentService, 'runAgent').mockRejectedValue(new Error('model offline'));

            const res = await request(app).post('/api/run_agent/health');

            expect(res.status).toBe(500);
            expect(res.body).toEqual({ error: 'model offline' });
        });

        it('queues a run and drops an immediate repeat', async () => {
            const first = await request(app).post('/api/queue_agent/safety').send({ device_id: 'D3000' });
            const second = await request(app).post('/api/queue_agent/safety').send({ device_id: 'D3000' });

            expect(first.status).toBe(202);
            expect(first.body).toEqual({ status: 'queued', job_id: 'job-1' });
            expect(second.status).toBe(200);
            expect(second.body).toEqual({ status: 'duplicate' });
            expect(sink.jobs).toHaveLength(1);
        });

        it('answers 503 without a queue', async () => {
            const res = await request(buildApp(null)).post('/api/queue_agent/all');

            expect(res.status).toBe(503);
        });
    });

    describe('reminders', () => {
        const fields = {
            reminder_type: 'Medication',
            description: 'Evening pills',
            scheduled_date: '2025-03-01',
            scheduled_time: '20:00'
        };

        it('requires every field', async () => {
            const res = await request(app).post('/api/add_reminder').send({ reminder_type: 'Medication' });

            expect(res.status).toBe(400);
            expect(res.body).toEqual({ status: 'error', message: 'All fields are required' });
        });

        it('creates a reminder for a JSON client', async () => {
            const res = await request(app).post('/api/add_reminder').send(fields);

            expect(res.status).toBe(201);
            expect(res.body.message).toBe('Reminder added successfully');
            expect(res.body.reminder).toMatchObject({
                device_id: 'D1000',
                scheduled_time: '2025-03-01 20:00:00',
                priority: 'medium',
                recurrence: null
            });
        });

        it('redirects a form post back to the device reminders page', async () => {
            const res = await request(app)
                .post('/api/add_reminder')
                .type('form')
                .set('Accept', 'text/html')
                .send({ ...fields, device_id: 'D2000' });

            expect(res.status).toBe(303);
            expect(res.headers.location).toBe('/reminders?device_id=D2000');
        });

        it('completes a daily reminder and books tomorrow\'s', async () => {
            const reminder = await data.reminders.create({
                patientId: 'D1000',
                reminderType: 'Medication',
                description: 'Morning pills',
                scheduledTime: new Date(2025, 0, 1, 8, 0),
                recurrence: 'daily'
            });

            const res = await request(app).post(`/api/mark_reminder_complete/${reminder.id}`);

            expect(res.status).toBe(200);
            expect(res.body.reminder.completed).toBe(true);
            expect(res.body.next_reminder.scheduled_time).toBe('2025-01-02 08:00:00');
        });

        it('answers 404 for an unknown reminder', async () => {
            const res = await request(app).post('/api/mark_reminder_complete/42');

            expect(res.status).toBe(404);
        });
    });

    describe('safety alerts', () => {
        it('resolves an alert and logs it', async () => {
            const alert = await data.safetyAlerts.create({
                patientId: 'D3000',
                timestamp: new Date(2025, 0, 1, 9, 0),
                fallDetected: true,
                location: 'Bathroom'
            });

            const res = await request(app).post(`/api/resolve_safety_alert/${alert.id}`);

            expect(res.status).toBe(200);
            expect(res.body.alert.resolved).toBe(true);

            const [event] = await data.eventLog.getLatestEvents(1);
            expect(event).toMatchObject({
                source: 'ui',
                event_type: 'safety_alert_resolved',
                description: `Safety alert ${alert.id} resolved for device D3000`
            });
        });

        it('answers 404 for an unknown alert', async () => {
            const res = await request(app).post('/api/resolve_safety_alert/7');

            expect(res.status).toBe(404);
        });
    });

    describe('data endpoints', () => {
        it('imports whatever files are present', async () => {
            const res = await request(app).get('/api/import_data');

            expect(res.status).toBe(200);
            expect(res.body).toEqual({
                status: 'success',
                message: 'Import complete. Imported 0 health records, 0 safety records, and 0 reminder records.'
            });
        });

        it('returns the error and stack when the import fails', async () => {
            vi.spyOn(importService, 'importAll').mockRejectedValue(new Error('disk full'));

            const res = await request(app).get('/api/import_data');

            expect(res.status).toBe(500);
            expect(res.body.status).toBe('error');
            expect(res.body.message).toBe('Error importing data: disk full');
            expect(res.body.traceback).toContain('Error: disk full');
        });

        it('measures the days window from the newest reading', async () => {
            await data.healthData.create({ patientId: 'D1000', timestamp: new Date(2025, 0, 10, 8, 0), heartRate: 70 });
            await data.healthData.create({ patientId: 'D1000', timestamp: new Date(2025, 0, 20, 8, 0), heartRate: 71 });
            await data.healthData.create({ patientId: 'D1000', timestamp: new Date(2025, 0, 22, 8, 0), heartRate: 72 });

            const res = await request(app).get('/api/get_health_data').query({ device_id: 'D1000', days: '5' });

            expect(res.status).toBe(200);
            expect(res.body.map((r: { heart_rate: number }) => r.heart_rate)).toEqual([71, 72]);
        });

        it('returns an empty list for a device without readings', async () => {
            const res = await request(app).get('/api/get_health_data').query({ device_id: 'D9999' });

            expect(res.body).toEqual([]);
        });

        it('rejects a days value that is not a positive integer', async () => {
            expect((await request(app).get('/api/get_health_data').query({ days: '0' })).status).toBe(400);
            expect((await request(app).get('/api/get_health_data').query({ days: 'week' })).status).toBe(400);
        });

        it('lists devices with record totals', async () => {
            await data.healthData.create({ patientId: 'D1000', timestamp: new Date(2025, 0, 10, 8, 0) });
            await data.reminders.create({ patientId: 'D2000', reminderType: 'Exercise', scheduledTime: new Date(2025, 0, 10, 8, 0) });

            const res = await request(app).get('/api/devices');

            expect(res.body).toEqual({
                patients: [],
                health: ['D1000'],
                safety: [],
                reminders: ['D2000'],
                all: ['D1000', 'D2000'],
                totals: { health_records: 1, safety_records: 0, reminder_records: 1 }
            });
        });

        it('filters recent events', async () => {
            await data.eventLog.logEvent('safety_agent', 'fall_detected', 'Fall in kitchen', 'critical');
            await data.eventLog.logEvent('health_agent', 'vital_alert', 'Heart rate high', 'warning');

            const res = await request(app).get('/api/events').query({ severity: 'critical' });

            expect(res.status).toBe(200);
            expect(res.body.map((e: { source: string }) => e.source)).toEqual(['safety_agent']);
        });
    });
});
