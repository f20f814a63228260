import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DatabaseClient } from '../clients/DatabaseClient.js';
import { createDataContext, findKnownDeviceIds, type CareDataContext } from '../context.js';
import { monitoredIds } from './PeopleRepository.js';

describe('repositories', () => {
    let client: DatabaseClient;
    let context: CareDataContext;

    beforeEach(() => {
        client = DatabaseClient.createInMemory();
        context = createDataContext(client.db);
    });

    afterEach(() => {
        client.close();
    });

    describe('HealthDataRepository', () => {
        it('lists distinct devices and orders readings by timestamp', async () => {
            await context.healthData.create({ patientId: 'D2000', timestamp: new Date(2025, 0, 2, 8, 0), heartRate: 70 });
            await context.healthData.create({ patientId: 'D1000', timestamp: new Date(2025, 0, 1, 8, 0), heartRate: 80 });
            await context.healthData.create({ patientId: 'D1000', timestamp: new Date(2025, 0, 3, 8, 0), heartRate: 90 });

            expect(await context.healthData.findDistinctDeviceIds()).toEqual(['D1000', 'D2000']);

            const latest = await context.healthData.findLatestByDevice('D1000', 1);
            expect(latest.map(r => r.heartRate)).toEqual([90]);

            const ascending = await context.healthData.findByDevice('D1000', 'asc');
            expect(ascending.map(r => r.heartRate)).toEqual([80, 90]);

            const since = await context.healthData.findByDeviceSince('D1000', new Date(2025, 0, 2));
            expect(since.map(r => r.heartRate)).toEqual([90]);
        });

        it('finds a duplicate by device and exact timestamp', async () => {
            const timestamp = new Date(2025, 0, 22, 20, 42);
            await context.healthData.create({ patientId: 'D1000', timestamp, heartRate: 72 });

            expect(await context.healthData.findByDeviceAndTimestamp('D1000', timestamp)).toBeDefined();
            expect(await context.healthData.findByDeviceAndTimestamp('D1000', new Date(2025, 0, 22, 20, 43))).toBeUndefined();
            expect(await context.healthData.findByDeviceAndTimestamp('D2000', timestamp)).toBeUndefined();
        });

        it('tracks alerts awaiting caregiver notification', async () => {
            const alert = await context.healthData.create({ patientId: 'D1000', alertTriggered: true });
            await context.healthData.create({ patientId: 'D1000', alertTriggered: false });
            await context.healthData.create({ patientId: 'D1000', alertTriggered: true, caregiverNotified: true });

            const pending = await context.healthData.findPendingNotification('D1000');
            expect(pending.map(r => r.id)).toEqual([alert.id]);

            await context.healthData.markCaregiverNotified([alert.id]);
            expect(await context.healthData.findPendingNotification('D1000')).toEqual([]);
        });
    });

    describe('ReminderRepository', () => {
        it('selects due and missed reminders', async () => {
            const due = await context.reminders.create({
                patientId: 'D1000',
                reminderType: 'Medication',
                scheduledTime: new Date(2025, 3, 1, 9, 0)
            });
            await context.reminders.create({
                patientId: 'D1000',
                reminderType: 'Appointment',
                scheduledTime: new Date(2025, 3, 1, 15, 0)
            });
            const missed = await context.reminders.create({
                patientId: 'D1000',
                reminderType: 'Exercise',
                scheduledTime: new Date(2025, 3, 1, 6, 0),
                reminderSent: true
            });

            const dispatchable = await context.reminders.findDueForDispatch('D1000', new Date(2025, 3, 1, 9, 30));
            expect(dispatchable.map(r => r.id)).toEqual([due.id]);

            const overdue = await context.reminders.findMissed('D1000', new Date(2025, 3, 1, 8, 0));
            expect(overdue.map(r => r.id)).toEqual([missed.id]);
        });

        it('completes a reminder and drops it from the upcoming list', async () => {
            const reminder = await context.reminders.create({
                patientId: 'D1000',
                reminderType: 'Medication',
                scheduledTime: new Date(2025, 3, 1, 9, 0)
            });
            const completedAt = new Date(2025, 3, 1, 9, 5);

            const updated = await context.reminders.markCompleted(reminder.id, completedAt);

            expect(updated?.completed).toBe(true);
            expect(updated?.completedTimestamp?.getTime()).toBe(completedAt.getTime());
            expect(await context.reminders.findUpcomingByDevice('D1000', 5)).toEqual([]);
            expect(await context.reminders.markCompleted(9999, completedAt)).toBeUndefined();
        });
    });

    describe('PeopleRepository', () => {
        it('finds caregivers whose monitored list contains the ID', async () => {
            await context.people.createCaregiver({
                caregiverId: 'C001',
                name: 'Test Nurse',
                role: 'Primary Nurse',
                patients: 'P001, D1000'
            });
            await context.people.createCaregiver({
                caregiverId: 'C002',
                name: 'Other Nurse',
                role: 'Night Nurse',
                patients: 'D10000'
            });

            const caregivers = await context.people.findCaregiversFor('D1000');
            expect(caregivers.map(c => c.caregiverId)).toEqual(['C001']);
        });

        it('splits the monitored list and ignores blanks', () => {
            expect(monitoredIds({ patients: 'P001,, D2000 ,' })).toEqual(['P001', 'D2000']);
            expect(monitoredIds({ patients: null })).toEqual([]);
        });
    });

    it('merges device IDs across monitoring tables', async () => {
        await context.healthData.create({ patientId: 'D3000' });
        await context.safetyAlerts.create({ patientId: 'D1000' });
        await context.reminders.create({ patientId: 'D1000', reminderType: 'Medication', scheduledTime: new Date() });

        expect(await findKnownDeviceIds(context)).toEqual(['D1000', 'D3000']);
    });
});
