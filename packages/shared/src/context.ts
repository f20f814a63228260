import type { CareDatabase } from './clients/DatabaseClient.js';
import { EventRepository } from './repositories/EventRepository.js';
import { HealthDataRepository } from './repositories/HealthDataRepository.js';
import { PeopleRepository } from './repositories/PeopleRepository.js';
import { ReminderRepository } from './repositories/ReminderRepository.js';
import { SafetyAlertRepository } from './repositories/SafetyAlertRepository.js';
import { EventLogService } from './services/EventLogService.js';

export interface CareDataContext {
    healthData: HealthDataRepository;
    safetyAlerts: SafetyAlertRepository;
    reminders: ReminderRepository;
    people: PeopleRepository;
    events: EventRepository;
    eventLog: EventLogService;
}

export function createDataContext(db: CareDatabase): CareDataContext {
    const events = new EventRepository(db);

    return {
        healthData: new HealthDataRepository(db),
        safetyAlerts: new SafetyAlertRepository(db),
        reminders: new ReminderRepository(db),
        people: new PeopleRepository(db),
        events,
        eventLog: new EventLogService(events)
    };
}

export async function findKnownDeviceIds(context: CareDataContext): Promise<string[]> {
    const [health, safety, reminders] = await Promise.all([
        context.healthData.findDistinctDeviceIds(),
        context.safetyAlerts.findDistinctDeviceIds(),
        context.reminders.findDistinctDeviceIds()
    ]);
    return [...new Set([...health, ...safety, ...reminders])].sort();
}
