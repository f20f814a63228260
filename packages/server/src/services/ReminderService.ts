import { addDays, addMonths, addWeeks, getDate, getDaysInMonth, isValid, parse, setDate } from 'date-fns';
import { z } from 'zod';
import type { CareDataContext, Reminder } from '@carewatch/shared';

export const REMINDER_RECURRENCES = ['daily', 'weekly', 'monthly'] as const;

export type ReminderRecurrence = typeof REMINDER_RECURRENCES[number];

const requiredText = z.string().trim().min(1);

export const AddReminderSchema = z.object({
    reminder_type: requiredText,
    description: requiredText,
    scheduled_date: requiredText,
    scheduled_time: requiredText,
    priority: z.enum(['low', 'medium', 'high']).catch('medium'),
    recurrence: z.enum(REMINDER_RECURRENCES).nullable().catch(null),
    device_id: z.string().trim().optional()
});

export type AddReminderInput = z.infer<typeof AddReminderSchema>;

export class ReminderInputError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ReminderInputError';
    }
}

export function parseAddReminderInput(body: unknown): AddReminderInput {
    const parsed = AddReminderSchema.safeParse(body ?? {});
    if (!parsed.success) {
        throw new ReminderInputError('All fields are required');
    }
    return parsed.data;
}

// Monthly steps keep the series' day of month, clamped to shorter months
export function nextOccurrence(
    scheduledTime: Date,
    recurrence: string | null,
    dayOfMonth: number = getDate(scheduledTime)
): Date | null {
    switch (recurrence) {
        case 'daily':
            return addDays(scheduledTime, 1);
        case 'weekly':
            return addWeeks(scheduledTime, 1);
        case 'monthly': {
            const next = addMonths(scheduledTime, 1);
            return setDate(next, Math.min(dayOfMonth, getDaysInMonth(next)));
        }
        default:
            return null;
    }
}

export interface CompletedReminder {
    reminder: Reminder;
    next: Reminder | null;
}

export class ReminderService {
    constructor(private readonly data: CareDataContext, private readonly defaultDeviceId: string) {}

    async addReminder(input: AddReminderInput, now: Date = new Date()): Promise<Reminder> {
        const scheduledTime = parse(`${input.scheduled_date} ${input.scheduled_time}`, 'yyyy-MM-dd HH:mm', now);
        if (!isValid(scheduledTime)) {
            throw new ReminderInputError(`Invalid scheduled date or time: ${input.scheduled_date} ${input.scheduled_time}`);
        }

        const reminder = await this.data.reminders.create({
            patientId: input.device_id || this.defaultDeviceId,
            timestamp: now,
            reminderType: input.reminder_type,
            description: input.description,
            scheduledTime,
            recurrence: input.recurrence,
            recurrenceDay: input.recurrence === 'monthly' ? getDate(scheduledTime) : null,
            priority: input.priority,
            completed: false
        });

        await this.data.eventLog.logEvent('ui', 'reminder_created', `New reminder created: ${input.description}`);
        return reminder;
    }

    // Completing a recurring reminder books the next one
    async completeReminder(id: number, now: Date = new Date()): Promise<CompletedReminder | null> {
        const existing = await this.data.reminders.findById(id);
        if (!existing) return null;
        if (existing.completed) {
            return { reminder: existing, next: null };
        }

        const reminder = await this.data.reminders.markCompleted(id, now) ?? existing;
        await this.data.eventLog.logEvent('ui', 'reminder_completed', `Reminder completed: ${existing.description ?? existing.reminderType}`);

        const dayOfMonth = existing.recurrenceDay ?? getDate(existing.scheduledTime);
        const nextTime = nextOccurrence(existing.scheduledTime, existing.recurrence, dayOfMonth);
        if (!nextTime) {
            return { reminder, next: null };
        }

        const next = await this.data.reminders.create({
            patientId: existing.patientId,
            timestamp: now,
            reminderType: existing.reminderType,
            description: existing.description,
            scheduledTime: nextTime,
            recurrence: existing.recurrence,
            recurrenceDay: existing.recurrence === 'monthly' ? dayOfMonth : null,
            priority: existing.priority,
            completed: false
        });
        console.log(`[ReminderService] Scheduled next ${existing.recurrence} occurrence of reminder ${id} as ${next.id}`);

        return { reminder, next };
    }
}
