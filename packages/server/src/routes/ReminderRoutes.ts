import { Router, Request, Response } from 'express';
import { toReminderView } from '@carewatch/shared';
import { ReminderInputError, parseAddReminderInput, type ReminderService } from '../services/ReminderService.js';
import { errorMessage, parseId, wantsRedirect } from './params.js';

function remindersPage(deviceId: string | undefined): string {
    return deviceId ? `/reminders?device_id=${encodeURIComponent(deviceId)}` : '/reminders';
}

export function ReminderRouter(reminderService: ReminderService): Router {
    const router = Router();

    router.post('/api/mark_reminder_complete/:id', async (req: Request, res: Response) => {
        const redirect = wantsRedirect(req);
        const id = parseId(req.params.id);

        if (id === null) {
            res.status(404).json({ status: 'error', message: 'Reminder not found' });
            return;
        }

        try {
            const completed = await reminderService.completeReminder(id);
            if (!completed) {
                res.status(404).json({ status: 'error', message: 'Reminder not found' });
                return;
            }

            if (redirect) {
                res.redirect(303, remindersPage(completed.reminder.patientId));
                return;
            }
            res.json({
                status: 'success',
                message: 'Reminder marked as completed',
                reminder: toReminderView(completed.reminder),
                next_reminder: completed.next ? toReminderView(completed.next) : null
            });
        } catch (error) {
            console.error('[ReminderRoutes] Error marking reminder complete:', error);
            if (redirect) {
                res.redirect(303, remindersPage(undefined));
                return;
            }
            res.status(500).json({ status: 'error', message: `Error: ${errorMessage(error)}` });
        }
    });

    router.post('/api/add_reminder', async (req: Request, res: Response) => {
        const redirect = wantsRedirect(req);

        try {
            const input = parseAddReminderInput(req.body);
            const reminder = await reminderService.addReminder(input);

            if (redirect) {
                res.redirect(303, remindersPage(reminder.patientId));
                return;
            }
            res.status(201).json({
                status: 'success',
                message: 'Reminder added successfully',
                reminder: toReminderView(reminder)
            });
        } catch (error) {
            if (error instanceof ReminderInputError) {
                if (redirect) {
                    res.redirect(303, remindersPage(undefined));
                    return;
                }
                res.status(400).json({ status: 'error', message: error.message });
                return;
            }
            console.error('[ReminderRoutes] Error adding reminder:', error);
            if (redirect) {
                res.redirect(303, remindersPage(undefined));
                return;
            }
            res.status(500).json({ status: 'error', message: `Error: ${errorMessage(error)}` });
        }
    });

    return router;
}
