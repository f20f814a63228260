import { addMinutes, subMinutes } from 'date-fns';
import { formatTimestamp, type AgentName, type Severity } from '@carewatch/shared';
import {
    CareAgent,
    pluralize,
    type AgentAnalysis,
    type AgentDependencies,
    type AgentFinding,
    type AgentRunContext
} from './CareAgent.js';

export interface ReminderWindow {
    lookaheadMinutes: number;
    missedAfterMinutes: number;
}

export class DailyReminderAgent extends CareAgent {
    readonly name: AgentName = 'reminder';
    readonly label = 'Reminder';
    protected readonly persona =
        'You are a daily reminder assistant for an elder-care team. ' +
        'You keep track of medication, appointment and routine reminders and point out ' +
        'the ones residents have not acknowledged.';

    private readonly window: ReminderWindow;

    constructor(deps: AgentDependencies, window: ReminderWindow) {
        super(deps);
        this.window = window;
    }

    protected async analyze(devices: string[], context: AgentRunContext): Promise<AgentAnalysis> {
        const { reminders, eventLog } = this.deps.data;
        const dispatchUntil = addMinutes(context.now, this.window.lookaheadMinutes);
        const missedBefore = subMinutes(context.now, this.window.missedAfterMinutes);
        const findings: AgentFinding[] = [];
        let dispatched = 0;

        for (const deviceId of devices) {
            const due = await reminders.findDueForDispatch(deviceId, dispatchUntil);

            for (const reminder of due) {
                const severity: Severity = reminder.priority === 'high' ? 'warning' : 'info';
                const detail = `${reminder.description ?? reminder.reminderType} scheduled for ${formatTimestamp(reminder.scheduledTime)}`;
                findings.push({ deviceId, kind: 'reminder_sent', severity, detail, recordId: reminder.id });
                await eventLog.logEvent(this.source, 'reminder_sent', `Device ${deviceId}: ${detail}`, severity);
            }

            await reminders.markSent(due.map(reminder => reminder.id));
            dispatched += due.length;

            const justSent = new Set(due.map(reminder => reminder.id));
            const missed = await reminders.findMissed(deviceId, missedBefore);
            for (const reminder of missed.filter(r => !justSent.has(r.id))) {
                const detail = `${reminder.description ?? reminder.reminderType} at ${formatTimestamp(reminder.scheduledTime)} was not acknowledged`;
                findings.push({ deviceId, kind: 'missed_reminder', severity: 'warning', detail, recordId: reminder.id });
                await eventLog.logEvent(this.source, 'missed_reminder', `Device ${deviceId}: ${detail}`, 'warning');
            }
        }

        const missedCount = findings.filter(f => f.kind === 'missed_reminder').length;
        const summary = `Reminder check completed. Dispatched ${pluralize(dispatched, 'reminder')}; ` +
            `${pluralize(missedCount, 'reminder')} not acknowledged.`;

        return { findings, summary };
    }

    protected shouldNarrate(analysis: AgentAnalysis): boolean {
        return analysis.findings.some(finding => finding.kind === 'missed_reminder');
    }
}
