import { formatTimestamp, type AgentName, type HealthReading, type SafetyAlert } from '@carewatch/shared';
import type { Notifier } from '../notifiers/Notifier.js';
import {
    CareAgent,
    pluralize,
    type AgentAnalysis,
    type AgentDependencies,
    type AgentFinding
} from './CareAgent.js';

export const COMMUNICATION_DEFAULT_SUMMARY = 'Communication task completed. Generated daily summary for caregiver.';

export function buildAlertMessage(deviceId: string, readings: HealthReading[], falls: SafetyAlert[]): string {
    const parts: string[] = [];
    if (readings.length > 0) parts.push(pluralize(readings.length, 'vital-sign alert'));
    if (falls.length > 0) parts.push(pluralize(falls.length, 'unresolved fall'));

    const latestFall = falls[falls.length - 1];
    const latestReading = readings[readings.length - 1];
    const latest = latestFall
        ? `Latest fall: ${latestFall.location ?? 'unknown location'} at ${formatTimestamp(latestFall.timestamp)}.`
        : latestReading
            ? `Latest alert reading at ${formatTimestamp(latestReading.timestamp)}.`
            : '';

    return `CareWatch alert for device ${deviceId}: ${parts.join(', ')}. ${latest}`.trim();
}

export class CommunicationAgent extends CareAgent {
    readonly name: AgentName = 'communication';
    readonly label = 'Communication';
    protected readonly persona =
        'You are the communication coordinator for an elder-care team. ' +
        'You write concise, calm daily summaries for caregivers and family members.';

    private readonly notifier: Notifier;

    constructor(deps: AgentDependencies, notifier: Notifier) {
        super(deps);
        this.notifier = notifier;
    }

    protected async analyze(devices: string[]): Promise<AgentAnalysis> {
        const { healthData, safetyAlerts, reminders, eventLog } = this.deps.data;
        const findings: AgentFinding[] = [];
        const dailySummaries: string[] = [];
        let notifiedCaregivers = 0;

        for (const deviceId of devices) {
            const readings = await healthData.findPendingNotification(deviceId);
            const falls = await safetyAlerts.findPendingNotification(deviceId);

            if (readings.length > 0 || falls.length > 0) {
                notifiedCaregivers += await this.notifyCaregivers(deviceId, readings, falls, findings);
            }

            const pendingReminders = await reminders.countPendingByDevice(deviceId);
            const unresolvedFalls = (await safetyAlerts.findUnresolvedByDevice(deviceId))
                .filter(alert => alert.fallDetected).length;

            const dailySummary = `Daily summary for ${deviceId}: ${pluralize(readings.length, 'new alert reading')}, ` +
                `${pluralize(unresolvedFalls, 'unresolved fall')}, ${pluralize(pendingReminders, 'pending reminder')}.`;
            dailySummaries.push(dailySummary);
            await eventLog.logEvent(this.source, 'daily_summary_generated', dailySummary);
        }

        const summary = notifiedCaregivers > 0
            ? `${COMMUNICATION_DEFAULT_SUMMARY} Sent ${pluralize(notifiedCaregivers, 'caregiver notification')}.`
            : COMMUNICATION_DEFAULT_SUMMARY;

        return { findings, summary, narrationContext: dailySummaries.join('\n') };
    }

    private async notifyCaregivers(
        deviceId: string,
        readings: HealthReading[],
        falls: SafetyAlert[],
        findings: AgentFinding[]
    ): Promise<number> {
        const { healthData, safetyAlerts, people, eventLog } = this.deps.data;
        const caregivers = await people.findCaregiversFor(deviceId);

        if (caregivers.length === 0) {
            const detail = `No caregiver is assigned to device ${deviceId}; ${pluralize(readings.length + falls.length, 'alert')} left unnotified`;
            findings.push({ deviceId, kind: 'no_caregiver', severity: 'warning', detail });
            await eventLog.logEvent(this.source, 'no_caregiver', detail, 'warning');
            return 0;
        }

        const body = buildAlertMessage(deviceId, readings, falls);
        let delivered = 0;

        for (const caregiver of caregivers) {
            if (!caregiver.phone) {
                console.warn('[CommunicationAgent] Caregiver has no phone number:', caregiver.caregiverId);
                continue;
            }

            const result = await this.notifier.send({ caregiverId: caregiver.caregiverId, to: caregiver.phone, body });

            if (result.delivered) {
                delivered++;
                const detail = `Notified ${caregiver.name} (${caregiver.caregiverId}) via ${result.channel}`;
                findings.push({ deviceId, kind: 'caregiver_notified', severity: 'info', detail });
                await eventLog.logEvent(this.source, 'caregiver_notified', `Device ${deviceId}: ${detail}`);
            } else {
                console.error('[CommunicationAgent] Notification failed:', { caregiverId: caregiver.caregiverId, error: result.error });
            }
        }

        if (delivered === 0) {
            const detail = `Could not reach any caregiver for device ${deviceId}`;
            findings.push({ deviceId, kind: 'notification_failed', severity: 'warning', detail });
            await eventLog.logEvent(this.source, 'notification_failed', detail, 'warning');
            return 0;
        }

        await healthData.markCaregiverNotified(readings.map(reading => reading.id));
        await safetyAlerts.markCaregiverNotified(falls.map(alert => alert.id));
        return delivered;
    }
}
