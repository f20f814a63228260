import { formatTimestamp, type AgentName, type SafetyAlert, type Severity } from '@carewatch/shared';
import { CareAgent, pluralize, type AgentAnalysis, type AgentFinding } from './CareAgent.js';

export const SAFETY_ALL_CLEAR = 'Safety check completed. No fall events detected in the last 24 hours.';

export const CRITICAL_INACTIVITY_SECONDS = 60;

const IMPACT_SEVERITY: Record<string, Severity> = {
    high: 'critical',
    medium: 'warning',
    moderate: 'warning',
    low: 'warning',
};

// A detected fall is never graded below warning
const FALL_SEVERITIES: Severity[] = ['warning', 'critical'];

export function fallSeverity(alert: Pick<SafetyAlert, 'severity' | 'impactForceLevel' | 'postFallInactivity'>): Severity {
    if ((alert.postFallInactivity ?? 0) >= CRITICAL_INACTIVITY_SECONDS) {
        return 'critical';
    }

    const stored = FALL_SEVERITIES.find(severity => severity === alert.severity?.toLowerCase());
    if (stored) return stored;

    const impact = alert.impactForceLevel?.toLowerCase();
    return (impact && IMPACT_SEVERITY[impact]) || 'warning';
}

export class SafetyMonitoringAgent extends CareAgent {
    readonly name: AgentName = 'safety';
    readonly label = 'Safety';
    protected readonly persona =
        'You are a safety monitoring assistant for an elder-care team. ' +
        'You review fall-detection and movement alerts from wearables and tell caregivers ' +
        'which residents need a check-in and how urgently.';

    protected async analyze(devices: string[]): Promise<AgentAnalysis> {
        const { safetyAlerts, eventLog } = this.deps.data;
        const findings: AgentFinding[] = [];

        for (const deviceId of devices) {
            const unresolved = await safetyAlerts.findUnresolvedByDevice(deviceId);

            for (const alert of unresolved) {
                const at = formatTimestamp(alert.timestamp);
                const location = alert.location ?? 'unknown location';

                if (alert.fallDetected) {
                    const severity = fallSeverity(alert);
                    const inactivity = alert.postFallInactivity ?? 0;
                    const detail = `Fall detected in ${location} at ${at}` +
                        (alert.impactForceLevel ? `, ${alert.impactForceLevel.toLowerCase()} impact` : '') +
                        (inactivity > 0 ? `, ${inactivity}s without movement afterwards` : '');

                    findings.push({ deviceId, kind: 'fall', severity, detail, recordId: alert.id });
                    await eventLog.logEvent(this.source, 'fall_detected', `Device ${deviceId}: ${detail}`, severity);
                } else if (alert.movementActivity?.toLowerCase() === 'no movement') {
                    const detail = `No movement reported in ${location} at ${at}`;
                    findings.push({ deviceId, kind: 'prolonged_inactivity', severity: 'warning', detail, recordId: alert.id });
                    await eventLog.logEvent(this.source, 'prolonged_inactivity', `Device ${deviceId}: ${detail}`, 'warning');
                }
            }
        }

        if (findings.length === 0) {
            return { findings, summary: SAFETY_ALL_CLEAR };
        }

        const falls = findings.filter(f => f.kind === 'fall').length;
        const inactive = findings.length - falls;
        const summary = `Safety check completed. ${pluralize(falls, 'unresolved fall')} and ` +
            `${pluralize(inactive, 'inactivity alert')} need caregiver review.`;

        return { findings, summary };
    }
}
