import { formatTimestamp, type AgentName } from '@carewatch/shared';
import { CareAgent, pluralize, type AgentAnalysis, type AgentFinding } from './CareAgent.js';
import { evaluateReading } from './thresholds.js';

const READINGS_PER_DEVICE = 10;

export const HEALTH_ALL_CLEAR =
    'Health monitoring completed successfully. Found no critical health concerns in the latest metrics.';

export class HealthMonitoringAgent extends CareAgent {
    readonly name: AgentName = 'health';
    readonly label = 'Health';
    protected readonly persona =
        'You are a health monitoring assistant for an elder-care team. ' +
        'You review wearable vital-sign alerts and explain them plainly for caregivers, ' +
        'flagging anything that needs prompt attention.';

    protected async analyze(devices: string[]): Promise<AgentAnalysis> {
        const { healthData, eventLog } = this.deps.data;
        const findings: AgentFinding[] = [];

        for (const deviceId of devices) {
            const readings = await healthData.findLatestByDevice(deviceId, READINGS_PER_DEVICE);

            for (const reading of readings) {
                const takenAt = formatTimestamp(reading.timestamp);
                const deviations = evaluateReading(reading);

                for (const deviation of deviations) {
                    const detail = `${deviation.label} ${deviation.direction} at ${deviation.value} ${deviation.unit} (${takenAt})`;
                    findings.push({
                        deviceId,
                        kind: deviation.metric,
                        severity: deviation.severity,
                        detail,
                        recordId: reading.id
                    });
                    await eventLog.logEvent(this.source, 'vital_alert', `Device ${deviceId}: ${detail}`, deviation.severity);
                }

                if (deviations.length === 0 && reading.alertTriggered) {
                    const detail = `Device raised an alert with readings inside normal ranges (${takenAt})`;
                    findings.push({ deviceId, kind: 'device_flag', severity: 'warning', detail, recordId: reading.id });
                    await eventLog.logEvent(this.source, 'vital_alert', `Device ${deviceId}: ${detail}`, 'warning');
                }
            }
        }

        if (findings.length === 0) {
            return { findings, summary: HEALTH_ALL_CLEAR };
        }

        const critical = findings.filter(f => f.severity === 'critical').length;
        const affected = new Set(findings.map(f => f.deviceId)).size;
        const summary = `Health monitoring completed. Found ${pluralize(findings.length, 'health concern')} ` +
            `in the latest metrics across ${pluralize(affected, 'device')}` +
            (critical > 0 ? `, ${critical} critical.` : '.');

        return { findings, summary };
    }
}
