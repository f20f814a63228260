import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DatabaseClient, createDataContext, type CareDataContext } from '@carewatch/shared';
import { HEALTH_ALL_CLEAR } from '../agents/HealthMonitoringAgent.js';
import type { CaregiverMessage, NotificationResult, Notifier } from '../notifiers/Notifier.js';
import { processAgentRunJob } from '../workers/AgentRunWorker.js';
import { AgentService, InvalidAgentTypeError } from './AgentService.js';
import { KnowledgeBase } from './KnowledgeBase.js';

class SilentNotifier implements Notifier {
    readonly channel = 'test';
    readonly sent: CaregiverMessage[] = [];

    async send(message: CaregiverMessage): Promise<NotificationResult> {
        this.sent.push(message);
        return { delivered: true, channel: this.channel };
    }
}

describe('AgentService', () => {
    let client: DatabaseClient;
    let data: CareDataContext;
    let notifier: SilentNotifier;
    let service: AgentService;
    const now = new Date(2025, 3, 1, 9, 0);

    beforeEach(() => {
        client = DatabaseClient.createInMemory();
        data = createDataContext(client.db);
        notifier = new SilentNotifier();
        service = new AgentService({
            data,
            notifier,
            knowledgeBase: new KnowledgeBase([
                { id: 'falls', title: 'After a fall', tags: ['fall'], content: 'Check for injury first.' }
            ])
        });
    });

    afterEach(() => {
        client.close();
        vi.restoreAllMocks();
    });

    it('rejects unknown agent types', async () => {
        await expect(service.runAgent('weather')).rejects.toBeInstanceOf(InvalidAgentTypeError);
        await expect(service.runAgent('weather')).rejects.toThrow('Invalid agent type');
    });

    it('runs a single agent and returns its events', async () => {
        const response = await service.runAgent('health', { deviceId: 'D1000', now });

        expect(response).toMatchObject({
            status: 'success',
            message: 'Health agent completed its task',
            result: HEALTH_ALL_CLEAR
        });
        expect(response.events.map(e => [e.source, e.event_type])).toEqual([
            ['health_agent', 'workflow_completed']
        ]);
    });

    it('runs every agent in order for "all"', async () => {
        await data.people.createCaregiver({ caregiverId: 'C001', name: 'Sam Carer', role: 'Nurse', phone: '+15550000001', patients: 'D1000' });
        await data.safetyAlerts.create({
            patientId: 'D1000',
            timestamp: new Date(2025, 3, 1, 8, 0),
            fallDetected: true,
            impactForceLevel: 'High',
            location: 'Hallway'
        });

        const response = await service.runAgent('all', { deviceId: 'D1000', now });

        if (!('reports' in response)) throw new Error('expected an all-agents response');
        expect(response.message).toBe('All agents completed their tasks');
        expect(response.reports.map(r => r.agent)).toEqual(['health', 'safety', 'reminder', 'communication', 'research']);
        expect(response.results[0]).toBe(`Health: ${HEALTH_ALL_CLEAR}`);
        expect(response.results[1]).toBe('Safety: Safety check completed. 1 unresolved fall and 0 inactivity alerts need caregiver review.');
        expect(response.results[4]).toBe('Research: Research completed for "fall response". Relevant guidance: After a fall.');
        expect(notifier.sent).toHaveLength(1);

        const completed = await data.eventLog.getRecentEvents({ source: 'all_agents' });
        expect(completed.map(e => e.description)).toEqual(['Completed 5 agent runs']);
    });

    it('keeps running the remaining agents after one fails', async () => {
        vi.spyOn(data.safetyAlerts, 'findUnresolvedByDevice').mockRejectedValue(new Error('locked'));

        const response = await service.runAgent('all', { deviceId: 'D1000', now });

        if (!('reports' in response)) throw new Error('expected an all-agents response');
        expect(response.reports.map(r => r.status)).toEqual(['ok', 'error', 'ok', 'error', 'ok']);
        expect(response.results[1]).toBe('Safety: Safety agent failed: locked');
    });
});

describe('processAgentRunJob', () => {
    let client: DatabaseClient;
    let service: AgentService;

    beforeEach(() => {
        client = DatabaseClient.createInMemory();
        service = new AgentService({ data: createDataContext(client.db), notifier: new SilentNotifier(), knowledgeBase: new KnowledgeBase([]) });
    });

    afterEach(() => {
        client.close();
    });

    it('runs the requested agent', async () => {
        const result = await processAgentRunJob(service, { agentType: 'safety', deviceId: 'D1000', trigger: 'api', timestamp: 0 });

        expect(result).toEqual({ success: true, agentType: 'safety', reports: 1, attention: 0 });
    });

    it('counts every report of a sweep', async () => {
        const result = await processAgentRunJob(service, { agentType: 'all', trigger: 'sweep', timestamp: 0 });

        expect(result.reports).toBe(5);
    });
});
