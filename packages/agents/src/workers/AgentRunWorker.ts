import { Queue, Worker, type Job } from 'bullmq';
import {
    AGENT_RUN_QUEUE_NAME,
    isAgentRunType,
    redisConnection,
    type AgentRunJobData
} from '@carewatch/shared';
import type { AgentService } from '../services/AgentService.js';

export const SWEEP_SCHEDULER_ID = 'agent-sweep';

export interface AgentRunJobResult {
    success: boolean;
    agentType: string;
    reports: number;
    attention: number;
}

export async function processAgentRunJob(service: AgentService, data: AgentRunJobData): Promise<AgentRunJobResult> {
    if (!isAgentRunType(data.agentType)) {
        throw new Error(`Invalid agent type in job: ${data.agentType}`);
    }

    const response = await service.runAgent(data.agentType, { deviceId: data.deviceId, query: data.query });
    const reports = 'reports' in response ? response.reports : [response.report];

    return {
        success: true,
        agentType: data.agentType,
        reports: reports.length,
        attention: reports.filter(report => report.status === 'attention').length
    };
}

export class AgentRunWorker {
    private worker: Worker<AgentRunJobData, AgentRunJobResult>;
    private queue: Queue<AgentRunJobData>;

    constructor(private readonly agentService: AgentService, redisUrl: string) {
        const connection = redisConnection(redisUrl);

        this.queue = new Queue<AgentRunJobData>(AGENT_RUN_QUEUE_NAME, { connection });

        this.worker = new Worker<AgentRunJobData, AgentRunJobResult>(
            AGENT_RUN_QUEUE_NAME,
            async (job: Job<AgentRunJobData>) => {
                return await this.processJob(job);
            },
            {
                connection,
                concurrency: 1
            }
        );

        this.worker.on('completed', (job) => {
            console.log(`[AgentRunWorker] Job ${job.id} completed for ${job.data.agentType}`);
        });

        this.worker.on('failed', (job, err) => {
            console.error(`[AgentRunWorker] Job ${job?.id} failed:`, err.message);
            console.error(`[AgentRunWorker] Attempt ${job?.attemptsMade}/${job?.opts.attempts}`);
        });

        this.worker.on('error', (err) => {
            console.error('[AgentRunWorker] Worker error:', err);
        });

        console.log('[AgentRunWorker] Worker initialized and ready');
    }

    // Repeats the full workflow; an interval of 0 removes the schedule
    async scheduleSweep(intervalMinutes: number): Promise<void> {
        if (intervalMinutes <= 0) {
            await this.queue.removeJobScheduler(SWEEP_SCHEDULER_ID);
            console.log('[AgentRunWorker] Monitoring sweep disabled');
            return;
        }

        await this.queue.upsertJobScheduler(
            SWEEP_SCHEDULER_ID,
            { every: intervalMinutes * 60_000 },
            {
                name: 'sweep',
                data: { agentType: 'all', trigger: 'sweep', timestamp: Date.now() }
            }
        );
        console.log(`[AgentRunWorker] Monitoring sweep every ${intervalMinutes} minutes`);
    }

    private async processJob(job: Job<AgentRunJobData>): Promise<AgentRunJobResult> {
        console.log(`[AgentRunWorker] Processing job ${job.id}:`, {
            agentType: job.data.agentType,
            deviceId: job.data.deviceId,
            trigger: job.data.trigger
        });

        try {
            return await processAgentRunJob(this.agentService, job.data);
        } catch (error) {
            console.error(`[AgentRunWorker] Job ${job.id} failed:`, error);
            throw error;
        }
    }

    async close(): Promise<void> {
        console.log('[AgentRunWorker] Closing worker...');
        await this.worker.close();
        await this.queue.close();
    }
}
