import { Queue } from 'bullmq';
import {
    AGENT_RUN_QUEUE_NAME,
    redisConnection,
    type AgentRunJobData,
    type AgentRunType
} from '@carewatch/shared';

const DEDUPE_WINDOW_MS = 60_000;

export interface AgentRunJobSink {
    add(name: string, data: AgentRunJobData): Promise<{ id?: string }>;
    close(): Promise<void>;
}

export type EnqueueResult =
    | { status: 'queued'; jobId: string }
    | { status: 'duplicate' };

export function createAgentRunBullQueue(redisUrl: string): Queue<AgentRunJobData> {
    const queue = new Queue<AgentRunJobData>(AGENT_RUN_QUEUE_NAME, {
        connection: redisConnection(redisUrl),
        defaultJobOptions: {
            attempts: 3,
            backoff: {
                type: 'exponential',
                delay: 1000
            },
            removeOnComplete: {
                count: 100
            },
            removeOnFail: {
                count: 50
            }
        }
    });

    queue.on('error', (error) => {
        console.error('[AgentRunQueue] Redis error:', error.message);
    });

    return queue;
}

// Resolves to null when Redis does not answer in time so the server can run without a queue
export async function connectAgentRunQueue(redisUrl: string, timeoutMs = 3000): Promise<Queue<AgentRunJobData> | null> {
    const queue = createAgentRunBullQueue(redisUrl);
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error(`Redis did not respond within ${timeoutMs}ms`)), timeoutMs);
    });

    try {
        await Promise.race([queue.waitUntilReady(), timeout]);
        console.log(`[AgentRunQueue] Connected to ${redisUrl}`);
        return queue;
    } catch (error) {
        console.warn('[AgentRunQueue] Queue unavailable, continuing without background runs:', error instanceof Error ? error.message : error);
        queue.close().catch((closeError: unknown) => {
            console.error('[AgentRunQueue] Error closing unavailable queue:', closeError);
        });
        return null;
    } finally {
        clearTimeout(timer);
    }
}

export class AgentRunQueue {
    private readonly recentRuns = new Set<string>();
    private readonly timers = new Set<NodeJS.Timeout>();

    constructor(private readonly sink: AgentRunJobSink, private readonly dedupeWindowMs = DEDUPE_WINDOW_MS) {}

    async enqueue(agentType: AgentRunType, options: { deviceId?: string; query?: string } = {}): Promise<EnqueueResult> {
        const key = `${agentType}:${options.deviceId ?? '*'}`;

        if (this.recentRuns.has(key)) {
            console.log(`[AgentRunQueue] Already queued ${key}, skipping duplicate`);
            return { status: 'duplicate' };
        }

        this.recentRuns.add(key);

        let jobId: string;
        try {
            const job = await this.sink.add(agentType, {
                agentType,
                deviceId: options.deviceId,
                query: options.query,
                trigger: 'api',
                timestamp: Date.now()
            });
            jobId = job.id ?? key;
        } catch (error) {
            this.recentRuns.delete(key);
            throw error;
        }

        const timer = setTimeout(() => {
            this.recentRuns.delete(key);
            this.timers.delete(timer);
        }, this.dedupeWindowMs);
        timer.unref();
        this.timers.add(timer);

        console.log(`[AgentRunQueue] Queued job ${jobId} for ${key}`);
        return { status: 'queued', jobId };
    }

    async close(): Promise<void> {
        for (const timer of this.timers) {
            clearTimeout(timer);
        }
        this.timers.clear();
        this.recentRuns.clear();
        await this.sink.close();
    }
}
