import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { InvalidAgentTypeError, type AgentService } from '@carewatch/agents';
import { isAgentRunType } from '@carewatch/shared';
import type { AgentRunQueue } from '../queues/AgentRunQueue.js';
import { errorMessage } from './params.js';

const RunAgentBodySchema = z.object({
    device_id: z.string().trim().min(1).optional(),
    query: z.string().trim().min(1).optional()
}).catch({});

function runOptions(body: unknown): { deviceId?: string; query?: string } {
    const parsed = RunAgentBodySchema.parse(body ?? {});
    return { deviceId: parsed.device_id, query: parsed.query };
}

export function AgentRouter(agentService: AgentService, agentQueue: AgentRunQueue | null): Router {
    const router = Router();

    router.post('/api/run_agent/:agentType', async (req: Request, res: Response) => {
        const { agentType } = req.params;

        try {
            const response = await agentService.runAgent(agentType, runOptions(req.body));
            res.json(response);
        } catch (error) {
            if (error instanceof InvalidAgentTypeError) {
                res.status(400).json({ error: error.message });
                return;
            }
            console.error(`[AgentRoutes] Error running agent ${agentType}:`, error);
            res.status(500).json({ error: errorMessage(error) });
        }
    });

    router.post('/api/queue_agent/:agentType', async (req: Request, res: Response) => {
        const { agentType } = req.params;

        if (!isAgentRunType(agentType)) {
            res.status(400).json({ error: 'Invalid agent type' });
            return;
        }

        if (!agentQueue) {
            res.status(503).json({ error: 'Agent queue is not available' });
            return;
        }

        try {
            const result = await agentQueue.enqueue(agentType, runOptions(req.body));
            if (result.status === 'duplicate') {
                res.status(200).json({ status: 'duplicate' });
                return;
            }
            res.status(202).json({ status: 'queued', job_id: result.jobId });
        } catch (error) {
            console.error(`[AgentRoutes] Error queueing agent ${agentType}:`, error);
            res.status(500).json({ error: errorMessage(error) });
        }
    });

    return router;
}
