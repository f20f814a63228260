import { Annotation } from '@langchain/langgraph';
import type { AgentName, AgentRunType } from '@carewatch/shared';
import type { AgentReport } from '../agents/CareAgent.js';

export const AgentWorkflowState = Annotation.Root({
    agentType: Annotation<AgentRunType>({ reducer: (_, b) => b, default: () => 'all' }),
    deviceId:  Annotation<string | undefined>({ reducer: (_, b) => b, default: () => undefined }),
    query:     Annotation<string | undefined>({ reducer: (_, b) => b, default: () => undefined }),
    startedAt: Annotation<number>({ reducer: (_, b) => b, default: () => Date.now() }),
    pending:   Annotation<AgentName[]>({ reducer: (_, b) => b, default: () => [] }),
    reports:   Annotation<AgentReport[]>({ reducer: (a, b) => a.concat(b), default: () => [] }),
});

export type AgentWorkflowStateType = typeof AgentWorkflowState.State;
