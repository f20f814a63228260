export const AGENT_RUN_QUEUE_NAME = 'agent-runs' as const;

export const AGENT_NAMES = ['health', 'safety', 'reminder', 'communication', 'research'] as const;

export type AgentName = typeof AGENT_NAMES[number];

export type AgentRunType = AgentName | 'all';

export interface AgentRunJobData {
    agentType: AgentRunType;
    deviceId?: string;
    query?: string;
    trigger: 'api' | 'sweep';
    timestamp: number;
}

export function isAgentRunType(value: string): value is AgentRunType {
    return value === 'all' || AGENT_NAMES.some(name => name === value);
}
