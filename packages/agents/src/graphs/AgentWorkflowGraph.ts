import { StateGraph, START, END } from '@langchain/langgraph';
import { AGENT_NAMES, type AgentName, type AgentRunType } from '@carewatch/shared';
import type { AgentReport, CareAgent } from '../agents/CareAgent.js';
import { AgentWorkflowState, type AgentWorkflowStateType } from '../states/AgentWorkflowState.js';

export type AgentRegistry = Record<AgentName, CareAgent>;

export interface WorkflowInput {
    agentType: AgentRunType;
    deviceId?: string;
    query?: string;
    now?: Date;
}

function plan(state: AgentWorkflowStateType): Partial<AgentWorkflowStateType> {
    const pending: AgentName[] = state.agentType === 'all' ? [...AGENT_NAMES] : [state.agentType];
    console.log('[AgentWorkflowGraph] Planned:', pending);
    return { pending };
}

function next(state: AgentWorkflowStateType): AgentName | typeof END {
    return state.pending[0] ?? END;
}

function agentNode(agent: CareAgent) {
    return async (state: AgentWorkflowStateType): Promise<Partial<AgentWorkflowStateType>> => {
        const report = await agent.run({
            deviceId: state.deviceId,
            query: state.query,
            now: new Date(state.startedAt),
            priorReports: state.reports
        });

        return {
            reports: [report],
            pending: state.pending.filter(name => name !== agent.name)
        };
    };
}

function buildWorkflow(agents: AgentRegistry) {
    const targets: (AgentName | typeof END)[] = [...AGENT_NAMES, END];

    const graph = new StateGraph(AgentWorkflowState)
        .addNode('plan', plan)
        .addNode('health', agentNode(agents.health))
        .addNode('safety', agentNode(agents.safety))
        .addNode('reminder', agentNode(agents.reminder))
        .addNode('communication', agentNode(agents.communication))
        .addNode('research', agentNode(agents.research))
        .addEdge(START, 'plan')
        .addConditionalEdges('plan', next, targets);

    for (const name of AGENT_NAMES) {
        graph.addConditionalEdges(name, next, targets);
    }

    return graph.compile();
}

export class AgentWorkflowGraph {
    private readonly compiledGraph: ReturnType<typeof buildWorkflow>;

    constructor(agents: AgentRegistry) {
        this.compiledGraph = buildWorkflow(agents);
        console.log('[AgentWorkflowGraph] Initialized');
    }

    async run(input: WorkflowInput): Promise<AgentReport[]> {
        const result = await this.compiledGraph.invoke({
            agentType: input.agentType,
            deviceId: input.deviceId,
            query: input.query,
            startedAt: (input.now ?? new Date()).getTime()
        });
        return result.reports;
    }
}
