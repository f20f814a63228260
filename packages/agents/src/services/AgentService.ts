import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { EmbeddingsInterface } from '@langchain/core/embeddings';
import {
    LLMClient,
    TwilioClient,
    isAgentRunType,
    type AgentName,
    type AppConfig,
    type CareDataContext,
    type EventView
} from '@carewatch/shared';
import type { AgentReport } from '../agents/CareAgent.js';
import { CommunicationAgent } from '../agents/CommunicationAgent.js';
import { DailyReminderAgent, type ReminderWindow } from '../agents/DailyReminderAgent.js';
import { HealthMonitoringAgent } from '../agents/HealthMonitoringAgent.js';
import { ResearchAgent } from '../agents/ResearchAgent.js';
import { SafetyMonitoringAgent } from '../agents/SafetyMonitoringAgent.js';
import { AgentWorkflowGraph, type AgentRegistry } from '../graphs/AgentWorkflowGraph.js';
import { ConsoleNotifier, SmsNotifier, type Notifier } from '../notifiers/Notifier.js';
import { KnowledgeBase, loadCareArticles } from './KnowledgeBase.js';

export class InvalidAgentTypeError extends Error {
    constructor(readonly agentType: string) {
        super('Invalid agent type');
        this.name = 'InvalidAgentTypeError';
    }
}

export interface RunAgentOptions {
    deviceId?: string;
    query?: string;
    now?: Date;
}

export interface SingleAgentResponse {
    status: 'success';
    message: string;
    result: string;
    report: AgentReport;
    events: EventView[];
}

export interface AllAgentsResponse {
    status: 'success';
    message: string;
    results: string[];
    reports: AgentReport[];
    events: EventView[];
}

export type AgentRunResponse = SingleAgentResponse | AllAgentsResponse;

export interface AgentServiceOptions {
    data: CareDataContext;
    chatModel?: BaseChatModel | null;
    embeddings?: EmbeddingsInterface | null;
    notifier?: Notifier;
    knowledgeBase?: KnowledgeBase;
    reminderWindow?: ReminderWindow;
}

const DEFAULT_REMINDER_WINDOW: ReminderWindow = { lookaheadMinutes: 30, missedAfterMinutes: 60 };

export class AgentService {
    private readonly data: CareDataContext;
    private readonly agents: AgentRegistry;
    private readonly workflow: AgentWorkflowGraph;

    constructor(options: AgentServiceOptions) {
        this.data = options.data;

        const deps = { data: options.data, chatModel: options.chatModel ?? null };
        const knowledgeBase = options.knowledgeBase ?? new KnowledgeBase(loadCareArticles(), options.embeddings);

        this.agents = {
            health: new HealthMonitoringAgent(deps),
            safety: new SafetyMonitoringAgent(deps),
            reminder: new DailyReminderAgent(deps, options.reminderWindow ?? DEFAULT_REMINDER_WINDOW),
            communication: new CommunicationAgent(deps, options.notifier ?? new ConsoleNotifier()),
            research: new ResearchAgent(deps, knowledgeBase)
        };
        this.workflow = new AgentWorkflowGraph(this.agents);
    }

    static fromConfig(config: AppConfig, data: CareDataContext): AgentService {
        const llmClient = config.llm.enabled ? new LLMClient(config.llm) : null;
        const notifier = config.twilio
            ? new SmsNotifier(new TwilioClient(config.twilio))
            : new ConsoleNotifier();

        console.log('[AgentService] Configured:', {
            llm: config.llm.enabled ? config.llm.model : 'disabled',
            notifier: notifier.channel
        });

        return new AgentService({
            data,
            chatModel: llmClient?.returnChatModel() ?? null,
            embeddings: llmClient?.returnEmbeddingModel() ?? null,
            notifier,
            reminderWindow: config.reminders
        });
    }

    label(agent: AgentName): string {
        return this.agents[agent].label;
    }

    async runAgent(agentType: string, options: RunAgentOptions = {}): Promise<AgentRunResponse> {
        if (!isAgentRunType(agentType)) {
            throw new InvalidAgentTypeError(agentType);
        }

        console.log('[AgentService] Running:', { agentType, deviceId: options.deviceId });

        const reports = await this.workflow.run({
            agentType,
            deviceId: options.deviceId,
            query: options.query,
            now: options.now
        });

        if (agentType === 'all') {
            const results = reports.map(report => `${this.label(report.agent)}: ${report.summary}`);
            await this.data.eventLog.logEvent('all_agents', 'workflow_completed', `Completed ${reports.length} agent runs`);

            return {
                status: 'success',
                message: 'All agents completed their tasks',
                results,
                reports,
                events: await this.data.eventLog.getRecentEvents({ hours: 1 })
            };
        }

        const report = reports[0];
        if (!report) {
            throw new Error(`No report produced for ${agentType}`);
        }

        return {
            status: 'success',
            message: `${this.label(agentType)} agent completed its task`,
            result: report.summary,
            report,
            events: await this.data.eventLog.getRecentEvents({ hours: 1, source: `${agentType}_agent` })
        };
    }
}
