import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { HumanMessage, SystemMessage, type MessageContent } from '@langchain/core/messages';
import { findKnownDeviceIds, type AgentName, type CareDataContext, type Severity } from '@carewatch/shared';

export interface AgentFinding {
    deviceId: string;
    kind: string;
    severity: Severity;
    detail: string;
    recordId?: number;
}

export interface AgentReport {
    agent: AgentName;
    status: 'ok' | 'attention' | 'error';
    summary: string;
    findings: AgentFinding[];
    devices: string[];
    narrated: boolean;
}

export interface AgentRunContext {
    deviceId?: string;
    query?: string;
    now: Date;
    priorReports: AgentReport[];
}

export interface AgentAnalysis {
    findings: AgentFinding[];
    summary: string;
    narrationContext?: string;
}

export interface AgentDependencies {
    data: CareDataContext;
    chatModel?: BaseChatModel | null;
}

const MAX_FINDINGS_IN_PROMPT = 20;

export abstract class CareAgent {
    abstract readonly name: AgentName;
    abstract readonly label: string;
    protected abstract readonly persona: string;

    constructor(protected readonly deps: AgentDependencies) {}

    get source(): string {
        return `${this.name}_agent`;
    }

    async run(context: AgentRunContext): Promise<AgentReport> {
        const tag = `[${this.label}Agent]`;

        try {
            const devices = context.deviceId
                ? [context.deviceId]
                : await findKnownDeviceIds(this.deps.data);

            console.log(tag, 'Running:', { devices: devices.length, deviceId: context.deviceId });

            const analysis = await this.analyze(devices, context);
            const narrative = this.shouldNarrate(analysis)
                ? await this.narrate(analysis)
                : null;
            const summary = narrative ?? analysis.summary;

            await this.deps.data.eventLog.logEvent(this.source, 'workflow_completed', summary);

            const needsAttention = analysis.findings.some(finding => finding.severity !== 'info');

            console.log(tag, 'Completed:', {
                findings: analysis.findings.length,
                needsAttention,
                narrated: narrative !== null
            });

            return {
                agent: this.name,
                status: needsAttention ? 'attention' : 'ok',
                summary,
                findings: analysis.findings,
                devices,
                narrated: narrative !== null
            };
        } catch (error) {
            console.error(tag, 'Run failed:', error);
            const message = error instanceof Error ? error.message : 'Unknown error';
            await this.deps.data.eventLog.logEvent(this.source, 'agent_error', message, 'error');

            return {
                agent: this.name,
                status: 'error',
                summary: `${this.label} agent failed: ${message}`,
                findings: [],
                devices: context.deviceId ? [context.deviceId] : [],
                narrated: false
            };
        }
    }

    protected abstract analyze(devices: string[], context: AgentRunContext): Promise<AgentAnalysis>;

    protected shouldNarrate(analysis: AgentAnalysis): boolean {
        return analysis.findings.length > 0;
    }

    private async narrate(analysis: AgentAnalysis): Promise<string | null> {
        const chatModel = this.deps.chatModel;
        if (!chatModel) return null;

        const findings = analysis.findings.slice(0, MAX_FINDINGS_IN_PROMPT).map(finding => ({
            device: finding.deviceId,
            kind: finding.kind,
            severity: finding.severity,
            detail: finding.detail
        }));

        const prompt = [
            `Automated summary: ${analysis.summary}`,
            `Findings (${analysis.findings.length} total): ${JSON.stringify(findings)}`,
            analysis.narrationContext ?? '',
            'Write a short update of at most four sentences for the caregiver. Do not invent readings.'
        ].filter(line => line.length > 0).join('\n\n');

        try {
            const response = await chatModel.invoke([
                new SystemMessage(this.persona),
                new HumanMessage(prompt)
            ]);
            const text = messageText(response.content).trim();
            return text.length > 0 ? text : null;
        } catch (error) {
            console.warn(`[${this.label}Agent] Narration failed, using automated summary:`, error);
            return null;
        }
    }
}

export function messageText(content: MessageContent): string {
    if (typeof content === 'string') return content;
    return content
        .map(part => 'text' in part && typeof part.text === 'string' ? part.text : '')
        .join('');
}

export function pluralize(count: number, noun: string): string {
    return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
