import type { AgentName } from '@carewatch/shared';
import type { KnowledgeBase } from '../services/KnowledgeBase.js';
import {
    CareAgent,
    type AgentAnalysis,
    type AgentDependencies,
    type AgentFinding,
    type AgentRunContext
} from './CareAgent.js';

export const DEFAULT_RESEARCH_QUERY = 'daily wellbeing routine for older adults';

const TOPIC_BY_FINDING: Record<string, string> = {
    heart_rate: 'heart rate',
    blood_pressure_systolic: 'high blood pressure',
    blood_pressure_diastolic: 'high blood pressure',
    glucose_level: 'glucose',
    oxygen_saturation: 'oxygen saturation',
    device_flag: 'vital signs',
    fall: 'fall response',
    prolonged_inactivity: 'inactivity no movement',
    missed_reminder: 'missed medication',
};

// Turns the alert kinds raised earlier in the run into a search query
export function deriveResearchQuery(context: Pick<AgentRunContext, 'query' | 'priorReports'>): string {
    const explicit = context.query?.trim();
    if (explicit) return explicit;

    const topics = new Set<string>();
    for (const report of context.priorReports) {
        for (const finding of report.findings) {
            const topic = TOPIC_BY_FINDING[finding.kind];
            if (topic && finding.severity !== 'info') topics.add(topic);
        }
    }

    return topics.size > 0 ? [...topics].join(', ') : DEFAULT_RESEARCH_QUERY;
}

export class ResearchAgent extends CareAgent {
    readonly name: AgentName = 'research';
    readonly label = 'Research';
    protected readonly persona =
        'You are a care research assistant. You answer caregiver questions using only the ' +
        'guidance articles you are given, in plain language, and recommend contacting a clinician when in doubt.';

    private readonly knowledgeBase: KnowledgeBase;

    constructor(deps: AgentDependencies, knowledgeBase: KnowledgeBase) {
        super(deps);
        this.knowledgeBase = knowledgeBase;
    }

    protected async analyze(_devices: string[], context: AgentRunContext): Promise<AgentAnalysis> {
        const query = deriveResearchQuery(context);
        const matches = await this.knowledgeBase.search(query);
        const scope = context.deviceId ?? 'all';

        const findings: AgentFinding[] = matches.map(match => ({
            deviceId: scope,
            kind: 'guidance',
            severity: 'info',
            detail: `${match.article.title} (${match.method} match)`
        }));

        const summary = matches.length > 0
            ? `Research completed for "${query}". Relevant guidance: ${matches.map(m => m.article.title).join('; ')}.`
            : `Research completed for "${query}". No matching care guidance found.`;

        await this.deps.data.eventLog.logEvent(this.source, 'research_completed', summary);

        return {
            findings,
            summary,
            narrationContext: [
                `Caregiver question: ${query}`,
                ...matches.map(match => `${match.article.title}: ${match.article.content}`)
            ].join('\n')
        };
    }
}
