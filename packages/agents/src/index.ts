export * from './agents/CareAgent.js';
export * from './agents/CommunicationAgent.js';
export * from './agents/DailyReminderAgent.js';
export * from './agents/HealthMonitoringAgent.js';
export * from './agents/ResearchAgent.js';
export * from './agents/SafetyMonitoringAgent.js';
export * from './agents/thresholds.js';
export * from './graphs/AgentWorkflowGraph.js';
export * from './notifiers/Notifier.js';
export * from './services/AgentService.js';
export * from './services/KnowledgeBase.js';
export * from './states/AgentWorkflowState.js';
export * from './workers/AgentRunWorker.js';
