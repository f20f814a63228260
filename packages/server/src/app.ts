import express, { type Express, type Router } from 'express';
import type { AgentService } from '@carewatch/agents';
import type { AppConfig, CareDataContext, CsvImportService, DeviceInventoryService } from '@carewatch/shared';
import type { AgentRunQueue } from './queues/AgentRunQueue.js';
import { AgentRouter } from './routes/AgentRoutes.js';
import { QUEUE_DASHBOARD_PATH } from './routes/BullBoardRoute.js';
import { DataRouter } from './routes/DataRoutes.js';
import { PageRouter } from './routes/PageRoutes.js';
import { ReminderRouter } from './routes/ReminderRoutes.js';
import { SafetyRouter } from './routes/SafetyRoutes.js';
import { StatusRouter } from './routes/StatusRoute.js';
import { ReminderService } from './services/ReminderService.js';

export interface AppDependencies {
    config: AppConfig;
    data: CareDataContext;
    agentService: AgentService;
    importService: CsvImportService;
    inventory: DeviceInventoryService;
    agentQueue?: AgentRunQueue | null;
    queueDashboard?: Router | null;
}

export function createApp(deps: AppDependencies): Express {
    const { config, data } = deps;
    const app = express();

    app.use(express.urlencoded({ extended: false }));
    app.use(express.json());

    app.use(PageRouter(data, config.defaultDeviceId));
    app.use(AgentRouter(deps.agentService, deps.agentQueue ?? null));
    app.use(ReminderRouter(new ReminderService(data, config.defaultDeviceId)));
    app.use(SafetyRouter(data));
    app.use(DataRouter({
        data,
        importService: deps.importService,
        inventory: deps.inventory,
        defaultDeviceId: config.defaultDeviceId
    }));
    app.use(StatusRouter());

    if (deps.queueDashboard) {
        app.use(QUEUE_DASHBOARD_PATH, deps.queueDashboard);
    }

    return app;
}
