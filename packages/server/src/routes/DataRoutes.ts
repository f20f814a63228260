import { Router, Request, Response } from 'express';
import { subDays } from 'date-fns';
import {
    toHealthReadingView,
    type CareDataContext,
    type CsvImportService,
    type DeviceInventoryService
} from '@carewatch/shared';
import { deviceIdFrom, errorMessage, queryString } from './params.js';

function positiveInteger(value: string | undefined, fallback: number): number | null {
    if (value === undefined) return fallback;
    if (!/^\d+$/.test(value)) return null;
    const parsed = parseInt(value, 10);
    return parsed > 0 ? parsed : null;
}

export interface DataRouterOptions {
    data: CareDataContext;
    importService: CsvImportService;
    inventory: DeviceInventoryService;
    defaultDeviceId: string;
}

export function DataRouter({ data, importService, inventory, defaultDeviceId }: DataRouterOptions): Router {
    const router = Router();

    router.get('/api/import_data', async (_req: Request, res: Response) => {
        try {
            const counts = await importService.importAll();
            const message = `Import complete. Imported ${counts.health} health records, ` +
                `${counts.safety} safety records, and ${counts.reminders} reminder records.`;
            console.log(`[DataRoutes] ${message}`);

            res.json({ status: 'success', message });
        } catch (error) {
            console.error('[DataRoutes] Error importing data:', error);
            res.status(500).json({
                status: 'error',
                message: `Error importing data: ${errorMessage(error)}`,
                traceback: error instanceof Error ? error.stack ?? error.message : String(error)
            });
        }
    });

    // The window is measured back from the device's newest reading so historical imports stay visible
    router.get('/api/get_health_data', async (req: Request, res: Response) => {
        const days = positiveInteger(queryString(req, 'days'), 365);
        if (days === null) {
            res.status(400).json({ error: 'days must be a positive integer' });
            return;
        }

        try {
            const deviceId = deviceIdFrom(req, defaultDeviceId);
            const [latest] = await data.healthData.findLatestByDevice(deviceId, 1);
            if (!latest) {
                res.json([]);
                return;
            }

            const readings = await data.healthData.findByDeviceSince(deviceId, subDays(latest.timestamp, days));
            res.json(readings.map(toHealthReadingView));
        } catch (error) {
            console.error('[DataRoutes] Error getting health data:', error);
            res.status(500).json({ error: errorMessage(error) });
        }
    });

    router.get('/api/devices', async (_req: Request, res: Response) => {
        try {
            const [devices, totals] = await Promise.all([inventory.listDevices(), inventory.summary()]);
            res.json({ ...devices, totals });
        } catch (error) {
            console.error('[DataRoutes] Error listing devices:', error);
            res.status(500).json({ error: errorMessage(error) });
        }
    });

    router.get('/api/events', async (req: Request, res: Response) => {
        const hours = positiveInteger(queryString(req, 'hours'), 24);
        if (hours === null) {
            res.status(400).json({ error: 'hours must be a positive integer' });
            return;
        }

        try {
            const events = await data.eventLog.getRecentEvents({
                hours,
                source: queryString(req, 'source'),
                eventType: queryString(req, 'event_type'),
                severity: queryString(req, 'severity')
            });
            res.json(events);
        } catch (error) {
            console.error('[DataRoutes] Error getting events:', error);
            res.status(500).json({ error: errorMessage(error) });
        }
    });

    return router;
}
