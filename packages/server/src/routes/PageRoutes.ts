import { Router, Request, Response } from 'express';
import {
    toHealthReadingView,
    toReminderView,
    toSafetyAlertView,
    type CareDataContext
} from '@carewatch/shared';
import { prepareHealthChartData } from '../services/HealthChartService.js';
import { deviceIdFrom, errorMessage } from './params.js';

export interface DeviceOption {
    device_id: string;
}

export function deviceOptions(deviceIds: string[], fallback: string): DeviceOption[] {
    return deviceIds.length > 0
        ? deviceIds.map(deviceId => ({ device_id: deviceId }))
        : [{ device_id: fallback }];
}

export function PageRouter(data: CareDataContext, defaultDeviceId: string): Router {
    const router = Router();

    router.get('/', async (req: Request, res: Response) => {
        try {
            const deviceId = deviceIdFrom(req, defaultDeviceId);
            const [deviceIds, healthData, safetyAlerts, reminders, events] = await Promise.all([
                data.healthData.findDistinctDeviceIds(),
                data.healthData.findLatestByDevice(deviceId, 10),
                data.safetyAlerts.findLatestByDevice(deviceId, 5),
                data.reminders.findUpcomingByDevice(deviceId, 5),
                data.eventLog.getLatestEvents(10)
            ]);

            await data.eventLog.logEvent('UI', 'dashboard_access', 'Dashboard accessed');

            res.json({
                device_id: deviceId,
                all_device_ids: deviceOptions(deviceIds, defaultDeviceId),
                health_data: healthData.map(toHealthReadingView),
                safety_alerts: safetyAlerts.map(toSafetyAlertView),
                reminders: reminders.map(toReminderView),
                events
            });
        } catch (error) {
            console.error('[PageRoutes] Error loading dashboard:', error);
            res.status(500).json({ error: `Error loading dashboard: ${errorMessage(error)}` });
        }
    });

    router.get('/health', async (req: Request, res: Response) => {
        try {
            const deviceId = deviceIdFrom(req, defaultDeviceId);
            const [deviceIds, readings] = await Promise.all([
                data.healthData.findDistinctDeviceIds(),
                data.healthData.findByDevice(deviceId, 'desc')
            ]);

            res.json({
                device_id: deviceId,
                all_device_ids: deviceOptions(deviceIds, defaultDeviceId),
                health_data: readings.map(toHealthReadingView),
                charts_data: prepareHealthChartData(readings)
            });
        } catch (error) {
            console.error('[PageRoutes] Error loading health page:', error);
            res.status(500).json({ error: `Error loading health page: ${errorMessage(error)}` });
        }
    });

    router.get('/safety', async (req: Request, res: Response) => {
        try {
            const deviceId = deviceIdFrom(req, defaultDeviceId);
            const [deviceIds, alerts, safetyEvents] = await Promise.all([
                data.safetyAlerts.findDistinctDeviceIds(),
                data.safetyAlerts.findLatestByDevice(deviceId, 20),
                data.eventLog.getEventsBySourcePrefix('safety', 20)
            ]);

            res.json({
                device_id: deviceId,
                all_device_ids: deviceOptions(deviceIds, defaultDeviceId),
                safety_alerts: alerts.map(toSafetyAlertView),
                safety_events: safetyEvents
            });
        } catch (error) {
            console.error('[PageRoutes] Error loading safety page:', error);
            res.status(500).json({ error: `Error loading safety page: ${errorMessage(error)}` });
        }
    });

    router.get('/reminders', async (req: Request, res: Response) => {
        try {
            const deviceId = deviceIdFrom(req, defaultDeviceId);
            const [deviceIds, reminders] = await Promise.all([
                data.reminders.findDistinctDeviceIds(),
                data.reminders.findByDevice(deviceId)
            ]);

            res.json({
                device_id: deviceId,
                all_device_ids: deviceOptions(deviceIds, defaultDeviceId),
                upcoming_reminders: reminders.filter(r => !r.completed).map(toReminderView),
                completed_reminders: reminders.filter(r => r.completed).map(toReminderView)
            });
        } catch (error) {
            console.error('[PageRoutes] Error loading reminders page:', error);
            res.status(500).json({ error: `Error loading reminders page: ${errorMessage(error)}` });
        }
    });

    return router;
}
