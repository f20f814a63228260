import { Router, Request, Response } from 'express';
import { toSafetyAlertView, type CareDataContext } from '@carewatch/shared';
import { errorMessage, parseId } from './params.js';

export function SafetyRouter(data: CareDataContext): Router {
    const router = Router();

    router.post('/api/resolve_safety_alert/:id', async (req: Request, res: Response) => {
        const id = parseId(req.params.id);
        if (id === null) {
            res.status(404).json({ status: 'error', message: 'Safety alert not found' });
            return;
        }

        try {
            const alert = await data.safetyAlerts.resolve(id, new Date());
            if (!alert) {
                res.status(404).json({ status: 'error', message: 'Safety alert not found' });
                return;
            }

            await data.eventLog.logEvent(
                'ui',
                'safety_alert_resolved',
                `Safety alert ${alert.id} resolved for device ${alert.patientId}`
            );

            res.json({
                status: 'success',
                message: 'Safety alert resolved',
                alert: toSafetyAlertView(alert)
            });
        } catch (error) {
            console.error('[SafetyRoutes] Error resolving safety alert:', error);
            res.status(500).json({ status: 'error', message: `Error: ${errorMessage(error)}` });
        }
    });

    return router;
}
