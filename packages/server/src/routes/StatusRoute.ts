import { Router, Request, Response } from 'express';

export function StatusRouter(): Router {
    const router = Router();

    router.get('/status', async (_req: Request, res: Response) => {
        res.status(200).json({
            status: 'healthy',
            service: 'carewatch-server',
            timestamp: new Date().toISOString()
        });
    });

    return router;
}
