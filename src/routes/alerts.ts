import express from 'express';
import { AlertEngine, formatAlertText } from '../tracker/alerts';
import { upcomingQuerySchema } from './schemas';

export function createAlertRouter(engine: AlertEngine) {
    const router = express.Router();

    router.get('/', async (req, res, next) => {
        try {
            res.json(await engine.checkAll());
        } catch (err) {
            next(err);
        }
    });

    router.get('/overdue', async (req, res, next) => {
        try {
            res.json(await engine.checkOverdue());
        } catch (err) {
            next(err);
        }
    });

    router.get('/upcoming', async (req, res, next) => {
        try {
            const { withinDays } = upcomingQuerySchema.parse(req.query);
            res.json(await engine.checkUpcoming(withinDays));
        } catch (err) {
            next(err);
        }
    });

    // Plain text for pasting into email or chat
    router.get('/text', async (req, res, next) => {
        try {
            const alerts = await engine.checkAll();
            const body = alerts.length > 0 ? alerts.map(formatAlertText).join('\n\n') : 'No alerts.';
            res.type('text/plain').send(body);
        } catch (err) {
            next(err);
        }
    });

    return router;
}
