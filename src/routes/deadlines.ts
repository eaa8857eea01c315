import express from 'express';
import { DeadlineCalculator } from '../tracker/deadlines';
import { fromISODate, toISODate } from '../utils/dates';
import { computeDeadlineSchema } from './schemas';

export function createDeadlineRouter(calculator: DeadlineCalculator) {
    const router = express.Router();

    router.get('/jurisdictions', (req, res, next) => {
        try {
            res.json(calculator.listJurisdictions().map(j => calculator.describe(j)));
        } catch (err) {
            next(err);
        }
    });

    router.get('/:jurisdiction', (req, res, next) => {
        try {
            res.json(calculator.describe(req.params.jurisdiction));
        } catch (err) {
            next(err);
        }
    });

    router.post('/compute', (req, res, next) => {
        try {
            const { jurisdiction, filedDate } = computeDeadlineSchema.parse(req.body);
            const deadline = calculator.computeDeadline(jurisdiction, fromISODate(filedDate));
            const extended = calculator.computeExtension(jurisdiction, deadline);
            res.json({
                jurisdiction,
                filedDate,
                deadline: toISODate(deadline),
                extendedDeadline: extended ? toISODate(extended) : null,
            });
        } catch (err) {
            next(err);
        }
    });

    return router;
}
