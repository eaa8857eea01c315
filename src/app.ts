import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';
import { ZodError } from 'zod';

import { RedactionDetector } from './analysis/redaction_detector';
import { ResponseParser } from './analysis/response_parser';
import { Env } from './config/env';
import { createAlertRouter } from './routes/alerts';
import { createAnalysisRouter } from './routes/analysis';
import { createDeadlineRouter } from './routes/deadlines';
import { createRequestRouter } from './routes/requests';
import { LifecycleError, RequestService } from './services/request_service';
import { AlertEngine } from './tracker/alerts';
import { DeadlineCalculator, UnknownJurisdictionError } from './tracker/deadlines';
import { DuplicateReferenceError, RequestStore } from './tracker/request_store';

export interface AppDeps {
    store: RequestStore;
    env: Pick<Env, 'NODE_ENV' | 'CORS_ORIGIN' | 'RATE_LIMIT_MAX'>;
    now?: () => Date;
}

// body-parser rejects malformed or oversized payloads with a 4xx `status`
function clientErrorStatus(err: unknown): number | null {
    if (typeof err !== 'object' || err === null || !('status' in err)) return null;
    const { status } = err;
    return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export function createApp({ store, env, now }: AppDeps) {
    const calculator = new DeadlineCalculator();
    const parser = new ResponseParser();
    const detector = new RedactionDetector();
    const service = new RequestService({ store, calculator, parser, detector, now });
    const alerts = new AlertEngine(store, { now });

    const app = express();

    app.set('trust proxy', 1);

    const limiter = rateLimit({
        windowMs: 15 * 60 * 1000, // 15 minutes
        limit: env.RATE_LIMIT_MAX,
        standardHeaders: 'draft-7',
        legacyHeaders: false,
    });

    // Middleware
    app.use(helmet());
    app.use(express.json({ limit: '1mb' }));
    if (env.NODE_ENV !== 'test') app.use(morgan('dev'));
    app.use(cors({ origin: env.CORS_ORIGIN }));
    app.use(limiter);

    app.get('/health', (req, res) => {
        res.json({
            status: 'ok',
            env: env.NODE_ENV,
            timestamp: new Date().toISOString(),
        });
    });

    app.use('/api/requests', createRequestRouter({ store, service }));
    app.use('/api/alerts', createAlertRouter(alerts));
    app.use('/api/analysis', createAnalysisRouter(parser, detector));
    app.use('/api/deadlines', createDeadlineRouter(calculator));

    // Error Handling
    app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
        if (res.headersSent) return next(err);

        if (err instanceof ZodError) {
            return res.status(400).json({ error: 'Validation failed', issues: err.issues });
        }
        if (err instanceof UnknownJurisdictionError) {
            return res.status(400).json({ error: err.message, knownJurisdictions: err.knownJurisdictions });
        }
        if (err instanceof DuplicateReferenceError || err instanceof LifecycleError) {
            return res.status(409).json({ error: err.message });
        }
        const status = clientErrorStatus(err);
        if (status !== null) {
            return res.status(status).json({ error: err instanceof Error ? err.message : 'Bad Request' });
        }

        console.error(err instanceof Error ? err.stack : err);
        res.status(500).json({ error: 'Internal Server Error' });
    });

    return app;
}
