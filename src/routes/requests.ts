import express, { Response } from 'express';
import { RequestService } from '../services/request_service';
import { RequestStore } from '../tracker/request_store';
import {
    analyzeResponseSchema,
    appealSchema,
    createRequestSchema,
    extensionSchema,
    filingSchema,
    idParam,
    listQuerySchema,
    noteSchema,
    responseRecordSchema,
    statusChangeSchema,
} from './schemas';

export interface RequestRouterDeps {
    store: RequestStore;
    service: RequestService;
}

function notFound(res: Response, id: number) {
    return res.status(404).json({ error: `Request #${id} not found` });
}

export function createRequestRouter({ store, service }: RequestRouterDeps) {
    const router = express.Router();

    router.get('/', async (req, res, next) => {
        try {
            const filter = listQuerySchema.parse(req.query);
            res.json(await store.list(filter));
        } catch (err) {
            next(err);
        }
    });

    router.get('/overdue', async (req, res, next) => {
        try {
            res.json(await store.listOverdue());
        } catch (err) {
            next(err);
        }
    });

    router.get('/stats', async (req, res, next) => {
        try {
            res.json(await store.stats());
        } catch (err) {
            next(err);
        }
    });

    router.get('/reference/:ref', async (req, res, next) => {
        try {
            const request = await store.getByReference(req.params.ref);
            if (!request) return res.status(404).json({ error: `No request with reference '${req.params.ref}'` });
            res.json(request);
        } catch (err) {
            next(err);
        }
    });

    router.get('/:id', async (req, res, next) => {
        try {
            const id = idParam.parse(req.params.id);
            const request = await store.get(id);
            if (!request) return notFound(res, id);
            res.json(request);
        } catch (err) {
            next(err);
        }
    });

    router.post('/', async (req, res, next) => {
        try {
            const input = createRequestSchema.parse(req.body);
            const request = await store.create(input);
            console.log(`[Store] Created request #${request.id} (${request.jurisdiction}, ${request.agency})`);
            res.status(201).json(request);
        } catch (err) {
            next(err);
        }
    });

    router.delete('/:id', async (req, res, next) => {
        try {
            const id = idParam.parse(req.params.id);
            if (!(await store.delete(id))) return notFound(res, id);
            console.log(`[Store] Deleted request #${id}`);
            res.status(204).end();
        } catch (err) {
            next(err);
        }
    });

    router.patch('/:id/status', async (req, res, next) => {
        try {
            const id = idParam.parse(req.params.id);
            const { status, updates } = statusChangeSchema.parse(req.body);
            const request = await store.updateStatus(id, status, updates);
            if (!request) return notFound(res, id);
            res.json(request);
        } catch (err) {
            next(err);
        }
    });

    router.post('/:id/notes', async (req, res, next) => {
        try {
            const id = idParam.parse(req.params.id);
            const { text } = noteSchema.parse(req.body);
            const request = await store.appendNote(id, text);
            if (!request) return notFound(res, id);
            res.json(request);
        } catch (err) {
            next(err);
        }
    });

    router.post('/:id/response', async (req, res, next) => {
        try {
            const id = idParam.parse(req.params.id);
            const response = responseRecordSchema.parse(req.body);
            const request = await store.recordResponse(id, response);
            if (!request) return notFound(res, id);
            res.json(request);
        } catch (err) {
            next(err);
        }
    });

    // --- Lifecycle ---

    router.post('/:id/file', async (req, res, next) => {
        try {
            const id = idParam.parse(req.params.id);
            const request = await service.fileRequest(id, filingSchema.parse(req.body ?? {}));
            if (!request) return notFound(res, id);
            res.json(request);
        } catch (err) {
            next(err);
        }
    });

    router.post('/:id/extension', async (req, res, next) => {
        try {
            const id = idParam.parse(req.params.id);
            const request = await service.invokeExtension(id, extensionSchema.parse(req.body ?? {}));
            if (!request) return notFound(res, id);
            res.json(request);
        } catch (err) {
            next(err);
        }
    });

    router.post('/:id/appeal', async (req, res, next) => {
        try {
            const id = idParam.parse(req.params.id);
            const request = await service.recordAppeal(id, appealSchema.parse(req.body));
            if (!request) return notFound(res, id);
            res.json(request);
        } catch (err) {
            next(err);
        }
    });

    router.post('/:id/analyze', async (req, res, next) => {
        try {
            const id = idParam.parse(req.params.id);
            const { text, responseDate } = analyzeResponseSchema.parse(req.body);
            const analysis = await service.analyzeResponse(id, text, { responseDate });
            if (!analysis) return notFound(res, id);
            res.json(analysis);
        } catch (err) {
            next(err);
        }
    });

    return router;
}
