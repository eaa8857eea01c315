import express from 'express';
import { RedactionDetector, formatReport } from '../analysis/redaction_detector';
import { ResponseParser, summarizeParsedResponse } from '../analysis/response_parser';
import { letterSchema } from './schemas';

export function createAnalysisRouter(parser: ResponseParser, detector: RedactionDetector) {
    const router = express.Router();

    router.post('/parse', (req, res, next) => {
        try {
            const { text, jurisdiction } = letterSchema.parse(req.body);
            const parsed = parser.parse(text, jurisdiction);
            res.json({ parsed, summary: summarizeParsedResponse(parsed) });
        } catch (err) {
            next(err);
        }
    });

    router.post('/redactions', (req, res, next) => {
        try {
            const { text, jurisdiction } = letterSchema.parse(req.body);
            const parsed = parser.parse(text, jurisdiction);
            const report = detector.analyze(parsed, jurisdiction);
            res.json({ parsed, report, formatted: formatReport(report) });
        } catch (err) {
            next(err);
        }
    });

    return router;
}
