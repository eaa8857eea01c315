import { LifecycleError, RequestService } from '../src/services/request_service';
import { InMemoryRequestStore } from '../src/tracker/memory_store';

const NOW = new Date('2025-03-10T12:00:00Z');

describe('RequestService', () => {
    let store: InMemoryRequestStore;
    let service: RequestService;

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        store = new InMemoryRequestStore({ now: () => NOW });
        service = new RequestService({ store, now: () => NOW });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    const createFederal = () => store.create({ agency: 'USDA APHIS', jurisdiction: 'US-Federal', topic: 'Inspection reports' });

    describe('fileRequest', () => {
        test('sets the filing facts and the statutory deadline', async () => {
            const { id } = await createFederal();
            const filed = await service.fileRequest(id, { filedDate: '2025-01-02', filingMethod: 'email' });

            expect(filed).toMatchObject({
                status: 'FILED',
                filedDate: '2025-01-02',
                deadline: '2025-01-31',
                filingMethod: 'email',
                confirmationNumber: null,
            });
        });

        test('files today when no date is given', async () => {
            const { id } = await createFederal();
            const filed = await service.fileRequest(id);

            expect(filed?.filedDate).toBe('2025-03-10');
            expect(filed?.deadline).toBe('2025-04-07');
        });

        test('returns null for an unknown request', async () => {
            expect(await service.fileRequest(404)).toBeNull();
        });
    });

    describe('invokeExtension', () => {
        test('extends from the current deadline', async () => {
            const { id } = await createFederal();
            await service.fileRequest(id, { filedDate: '2025-01-02' });

            const extended = await service.invokeExtension(id);

            expect(extended).toMatchObject({
                status: 'EXTENDED',
                deadline: '2025-01-31',
                extendedDate: '2025-03-10',
                extendedDeadline: '2025-02-14',
            });
        });

        test('refuses a request without a deadline', async () => {
            const { id } = await createFederal();
            await expect(service.invokeExtension(id)).rejects.toThrow(new LifecycleError(id, `Request #${id} has no deadline to extend`));
        });

        test('refuses jurisdictions without a statutory extension', async () => {
            const { id } = await store.create({ agency: 'Ministry of Fisheries', jurisdiction: 'India', topic: 'Fish farms' });
            await service.fileRequest(id, { filedDate: '2025-02-01' });

            await expect(service.invokeExtension(id)).rejects.toThrow('India grants no statutory extension');
            expect((await store.get(id))?.status).toBe('FILED');
        });
    });

    test('recordAppeal marks the request as appealed', async () => {
        const { id } = await createFederal();
        const appealed = await service.recordAppeal(id, { appealBody: 'USDA FOIA Appeals Officer' });

        expect(appealed).toMatchObject({
            status: 'APPEALED',
            appealFiled: true,
            appealDate: '2025-03-10',
            appealBody: 'USDA FOIA Appeals Officer',
        });
    });

    describe('analyzeResponse', () => {
        test('records the parsed response and notes the outcome', async () => {
            const { id } = await createFederal();
            const text = 'Denied under (b)(4), (b)(5), (b)(6), (b)(7)(C). 0 pages released. 500 pages withheld.';

            const analysis = await service.analyzeResponse(id, text);

            expect(analysis?.parsed.determination).toBe('denial');
            expect(analysis?.report.riskScore).toBe(1);
            expect(analysis?.request).toMatchObject({
                status: 'PARTIAL_RESPONSE',
                pagesReceived: 0,
                pagesWithheld: 500,
                exemptionsCited: '(b)(4), (b)(5), (b)(6), (b)(7)(C)',
                responseSummary: 'Detected 2 high-severity, 4 medium-severity, 2 low-severity issue(s). '
                    + 'Overall risk score: 100%. Appeal recommended.',
                responseDate: '2025-03-10',
                notes: '[2025-03-10 12:00] Response analysed: denial, risk score 100%',
            });
        });

        test('a full release completes the request', async () => {
            const { id } = await createFederal();
            const analysis = await service.analyzeResponse(id, 'Your request is granted in full. 100 pages released.', {
                responseDate: '2025-03-07',
            });

            expect(analysis?.request).toMatchObject({ status: 'COMPLETE', pagesReceived: 100, responseDate: '2025-03-07' });
            expect(analysis?.report.flags).toEqual([]);
        });

        test('returns null for an unknown request', async () => {
            expect(await service.analyzeResponse(7, 'Denied.')).toBeNull();
        });
    });
});
