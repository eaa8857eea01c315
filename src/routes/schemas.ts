import { z } from 'zod';
import { Jurisdiction, REQUEST_STATUSES, isJurisdiction } from '../types/request_types';
import { normalizeDate } from '../utils/dates';

/** Accepts the common date spellings and emits YYYY-MM-DD. */
export const dateField = z.string().transform((value, ctx) => {
    const normalized = normalizeDate(value);
    if (!normalized) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unrecognized date '${value}'` });
        return z.NEVER;
    }
    return normalized;
});

export const jurisdictionField = z.string().refine(
    (value): value is Jurisdiction => isJurisdiction(value),
    { message: 'Expected US-Federal, US-State-<XX>, India, UK or EU' },
);

export const statusField = z.enum(REQUEST_STATUSES);

const count = z.number().int().nonnegative();
const text = z.string().nullable();
const reference = z.string().min(1).nullable();

export const idParam = z.coerce.number().int().positive();

// notes are deliberately absent: they only grow through the notes endpoint
export const requestUpdateSchema = z.object({
    referenceId: reference.optional(),
    agency: z.string().min(1).optional(),
    agencyKey: text.optional(),
    jurisdiction: jurisdictionField.optional(),
    topic: z.string().min(1).optional(),
    requestText: z.string().optional(),
    filedDate: dateField.nullable().optional(),
    deadline: dateField.nullable().optional(),
    acknowledgedDate: dateField.nullable().optional(),
    extendedDate: dateField.nullable().optional(),
    extendedDeadline: dateField.nullable().optional(),
    responseDate: dateField.nullable().optional(),
    docsReceived: count.optional(),
    pagesReceived: count.optional(),
    pagesWithheld: count.optional(),
    exemptionsCited: text.optional(),
    responseSummary: text.optional(),
    filingMethod: text.optional(),
    confirmationNumber: text.optional(),
    assignedAnalyst: text.optional(),
    feePaid: text.optional(),
    feeWaiverRequested: z.boolean().optional(),
    feeWaiverGranted: z.boolean().nullable().optional(),
    appealFiled: z.boolean().optional(),
    appealDate: dateField.nullable().optional(),
    appealBody: text.optional(),
    appealOutcome: text.optional(),
}).strict();

export const createRequestSchema = requestUpdateSchema.extend({
    agency: z.string().min(1),
    jurisdiction: jurisdictionField,
    topic: z.string().min(1),
    status: statusField.optional(),
});

export const statusChangeSchema = z.object({
    status: statusField,
    updates: requestUpdateSchema.optional(),
});

export const noteSchema = z.object({
    text: z.string().min(1),
});

export const responseRecordSchema = z.object({
    docsReceived: count.optional(),
    pagesReceived: count.optional(),
    pagesWithheld: count.optional(),
    exemptionsCited: z.string().optional(),
    responseSummary: z.string().optional(),
    responseDate: dateField.optional(),
});

export const filingSchema = z.object({
    filedDate: dateField.optional(),
    filingMethod: z.string().optional(),
    confirmationNumber: z.string().optional(),
});

export const extensionSchema = z.object({
    extendedDate: dateField.optional(),
});

export const appealSchema = z.object({
    appealBody: z.string().min(1),
    appealDate: dateField.optional(),
});

export const analyzeResponseSchema = z.object({
    text: z.string().min(1),
    responseDate: dateField.optional(),
});

export const listQuerySchema = z.object({
    jurisdiction: z.string().optional(),
    status: statusField.optional(),
    agency: z.string().optional(),
    limit: z.coerce.number().int().positive().optional(),
    offset: z.coerce.number().int().nonnegative().optional(),
});

export const upcomingQuerySchema = z.object({
    withinDays: z.coerce.number().int().positive().default(7),
});

export const letterSchema = z.object({
    text: z.string().min(1),
    jurisdiction: z.string().default('US-Federal'),
});

export const computeDeadlineSchema = z.object({
    jurisdiction: z.string().min(1),
    filedDate: dateField,
});
