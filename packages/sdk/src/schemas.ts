import { z } from 'zod';
import { AccountContext, DeliveryRequest, OpportunityBrief, Signal } from './types';

// Dates arrive as ISO strings over gRPC and from JSON sources
const timestamp = z.coerce.date();

export const observedMetricSchema = z.object({
    type: z.string().min(1),
    occurredAt: timestamp,
    actorTitle: z.string().optional(),
});

export const accountProfileSchema = z.object({
    companyName: z.string().min(1),
    industry: z.string().optional(),
    employeeCount: z.number().int().nonnegative().optional(),
    revenue: z.string().optional(),
});

export const signalSchema = z
    .object({
        accountId: z.string().min(1),
        observedMetrics: z.array(observedMetricSchema),
        intentScore: z.number().finite().min(0).max(100),
        firstSeen: timestamp,
        lastSeen: timestamp,
        profile: accountProfileSchema.optional(),
    })
    .refine((s) => s.firstSeen.getTime() <= s.lastSeen.getTime(), {
        message: 'firstSeen must not be after lastSeen',
        path: ['lastSeen'],
    });

export const accountContextSchema = z.object({
    accountId: z.string().min(1),
    intentScore: z.number().finite(),
    profile: accountProfileSchema,
    observedMetrics: z.array(observedMetricSchema),
    firstSeen: timestamp,
    lastSeen: timestamp,
});

export const opportunityBriefSchema = z.object({
    accountId: z.string().min(1),
    companyName: z.string().min(1),
    intentScore: z.number().finite(),
    strategyType: z.string(),
    urgency: z.enum(['URGENT', 'HIGH', 'MEDIUM', 'LOW']),
    summary: z.string(),
    recommendedActions: z.array(z.string()),
    generatedAt: timestamp,
});

export const deliveryRequestSchema = z.object({
    brief: opportunityBriefSchema,
    destination: z.string().min(1),
    idempotencyKey: z.string().min(1),
});

export const deliveryReceiptSchema = z.object({
    deliveryId: z.string().min(1),
    destination: z.string().min(1),
});

export function parseSignal(raw: unknown): Signal {
    return signalSchema.parse(raw);
}

export function parseAccountContext(raw: unknown): AccountContext {
    return accountContextSchema.parse(raw);
}

export function parseOpportunityBrief(raw: unknown): OpportunityBrief {
    return opportunityBriefSchema.parse(raw);
}

export function parseDeliveryRequest(raw: unknown): DeliveryRequest {
    return deliveryRequestSchema.parse(raw);
}
