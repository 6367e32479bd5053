import { readFile } from 'fs/promises';
import { z } from 'zod';
import { Signal, SignalSource } from '@briefline/sdk';

const TAG = '[source:file]';

const intentSignalSchema = z.object({
    type: z.string().min(1),
    timestamp: z.coerce.date(),
    user_title: z.string().optional(),
});

export const accountRecordSchema = z.object({
    account_id: z.string().min(1),
    company_name: z.string().min(1),
    industry: z.string().optional(),
    employee_count: z.number().int().nonnegative().optional(),
    revenue: z.string().optional(),
    intent_score: z.number(),
    intent_signals: z.array(intentSignalSchema).default([]),
    processed: z.boolean().default(false),
});

export type AccountRecord = z.infer<typeof accountRecordSchema>;

/** Returns null for records with no observed activity: there is nothing to date the signal by. */
export function toSignal(record: AccountRecord): Signal | null {
    if (record.intent_signals.length === 0) return null;

    const times = record.intent_signals.map((s) => s.timestamp.getTime());
    return {
        accountId: record.account_id,
        intentScore: record.intent_score,
        observedMetrics: record.intent_signals.map((s) => ({
            type: s.type,
            occurredAt: s.timestamp,
            actorTitle: s.user_title,
        })),
        firstSeen: new Date(Math.min(...times)),
        lastSeen: new Date(Math.max(...times)),
        profile: {
            companyName: record.company_name,
            industry: record.industry,
            employeeCount: record.employee_count,
            revenue: record.revenue,
        },
    };
}

function isMissingFile(err: unknown): boolean {
    return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/**
 * Reads an array of account records from a JSON file on every poll.
 * Records flagged `processed` are skipped; invalid records are logged and skipped.
 */
export class JsonFileSignalSource implements SignalSource {
    constructor(private readonly path: string) { }

    async poll(): Promise<Signal[]> {
        let text: string;
        try {
            text = await readFile(this.path, 'utf-8');
        } catch (err) {
            if (isMissingFile(err)) {
                console.warn(`${TAG} ${this.path} not found`);
                return [];
            }
            throw err;
        }

        const parsed: unknown = JSON.parse(text);
        if (!Array.isArray(parsed)) {
            throw new Error(`${this.path} must contain a JSON array of accounts`);
        }

        const signals: Signal[] = [];
        parsed.forEach((entry: unknown, index) => {
            const result = accountRecordSchema.safeParse(entry);
            if (!result.success) {
                console.warn(`${TAG} skipping entry ${index}: ${result.error.issues.map((i) => i.message).join('; ')}`);
                return;
            }
            if (result.data.processed) return;

            const signal = toSignal(result.data);
            if (signal) signals.push(signal);
        });
        return signals;
    }
}
