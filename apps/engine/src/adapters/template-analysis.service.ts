import {
    AccountContext,
    AnalysisService,
    ObservedMetric,
    OpportunityBrief,
    Urgency,
} from '@briefline/sdk';

export type StrategyType =
    | 'enterprise_security'
    | 'saas_growth'
    | 'enterprise_digital_transformation'
    | 'general_enterprise';

const PRIMARY_FOCUS: Record<StrategyType, string> = {
    enterprise_security: 'Compliance & Security Operations',
    saas_growth: 'Scaling & Engineering Efficiency',
    enterprise_digital_transformation: 'Digital Transformation & ROI',
    general_enterprise: 'Operational Excellence',
};

const BASE_ACTIONS = [
    'Schedule discovery call within 24 hours',
    'Send relevant case study and ROI calculator',
    'Prepare industry-specific demo scenario',
];

const STRATEGY_ACTIONS: Partial<Record<StrategyType, string>> = {
    enterprise_security: 'Include compliance gap assessment offer',
    saas_growth: 'Offer 14-day free trial setup',
    enterprise_digital_transformation: 'Schedule executive briefing session',
};

export function titleCase(value: string): string {
    return value
        .replace(/_/g, ' ')
        .split(' ')
        .map((word) => (word ? word[0].toUpperCase() + word.slice(1).toLowerCase() : word))
        .join(' ');
}

export function intentLabel(score: number): string {
    if (score >= 90) return 'VERY HIGH';
    if (score >= 80) return 'HIGH';
    if (score >= 70) return 'MEDIUM-HIGH';
    if (score >= 60) return 'MEDIUM';
    return 'LOW';
}

// "2x Pricing Page Visit, Demo Request", in first-seen order
export function summarizeMetrics(metrics: ObservedMetric[]): string {
    if (metrics.length === 0) return 'No recent activity';

    const counts = new Map<string, number>();
    for (const metric of metrics) {
        const label = titleCase(metric.type || 'unknown');
        counts.set(label, (counts.get(label) ?? 0) + 1);
    }
    return Array.from(counts, ([label, count]) => (count > 1 ? `${count}x ${label}` : label)).join(', ');
}

export function calculateUrgency(metrics: ObservedMetric[]): Urgency {
    if (metrics.length === 0) return 'LOW';

    const pricing = metrics.filter((m) => m.type.includes('pricing')).length;
    const demos = metrics.filter((m) => m.type.includes('demo')).length;

    if (demos > 0 || pricing >= 2) return 'URGENT';
    if (pricing > 0) return 'HIGH';
    return 'MEDIUM';
}

function describeContext(context: AccountContext): string {
    const lines = [
        `Company: ${context.profile.companyName}`,
        `Industry: ${context.profile.industry ?? ''}`,
    ];
    for (const metric of context.observedMetrics) {
        lines.push(`- ${titleCase(metric.type)} by ${metric.actorTitle ?? 'Unknown Role'}`);
    }
    return lines.join('\n');
}

export function determineStrategy(context: AccountContext): StrategyType {
    const industry = (context.profile.industry ?? '').toLowerCase();
    const text = describeContext(context).toLowerCase();

    if (industry.includes('financial') || text.includes('security')) return 'enterprise_security';
    if (industry.includes('saas') || text.includes('startup')) return 'saas_growth';
    if (text.includes('enterprise') || industry.includes('manufacturing')) return 'enterprise_digital_transformation';
    return 'general_enterprise';
}

/**
 * Rule-based brief writer. Same context in, same brief out (apart from
 * `generatedAt`), so retries are harmless.
 */
export class TemplateAnalysisService implements AnalysisService {
    constructor(private readonly clock: () => Date = () => new Date()) { }

    async analyze(context: AccountContext): Promise<OpportunityBrief> {
        const { profile, observedMetrics, intentScore } = context;
        const strategyType = determineStrategy(context);
        const urgency = calculateUrgency(observedMetrics);

        const recommendedActions = [...BASE_ACTIONS];
        const extra = STRATEGY_ACTIONS[strategyType];
        if (extra) recommendedActions.push(extra);

        const profileLines: string[] = [];
        if (profile.industry) profileLines.push(`- Industry: ${profile.industry}`);
        if (profile.employeeCount !== undefined) profileLines.push(`- Size: ${profile.employeeCount} employees`);
        if (profile.revenue) profileLines.push(`- Revenue: ${profile.revenue}`);

        const sections = [
            `*OPPORTUNITY BRIEF: ${profile.companyName}*`,
            [
                '*Intent Analysis*',
                `- Intent Score: ${intentScore}/100 (${intentLabel(intentScore)})`,
                `- Key Signals: ${summarizeMetrics(observedMetrics)}`,
            ].join('\n'),
        ];
        if (profileLines.length > 0) sections.push(['*Company Profile*', ...profileLines].join('\n'));
        sections.push(
            [
                '*Recommended Approach*',
                `- Strategy Type: ${titleCase(strategyType)}`,
                `- Primary Focus: ${PRIMARY_FOCUS[strategyType]}`,
            ].join('\n'),
            `*Urgency Level: ${urgency}*`,
        );

        return {
            accountId: context.accountId,
            companyName: profile.companyName,
            intentScore,
            strategyType,
            urgency,
            summary: sections.join('\n\n'),
            recommendedActions,
            generatedAt: this.clock(),
        };
    }
}
