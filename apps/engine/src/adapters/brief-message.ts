import { OpportunityBrief } from '@briefline/sdk';

export interface TextObject {
    type: 'plain_text' | 'mrkdwn';
    text: string;
}

export type MessageBlock =
    | { type: 'header'; text: TextObject }
    | { type: 'section'; text: TextObject }
    | { type: 'section'; fields: TextObject[] };

export interface BriefMessage {
    channel: string;
    text: string;
    blocks: MessageBlock[];
}

// Incoming-webhook message layout: header, brief body, score and urgency
export function formatBriefMessage(brief: OpportunityBrief, destination: string): BriefMessage {
    const actions = brief.recommendedActions.map((action, i) => `${i + 1}. ${action}`).join('\n');
    const body = actions ? `${brief.summary}\n\n*Recommended actions:*\n${actions}` : brief.summary;

    return {
        channel: destination,
        text: `New opportunity: ${brief.companyName} (Intent: ${brief.intentScore}/100)`,
        blocks: [
            { type: 'header', text: { type: 'plain_text', text: `New High-Intent Opportunity: ${brief.companyName}` } },
            { type: 'section', text: { type: 'mrkdwn', text: body } },
            {
                type: 'section',
                fields: [
                    { type: 'mrkdwn', text: `*Intent Score:*\n${brief.intentScore}/100` },
                    { type: 'mrkdwn', text: `*Urgency:*\n${brief.urgency}` },
                ],
            },
        ],
    };
}
