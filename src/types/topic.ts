/**
 * Serialized topic context, stored in every checkpoint.
 */
export interface TopicContextSnapshot {
    topic: string;
    keywords: string[];
    domain: string;
    scope: string;
    research_question: string;
    context: string;
    insights: string[];
    findings: string[];
    extracted_data_summary: string | null;
}

/**
 * Kinds of agents that receive a rendered topic context.
 */
export type AgentKind = 'screening' | 'extraction' | 'quality' | 'writing';
