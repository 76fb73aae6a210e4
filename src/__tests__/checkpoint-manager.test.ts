import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { CheckpointManager, type ChainPhase, type PhaseSnapshot } from '../orchestration/checkpoint-manager.js';
import { InclusionDecision, type PhasePayload, type TopicContextSnapshot } from '../types/index.js';
import { CheckpointCorruptError, CheckpointNotFoundError } from '../utils/errors.js';
import { makePaper, makeTempDir, removeDir, steppingClock } from './fixtures.js';

const TOPIC = 'Chatbots for medication adherence';

function topicSnapshot(topic: string = TOPIC): TopicContextSnapshot {
    return {
        topic,
        keywords: ['chatbot'],
        domain: 'digital health',
        scope: '',
        research_question: topic,
        context: '',
        insights: [],
        findings: [],
        extracted_data_summary: null,
    };
}

function snapshot(data: PhasePayload, topic: string = TOPIC): PhaseSnapshot {
    return { topicContext: topicSnapshot(topic), data, dependencies: [], prismaCounts: { database_breakdown: {} } };
}

const paper = makePaper({ id: 'doi:10.1000/a', title: 'Chatbot trial', doi: '10.1000/a' });

const searchPayload: PhasePayload = {
    kind: 'search_databases',
    schema_version: 1,
    papers: [paper],
    queries: { openalex: 'chatbot' },
};

const dedupPayload: PhasePayload = {
    kind: 'deduplication',
    schema_version: 1,
    unique_papers: [paper],
    duplicates_removed: 0,
};

const CHAIN: ChainPhase[] = [
    { name: 'build_search_strategy', dependencies: [], checkpoint: false, critical: true },
    { name: 'search_databases', dependencies: ['build_search_strategy'], checkpoint: true, critical: true },
    { name: 'deduplication', dependencies: ['search_databases'], checkpoint: true, critical: true },
];

describe('CheckpointManager', () => {
    let root: string;
    let manager: CheckpointManager;

    beforeEach(() => {
        root = makeTempDir();
        manager = new CheckpointManager(root, steppingClock());
    });

    afterEach(() => {
        removeDir(root);
    });

    describe('createWorkflowId', () => {
        it('should combine the topic slug and a UTC timestamp', () => {
            const id = CheckpointManager.createWorkflowId('LLM Chatbots in Health!', new Date('2026-03-01T09:05:07.123Z'));
            expect(id).toBe('workflow_llm-chatbots-in-health_20260301_090507');
        });

        it('should fall back to "review" when the topic has no usable characters', () => {
            const id = CheckpointManager.createWorkflowId('!!!', new Date('2026-03-01T09:05:07.000Z'));
            expect(id).toBe('workflow_review_20260301_090507');
        });
    });

    describe('save and load', () => {
        it('should write a phase record and read it back', () => {
            const file = manager.savePhase('workflow_a', 'search_databases', snapshot(searchPayload));

            expect(path.basename(file)).toBe('search_databases_state.json');
            const record = manager.loadPhase(file);
            expect(record.phase).toBe('search_databases');
            expect(record.workflow_id).toBe('workflow_a');
            expect(record.timestamp).toBe('2026-03-01T09:00:00.000Z');
            expect(record.data).toEqual(searchPayload);
            expect(record.topic_context.topic).toBe(TOPIC);
        });

        it('should leave no temporary file behind', () => {
            manager.savePhase('workflow_a', 'search_databases', snapshot(searchPayload));
            expect(fs.readdirSync(manager.workflowDir('workflow_a'))).toEqual(['search_databases_state.json']);
        });

        it('should throw CheckpointNotFoundError for a missing file', () => {
            expect(() => manager.loadPhase(path.join(root, 'nope_state.json'))).toThrow(CheckpointNotFoundError);
        });

        it('should throw CheckpointCorruptError for invalid JSON', () => {
            const file = path.join(root, 'broken_state.json');
            fs.writeFileSync(file, '{ not json');
            expect(() => manager.loadPhase(file)).toThrow(CheckpointCorruptError);
        });

        it('should reject records with unknown fields', () => {
            const file = manager.savePhase('workflow_a', 'search_databases', snapshot(searchPayload));
            fs.writeFileSync(file, fs.readFileSync(file, 'utf-8').replace('{', '{"extra": true,'));

            expect(() => manager.loadPhase(file)).toThrow(/Unrecognized key/);
        });

        it('should round-trip screening decisions with their enum tags and null reasons', () => {
            const screening: PhasePayload = {
                kind: 'title_abstract_screening',
                schema_version: 1,
                outcome: {
                    stage: 'title_abstract',
                    results: [
                        {
                            paper_id: 'doi:10.1000/a',
                            stage: 'title_abstract',
                            decision: InclusionDecision.INCLUDE,
                            confidence: 1,
                            reasoning: 'Chatbot trial',
                            exclusion_reason: null,
                            source: 'llm_schema',
                        },
                        {
                            paper_id: 'doi:10.1000/b',
                            stage: 'title_abstract',
                            decision: InclusionDecision.EXCLUDE,
                            confidence: 0,
                            reasoning: 'Automated screening failed',
                            exclusion_reason: 'Not peer reviewed',
                            source: 'fallback',
                        },
                    ],
                    included: ['doi:10.1000/a'],
                    excluded: ['doi:10.1000/b'],
                    uncertain: [],
                },
            };

            const file = manager.savePhase('workflow_a', 'title_abstract_screening', snapshot(screening));
            const record = manager.loadPhase(file);

            expect(record.data).toEqual(screening);
            expect(fs.readFileSync(file, 'utf-8')).toContain('"decision": "include"');
        });

        it('should round-trip extracted data with null and empty fields', () => {
            const extraction: PhasePayload = {
                kind: 'data_extraction',
                schema_version: 1,
                extracted: [
                    {
                        paper_id: 'doi:10.1000/a',
                        title: 'Chatbot trial',
                        objectives: null,
                        methodology: null,
                        study_design: null,
                        participants: null,
                        outcomes: null,
                        key_findings: [],
                        limitations: null,
                        domain_fields: {},
                        status: 'failed',
                    },
                    {
                        paper_id: 'doi:10.1000/b',
                        title: 'Conversational agent cohort',
                        objectives: 'Improve adherence',
                        methodology: 'Cohort',
                        study_design: 'cohort',
                        participants: '80 adults',
                        outcomes: 'Adherence',
                        key_findings: ['Adherence improved'],
                        limitations: null,
                        domain_fields: { setting: 'primary care' },
                        status: 'complete',
                    },
                ],
            };

            const file = manager.savePhase('workflow_a', 'data_extraction', snapshot(extraction));

            expect(manager.loadPhase(file).data).toEqual(extraction);
        });

        it('should round-trip manuscript sections', () => {
            manager.saveSection('workflow_a', 'introduction', 'Intro text', {
                topicContext: topicSnapshot(),
                dependencies: ['data_extraction'],
                prismaCounts: { database_breakdown: {} },
            });

            const sections = manager.loadSections(manager.workflowDir('workflow_a'));
            expect([...sections.entries()]).toEqual([['introduction', 'Intro text']]);
        });
    });

    describe('loadChain', () => {
        it('should keep checkpoints whose dependencies are valid and not newer', () => {
            manager.savePhase('workflow_a', 'search_databases', snapshot(searchPayload));
            manager.savePhase('workflow_a', 'deduplication', snapshot(dedupPayload));

            const chain = manager.loadChain(manager.workflowDir('workflow_a'), CHAIN);
            expect([...chain.keys()]).toEqual(['search_databases', 'deduplication']);
        });

        it('should drop a checkpoint older than its dependency', () => {
            manager.savePhase('workflow_a', 'search_databases', snapshot(searchPayload));
            manager.savePhase('workflow_a', 'deduplication', snapshot(dedupPayload));
            manager.savePhase('workflow_a', 'search_databases', snapshot(searchPayload));

            const chain = manager.loadChain(manager.workflowDir('workflow_a'), CHAIN);
            expect([...chain.keys()]).toEqual(['search_databases']);
        });

        it('should drop a checkpoint whose payload belongs to another phase', () => {
            manager.savePhase('workflow_a', 'search_databases', snapshot(searchPayload));
            manager.savePhase('workflow_a', 'deduplication', snapshot(searchPayload));

            const chain = manager.loadChain(manager.workflowDir('workflow_a'), CHAIN);
            expect([...chain.keys()]).toEqual(['search_databases']);
        });

        it('should treat a corrupt checkpoint as missing', () => {
            manager.savePhase('workflow_a', 'search_databases', snapshot(searchPayload));
            manager.savePhase('workflow_a', 'deduplication', snapshot(dedupPayload));
            fs.writeFileSync(manager.phasePath('workflow_a', 'search_databases'), '');

            const chain = manager.loadChain(manager.workflowDir('workflow_a'), CHAIN);
            expect(chain.size).toBe(0);
        });

        it('should not let a failed non-critical phase invalidate its dependents', () => {
            const phases: ChainPhase[] = [
                { name: 'fulltext_screening', dependencies: [], checkpoint: true, critical: true },
                { name: 'paper_enrichment', dependencies: ['fulltext_screening'], checkpoint: true, critical: false },
                { name: 'data_extraction', dependencies: ['paper_enrichment'], checkpoint: true, critical: true },
            ];
            manager.savePhase('workflow_a', 'fulltext_screening', snapshot({
                kind: 'fulltext_screening',
                schema_version: 1,
                outcome: { stage: 'fulltext', results: [], included: [], excluded: [], uncertain: [] },
                fulltext_missing: [],
            }));
            manager.savePhase('workflow_a', 'data_extraction', snapshot({
                kind: 'data_extraction',
                schema_version: 1,
                extracted: [],
            }));
            const directory = manager.workflowDir('workflow_a');

            expect([...manager.loadChain(directory, phases).keys()]).toEqual(['fulltext_screening', 'data_extraction']);

            fs.writeFileSync(manager.phasePath('workflow_a', 'paper_enrichment'), '{}');
            expect([...manager.loadChain(directory, phases).keys()]).toEqual(['fulltext_screening']);
        });
    });

    describe('findByTopic', () => {
        it('should pick the workflow with the most valid phases', () => {
            manager.savePhase('workflow_a', 'search_databases', snapshot(searchPayload));
            manager.savePhase('workflow_b', 'search_databases', snapshot(searchPayload));
            manager.savePhase('workflow_b', 'deduplication', snapshot(dedupPayload));

            const match = manager.findByTopic(TOPIC, CHAIN);
            expect(match?.workflowId).toBe('workflow_b');
            expect(match?.validPhases).toBe(2);
        });

        it('should compare topics trimmed and case-insensitively', () => {
            manager.savePhase('workflow_a', 'search_databases', snapshot(searchPayload));

            expect(manager.findByTopic('  chatbots FOR medication adherence ', CHAIN)?.workflowId).toBe('workflow_a');
        });

        it('should ignore workflows for other topics', () => {
            manager.savePhase('workflow_a', 'search_databases', snapshot(searchPayload, 'Another topic'));

            expect(manager.findByTopic(TOPIC, CHAIN)).toBeNull();
        });

        it('should prefer the most recently written workflow on a tie', () => {
            manager.savePhase('workflow_a', 'search_databases', snapshot(searchPayload));
            manager.savePhase('workflow_b', 'search_databases', snapshot(searchPayload));
            const old = new Date('2020-01-01T00:00:00Z');
            fs.utimesSync(manager.phasePath('workflow_b', 'search_databases'), old, old);

            expect(manager.findByTopic(TOPIC, CHAIN)?.workflowId).toBe('workflow_a');
        });

        it('should return null when no checkpoint root exists', () => {
            const empty = new CheckpointManager(path.join(root, 'missing'));
            expect(empty.findByTopic(TOPIC, CHAIN)).toBeNull();
            expect(empty.listWorkflows()).toEqual([]);
        });
    });
});
