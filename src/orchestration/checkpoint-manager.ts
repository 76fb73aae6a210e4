import { existsSync, mkdirSync, readFileSync, readdirSync, renameSync, statSync, writeFileSync } from 'node:fs';
import { basename, join } from 'node:path';
import {
    CheckpointRecordSchema,
    WRITING_SECTIONS,
    type CheckpointRecord,
    type PhasePayload,
    type PrismaCounts,
    type TopicContextSnapshot,
    type WritingSection,
} from '../types/index.js';
import { CheckpointCorruptError, CheckpointNotFoundError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { normalizeTopic, slugify } from '../utils/text.js';

const logger = getLogger();

const STATE_SUFFIX = '_state.json';

/**
 * What a phase hands over to be checkpointed.
 */
export interface PhaseSnapshot {
    topicContext: TopicContextSnapshot;
    data: PhasePayload;
    dependencies: readonly string[];
    prismaCounts: PrismaCounts;
}

/**
 * The parts of a phase definition the chain validation needs.
 */
export interface ChainPhase {
    name: string;
    dependencies: readonly string[];
    checkpoint: boolean;
    critical: boolean;
}

export interface WorkflowMatch {
    workflowId: string;
    directory: string;
    validPhases: number;
    lastModifiedMs: number;
}

/**
 * One JSON file per phase per workflow:
 * `<root>/<workflow_id>/<phase>_state.json`.
 *
 * Records are decoded strictly; anything that fails the decode is reported
 * as corrupt and treated by callers as a missing checkpoint.
 */
export class CheckpointManager {
    constructor(
        readonly root: string,
        private readonly clock: () => Date = () => new Date()
    ) {}

    /**
     * `workflow_<topic-slug>_<YYYYMMDD_HHMMSS>` in UTC.
     */
    static createWorkflowId(topic: string, now: Date = new Date()): string {
        const stamp = now
            .toISOString()
            .replace(/\.\d+Z$/, '')
            .replace(/[-:]/g, '')
            .replace('T', '_');
        return `workflow_${slugify(topic) || 'review'}_${stamp}`;
    }

    workflowDir(workflowId: string): string {
        return join(this.root, workflowId);
    }

    phasePath(workflowId: string, phase: string): string {
        return join(this.workflowDir(workflowId), `${phase}${STATE_SUFFIX}`);
    }

    sectionPath(workflowId: string, section: WritingSection): string {
        return this.phasePath(workflowId, `article_writing_${section}`);
    }

    /**
     * Write a phase checkpoint. Saving the same phase again overwrites it.
     */
    savePhase(workflowId: string, phase: string, snapshot: PhaseSnapshot): string {
        return this.write(this.phasePath(workflowId, phase), workflowId, phase, snapshot);
    }

    /**
     * Write one drafted manuscript section so a resumed run can reuse it.
     */
    saveSection(
        workflowId: string,
        section: WritingSection,
        content: string,
        snapshot: Omit<PhaseSnapshot, 'data'>
    ): string {
        return this.write(this.sectionPath(workflowId, section), workflowId, 'article_writing', {
            ...snapshot,
            data: { kind: 'article_section', schema_version: 1, section, content },
        });
    }

    /**
     * Read and strictly decode one checkpoint file.
     *
     * @throws CheckpointNotFoundError when the file does not exist
     * @throws CheckpointCorruptError when it is not JSON or fails the decode
     */
    loadPhase(path: string): CheckpointRecord {
        if (!existsSync(path)) {
            throw new CheckpointNotFoundError(path);
        }

        let raw: unknown;
        try {
            raw = JSON.parse(readFileSync(path, 'utf-8'));
        } catch (error) {
            throw new CheckpointCorruptError(path, error instanceof Error ? error.message : String(error));
        }

        const parsed = CheckpointRecordSchema.safeParse(raw);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
            throw new CheckpointCorruptError(path, `${where}${issue?.message ?? 'invalid record'}`);
        }
        return parsed.data;
    }

    /**
     * Valid checkpoints of a workflow directory, in the given execution order.
     *
     * A checkpoint counts only when its payload matches its phase and every
     * checkpointed dependency has a valid checkpoint that is not newer. A
     * non-critical dependency without any checkpoint failed on that run and
     * does not invalidate its dependents. Corrupt files are logged and skipped.
     */
    loadChain(directory: string, phases: readonly ChainPhase[]): Map<string, CheckpointRecord> {
        const byName = new Map(phases.map((phase) => [phase.name, phase]));
        const valid = new Map<string, CheckpointRecord>();

        for (const phase of phases) {
            if (!phase.checkpoint) continue;

            const record = this.tryLoad(join(directory, `${phase.name}${STATE_SUFFIX}`));
            if (!record) continue;

            if (record.data.kind !== phase.name) {
                logger.warn({ phase: phase.name, kind: record.data.kind }, 'Checkpoint payload does not match its phase');
                continue;
            }

            const recordedAt = Date.parse(record.timestamp);
            const satisfied = (dependency: string): boolean => {
                const definition = byName.get(dependency);
                if (definition?.checkpoint === false) return true;
                const prior = valid.get(dependency);
                if (prior !== undefined) return Date.parse(prior.timestamp) <= recordedAt;
                return (
                    definition?.critical === false &&
                    !existsSync(join(directory, `${dependency}${STATE_SUFFIX}`)) &&
                    definition.dependencies.every(satisfied)
                );
            };
            if (!phase.dependencies.every(satisfied)) {
                logger.debug({ phase: phase.name }, 'Checkpoint ignored: dependency checkpoint missing or newer');
                continue;
            }

            valid.set(phase.name, record);
        }

        return valid;
    }

    /**
     * Manuscript sections checkpointed for a workflow.
     */
    loadSections(directory: string): Map<WritingSection, string> {
        const sections = new Map<WritingSection, string>();
        for (const section of WRITING_SECTIONS) {
            const record = this.tryLoad(join(directory, `article_writing_${section}${STATE_SUFFIX}`));
            if (record?.data.kind === 'article_section' && record.data.section === section) {
                sections.set(section, record.data.content);
            }
        }
        return sections;
    }

    /**
     * Workflow directory whose stored topic matches, or null.
     *
     * Topics compare after trimming and lower-casing. Among matches the one
     * with the most valid completed phases wins, then the most recently written.
     */
    findByTopic(topic: string, phases: readonly ChainPhase[]): WorkflowMatch | null {
        const wanted = normalizeTopic(topic);
        const matches: WorkflowMatch[] = [];

        for (const workflowId of this.listWorkflows()) {
            const directory = this.workflowDir(workflowId);
            const chain = this.loadChain(directory, phases);
            const first = chain.values().next();
            if (first.done) continue;
            if (normalizeTopic(first.value.topic_context.topic) !== wanted) continue;

            matches.push({
                workflowId,
                directory,
                validPhases: chain.size,
                lastModifiedMs: latestModification(directory),
            });
        }

        matches.sort((a, b) => b.validPhases - a.validPhases || b.lastModifiedMs - a.lastModifiedMs);
        const best = matches[0] ?? null;
        if (best) {
            logger.info({ workflowId: best.workflowId, validPhases: best.validPhases }, 'Found workflow to resume');
        }
        return best;
    }

    /**
     * Workflow ids present under the checkpoint root.
     */
    listWorkflows(): string[] {
        if (!existsSync(this.root)) return [];
        return readdirSync(this.root, { withFileTypes: true })
            .filter((entry) => entry.isDirectory() && entry.name.startsWith('workflow_'))
            .map((entry) => entry.name)
            .sort();
    }

    // ─── Internals ───────────────────────────────────────

    private write(path: string, workflowId: string, phase: string, snapshot: PhaseSnapshot): string {
        const record: CheckpointRecord = {
            phase,
            timestamp: this.clock().toISOString(),
            workflow_id: workflowId,
            topic_context: snapshot.topicContext,
            data: snapshot.data,
            dependencies: [...snapshot.dependencies],
            prisma_counts: snapshot.prismaCounts,
        };

        mkdirSync(this.workflowDir(workflowId), { recursive: true });
        const temporary = `${path}.tmp`;
        writeFileSync(temporary, JSON.stringify(record, null, 2), 'utf-8');
        renameSync(temporary, path);

        logger.debug({ phase, path: basename(path) }, 'Checkpoint saved');
        return path;
    }

    private tryLoad(path: string): CheckpointRecord | null {
        try {
            return this.loadPhase(path);
        } catch (error) {
            if (error instanceof CheckpointCorruptError) {
                logger.warn({ path, reason: error.reason }, 'Corrupt checkpoint treated as missing');
                return null;
            }
            if (error instanceof CheckpointNotFoundError) return null;
            throw error;
        }
    }
}

function latestModification(directory: string): number {
    let latest = 0;
    for (const file of readdirSync(directory)) {
        if (!file.endsWith(STATE_SUFFIX)) continue;
        latest = Math.max(latest, statSync(join(directory, file)).mtimeMs);
    }
    return latest;
}
