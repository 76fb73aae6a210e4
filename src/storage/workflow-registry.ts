import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { z } from 'zod';
import type { WorkflowRecord, WorkflowStatus } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { normalizeTopic } from '../utils/text.js';

const logger = getLogger();

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
-- Workflows: one row per review run
CREATE TABLE IF NOT EXISTS workflows (
  workflow_id TEXT PRIMARY KEY,
  topic TEXT NOT NULL,
  topic_key TEXT NOT NULL,
  config_hash TEXT NOT NULL,
  checkpoint_dir TEXT NOT NULL,
  status TEXT NOT NULL DEFAULT 'running',
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  heartbeat_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_workflows_topic_key ON workflows(topic_key);
`;

const WorkflowRowSchema = z.object({
    workflow_id: z.string(),
    topic: z.string(),
    config_hash: z.string(),
    checkpoint_dir: z.string(),
    status: z.enum(['running', 'completed', 'failed']),
    created_at: z.string(),
    updated_at: z.string(),
    heartbeat_at: z.string(),
});

/**
 * Run metadata kept beside the checkpoint files: which workflows exist,
 * what configuration started them and whether they finished.
 * Checkpoints remain the source of truth for resumption.
 */
export class WorkflowRegistry {
    private db: Database.Database;

    constructor(
        dbPath: string,
        private readonly clock: () => Date = () => new Date()
    ) {
        if (dbPath !== ':memory:') {
            mkdirSync(dirname(dbPath), { recursive: true });
        }
        this.db = new Database(dbPath);
        this.db.pragma('journal_mode = WAL');
        this.migrate();

        logger.debug({ dbPath }, 'Workflow registry opened');
    }

    private migrate(): void {
        const version = this.db.pragma('user_version', { simple: true });
        const currentVersion = typeof version === 'number' ? version : 0;

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            logger.info('Workflow registry migrated to v1');
        }
    }

    /**
     * Record a run as started. A resumed workflow keeps its creation time.
     */
    start(entry: Pick<WorkflowRecord, 'workflow_id' | 'topic' | 'config_hash' | 'checkpoint_dir'>): WorkflowRecord {
        const now = this.clock().toISOString();
        this.db
            .prepare(
                `
      INSERT INTO workflows (workflow_id, topic, topic_key, config_hash, checkpoint_dir, status, created_at, updated_at, heartbeat_at)
      VALUES (@workflow_id, @topic, @topic_key, @config_hash, @checkpoint_dir, 'running', @now, @now, @now)
      ON CONFLICT(workflow_id) DO UPDATE SET
        config_hash = excluded.config_hash,
        checkpoint_dir = excluded.checkpoint_dir,
        status = 'running',
        updated_at = excluded.updated_at,
        heartbeat_at = excluded.heartbeat_at
    `
            )
            .run({ ...entry, topic_key: normalizeTopic(entry.topic), now });

        const record = this.get(entry.workflow_id);
        if (!record) {
            throw new Error(`Workflow ${entry.workflow_id} missing after insert`);
        }
        return record;
    }

    setStatus(workflowId: string, status: WorkflowStatus): void {
        const now = this.clock().toISOString();
        this.db
            .prepare('UPDATE workflows SET status = ?, updated_at = ?, heartbeat_at = ? WHERE workflow_id = ?')
            .run(status, now, now, workflowId);
    }

    /**
     * Mark a running workflow as alive.
     */
    heartbeat(workflowId: string): void {
        this.db
            .prepare('UPDATE workflows SET heartbeat_at = ? WHERE workflow_id = ?')
            .run(this.clock().toISOString(), workflowId);
    }

    get(workflowId: string): WorkflowRecord | undefined {
        return toRecord(this.db.prepare('SELECT * FROM workflows WHERE workflow_id = ?').get(workflowId));
    }

    /**
     * Workflows for a topic (trimmed, case-insensitive), newest first.
     */
    findByTopic(topic: string): WorkflowRecord[] {
        return this.db
            .prepare('SELECT * FROM workflows WHERE topic_key = ? ORDER BY created_at DESC, workflow_id DESC')
            .all(normalizeTopic(topic))
            .map(toRecord)
            .filter((record): record is WorkflowRecord => record !== undefined);
    }

    list(limit = 20): WorkflowRecord[] {
        return this.db
            .prepare('SELECT * FROM workflows ORDER BY created_at DESC, workflow_id DESC LIMIT ?')
            .all(limit)
            .map(toRecord)
            .filter((record): record is WorkflowRecord => record !== undefined);
    }

    close(): void {
        this.db.close();
    }
}

function toRecord(row: unknown): WorkflowRecord | undefined {
    if (row === undefined) return undefined;
    const parsed = WorkflowRowSchema.safeParse(row);
    if (!parsed.success) {
        logger.warn({ issues: parsed.error.issues }, 'Skipping malformed workflow row');
        return undefined;
    }
    return parsed.data;
}
