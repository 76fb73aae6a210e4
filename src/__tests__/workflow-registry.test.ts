import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { WorkflowRegistry } from '../storage/workflow-registry.js';

describe('WorkflowRegistry', () => {
    let now: Date;
    let registry: WorkflowRegistry;

    beforeEach(() => {
        now = new Date('2026-03-01T09:00:00.000Z');
        registry = new WorkflowRegistry(':memory:', () => now);
    });

    afterEach(() => {
        registry.close();
    });

    it('should record a started workflow', () => {
        const record = registry.start({
            workflow_id: 'workflow_chatbots_1',
            topic: 'Chatbots  In Health',
            config_hash: 'abc',
            checkpoint_dir: '/data/checkpoints/workflow_chatbots_1',
        });

        expect(record).toEqual({
            workflow_id: 'workflow_chatbots_1',
            topic: 'Chatbots  In Health',
            config_hash: 'abc',
            checkpoint_dir: '/data/checkpoints/workflow_chatbots_1',
            status: 'running',
            created_at: '2026-03-01T09:00:00.000Z',
            updated_at: '2026-03-01T09:00:00.000Z',
            heartbeat_at: '2026-03-01T09:00:00.000Z',
        });
    });

    it('should keep the creation time when a workflow is resumed', () => {
        registry.start({ workflow_id: 'w1', topic: 'Chatbots', config_hash: 'abc', checkpoint_dir: '/c/w1' });
        registry.setStatus('w1', 'failed');

        now = new Date('2026-03-02T09:00:00.000Z');
        const resumed = registry.start({ workflow_id: 'w1', topic: 'Chatbots', config_hash: 'def', checkpoint_dir: '/c/w1' });

        expect(resumed).toMatchObject({
            status: 'running',
            config_hash: 'def',
            created_at: '2026-03-01T09:00:00.000Z',
            updated_at: '2026-03-02T09:00:00.000Z',
        });
    });

    it('should update status and heartbeat', () => {
        registry.start({ workflow_id: 'w1', topic: 'Chatbots', config_hash: 'abc', checkpoint_dir: '/c/w1' });

        now = new Date('2026-03-01T09:05:00.000Z');
        registry.heartbeat('w1');
        expect(registry.get('w1')).toMatchObject({
            status: 'running',
            updated_at: '2026-03-01T09:00:00.000Z',
            heartbeat_at: '2026-03-01T09:05:00.000Z',
        });

        now = new Date('2026-03-01T09:10:00.000Z');
        registry.setStatus('w1', 'completed');
        expect(registry.get('w1')).toMatchObject({
            status: 'completed',
            updated_at: '2026-03-01T09:10:00.000Z',
        });
    });

    it('should find workflows by normalized topic, newest first', () => {
        registry.start({ workflow_id: 'w1', topic: 'Chatbots in Health', config_hash: 'a', checkpoint_dir: '/c/w1' });
        now = new Date('2026-03-05T09:00:00.000Z');
        registry.start({ workflow_id: 'w2', topic: ' chatbots  in health', config_hash: 'b', checkpoint_dir: '/c/w2' });
        registry.start({ workflow_id: 'w3', topic: 'Wearables', config_hash: 'c', checkpoint_dir: '/c/w3' });

        expect(registry.findByTopic('CHATBOTS IN HEALTH').map((r) => r.workflow_id)).toEqual(['w2', 'w1']);
        expect(registry.list(2).map((r) => r.workflow_id)).toEqual(['w3', 'w2']);
        expect(registry.get('missing')).toBeUndefined();
    });
});
