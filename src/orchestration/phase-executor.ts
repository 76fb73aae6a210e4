import {
    CriticalPhaseError,
    PhaseCancelledError,
    PhaseExecutionError,
    describeFailure,
    type PhaseFailure,
} from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import type { PhaseDefinition, PhaseRegistry } from './phase-registry.js';

const logger = getLogger();

/**
 * Callbacks through which the executor reports progress to the workflow.
 */
export interface ExecutorHooks<C, R> {
    /** Completed on an earlier run and restored from its checkpoint */
    isComplete(phase: string): boolean;
    /** Fold the phase output into workflow state and checkpoint it */
    onComplete(phase: PhaseDefinition<C, R>, output: R): void;
    /** A non-critical phase failed; its output is recorded as null */
    onFailure(phase: PhaseDefinition<C, R>, error: PhaseExecutionError): void;
}

export interface ExecutionSummary {
    completed: string[];
    skipped: string[];
    failed: PhaseFailure[];
}

type PhaseOutcome =
    | { status: 'completed' }
    | { status: 'failed'; failure: PhaseFailure; critical: boolean }
    | { status: 'cancelled' };

/**
 * Split an execution order into groups. Consecutive parallel phases share a
 * group unless one of them depends on another member.
 */
export function planGroups<C, R>(
    order: readonly string[],
    registry: PhaseRegistry<C, R>
): Array<Array<PhaseDefinition<C, R>>> {
    const groups: Array<Array<PhaseDefinition<C, R>>> = [];
    let current: Array<PhaseDefinition<C, R>> | null = null;

    for (const name of order) {
        const phase = registry.get(name);
        if (!phase) continue;

        const joinable =
            phase.parallel &&
            current !== null &&
            current.every((member) => member.parallel && !phase.dependencies.includes(member.name));

        if (joinable && current) {
            current.push(phase);
        } else {
            current = [phase];
            groups.push(current);
        }
    }

    return groups;
}

/**
 * Runs registered phases group by group in execution order.
 *
 * A parallel group shares one AbortController. When a critical member fails
 * the controller is aborted, the remaining members see their signal fire, and
 * once every member has settled the group raises {@link CriticalPhaseError}
 * with all critical failures. Non-critical failures are reported to
 * `onFailure` and the run continues.
 */
export class PhaseExecutor<C, R> {
    constructor(
        private readonly registry: PhaseRegistry<C, R>,
        private readonly hooks: ExecutorHooks<C, R>
    ) {}

    async run(context: C, signal?: AbortSignal): Promise<ExecutionSummary> {
        const summary: ExecutionSummary = { completed: [], skipped: [], failed: [] };
        const groups = planGroups(this.registry.getExecutionOrder(), this.registry);

        for (const group of groups) {
            const pending = group.filter((phase) => {
                if (!this.hooks.isComplete(phase.name)) return true;
                summary.skipped.push(phase.name);
                logger.info({ phase: phase.name }, 'Phase restored from checkpoint');
                return false;
            });
            if (pending.length === 0) continue;

            signal?.throwIfAborted();
            await this.runGroup(pending, context, summary, signal);
        }

        return summary;
    }

    private async runGroup(
        group: ReadonlyArray<PhaseDefinition<C, R>>,
        context: C,
        summary: ExecutionSummary,
        outer: AbortSignal | undefined
    ): Promise<void> {
        const controller = new AbortController();
        const signal = outer ? AbortSignal.any([outer, controller.signal]) : controller.signal;

        if (group.length > 1) {
            logger.info({ phases: group.map((phase) => phase.name) }, 'Running parallel phase group');
        }

        const outcomes = await Promise.all(
            group.map((phase) => this.runPhase(phase, context, signal, controller))
        );

        const critical: PhaseFailure[] = [];
        outcomes.forEach((outcome, index) => {
            const phase = group[index];
            if (!phase) return;
            if (outcome.status === 'completed') {
                summary.completed.push(phase.name);
            } else if (outcome.status === 'failed') {
                summary.failed.push(outcome.failure);
                if (outcome.critical) critical.push(outcome.failure);
            }
        });

        if (critical.length > 0) {
            throw new CriticalPhaseError(critical);
        }
        outer?.throwIfAborted();
    }

    /** Never rejects: every result is reported as an outcome */
    private async runPhase(
        phase: PhaseDefinition<C, R>,
        context: C,
        signal: AbortSignal,
        controller: AbortController
    ): Promise<PhaseOutcome> {
        const startedAt = Date.now();
        logger.info({ phase: phase.name }, 'Phase started');

        try {
            const output = await phase.handler(context, signal);
            signal.throwIfAborted();
            this.hooks.onComplete(phase, output);
            logger.info({ phase: phase.name, durationMs: Date.now() - startedAt }, 'Phase completed');
            return { status: 'completed' };
        } catch (error) {
            if (signal.aborted && (error === signal.reason || isAbortError(error))) {
                logger.warn({ phase: phase.name }, 'Phase cancelled');
                return { status: 'cancelled' };
            }

            const failure = describeFailure(phase.name, error);
            if (phase.critical) {
                controller.abort(new PhaseCancelledError(phase.name));
                logger.error({ ...failure }, 'Critical phase failed');
                return { status: 'failed', failure, critical: true };
            }

            logger.warn({ ...failure }, 'Non-critical phase failed, output recorded as null');
            this.hooks.onFailure(phase, new PhaseExecutionError(phase.name, error));
            return { status: 'failed', failure, critical: false };
        }
    }
}

function isAbortError(error: unknown): boolean {
    return error instanceof PhaseCancelledError || (error instanceof Error && error.name === 'AbortError');
}
