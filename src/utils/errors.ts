/**
 * Error taxonomy for the workflow. LLM call failures never reach these:
 * they are absorbed by the resilience wrapper and turned into typed results.
 */

/**
 * Missing or invalid configuration. Fatal at startup, never retried.
 */
export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly field: string
    ) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Phase registration referenced an unknown phase or would create a cycle.
 */
export class DependencyError extends Error {
    constructor(
        message: string,
        public readonly phase: string
    ) {
        super(message);
        this.name = 'DependencyError';
    }
}

export class CheckpointNotFoundError extends Error {
    constructor(public readonly path: string) {
        super(`Checkpoint not found: ${path}`);
        this.name = 'CheckpointNotFoundError';
    }
}

/**
 * Checkpoint exists but could not be parsed or decoded.
 * Callers treat it as "no checkpoint" and restart that phase.
 */
export class CheckpointCorruptError extends Error {
    constructor(
        public readonly path: string,
        public readonly reason: string
    ) {
        super(`Corrupt checkpoint ${path}: ${reason}`);
        this.name = 'CheckpointCorruptError';
    }
}

/**
 * A phase tried to lower a PRISMA count that was already set.
 */
export class PrismaCountError extends Error {
    constructor(
        public readonly key: string,
        public readonly previous: number,
        public readonly attempted: number
    ) {
        super(`PRISMA count "${key}" cannot decrease from ${previous} to ${attempted}`);
        this.name = 'PrismaCountError';
    }
}

/**
 * A manuscript section could not be drafted within its attempt budget.
 */
export class SectionWriteError extends Error {
    constructor(
        public readonly section: string,
        public readonly attempts: number,
        public readonly lastFailure: string
    ) {
        super(`Section "${section}" failed after ${attempts} attempts: ${lastFailure}`);
        this.name = 'SectionWriteError';
    }
}

/**
 * A phase was cancelled because a critical sibling in its group failed.
 */
export class PhaseCancelledError extends Error {
    constructor(public readonly phase: string) {
        super(`Phase "${phase}" cancelled`);
        this.name = 'PhaseCancelledError';
    }
}

/**
 * A phase handler threw. Wraps the cause with the phase name for the executor.
 */
export class PhaseExecutionError extends Error {
    constructor(
        public readonly phase: string,
        public readonly cause: unknown
    ) {
        super(`Phase "${phase}" failed: ${cause instanceof Error ? cause.message : String(cause)}`);
        this.name = 'PhaseExecutionError';
    }
}

/**
 * Diagnostic record for one failed phase.
 */
export interface PhaseFailure {
    phase: string;
    errorType: string;
    message: string;
}

/**
 * One or more critical phases failed. Carries every critical failure of the group.
 */
export class CriticalPhaseError extends Error {
    constructor(public readonly failures: PhaseFailure[]) {
        super(
            `Critical phase failure: ${failures
                .map((f) => `${f.phase} (${f.errorType}: ${f.message})`)
                .join('; ')}`
        );
        this.name = 'CriticalPhaseError';
    }
}

/**
 * Describe any thrown value as a phase failure.
 */
export function describeFailure(phase: string, error: unknown): PhaseFailure {
    if (error instanceof PhaseExecutionError) {
        return describeFailure(phase, error.cause);
    }
    if (error instanceof Error) {
        return { phase, errorType: error.name, message: error.message };
    }
    return { phase, errorType: typeof error, message: String(error) };
}
