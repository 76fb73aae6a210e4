import { DirectedGraph } from 'graphology';
import { DependencyError } from '../utils/errors.js';

/**
 * Runs one phase. The result is handed to the executor's completion hook.
 */
export type PhaseHandler<C, R> = (context: C, signal: AbortSignal) => Promise<R>;

export interface PhaseOptions<C, R> {
    /** A failure aborts the workflow */
    critical: boolean;
    /** The phase output is written to a checkpoint file */
    checkpoint: boolean;
    /** May run concurrently with adjacent parallel phases */
    parallel: boolean;
    handler: PhaseHandler<C, R>;
}

export interface PhaseDefinition<C, R> extends PhaseOptions<C, R> {
    name: string;
    dependencies: readonly string[];
}

/**
 * Declarative DAG of workflow phases.
 *
 * Phases are nodes; an edge `dep → phase` means `phase` needs `dep`'s output.
 * Declaration order is kept and breaks ties in the topological sort, so the
 * execution order is the same on every run.
 */
export class PhaseRegistry<C, R> {
    private readonly graph = new DirectedGraph();
    private readonly phases = new Map<string, PhaseDefinition<C, R>>();

    /**
     * Register a phase. Every dependency must already be registered.
     *
     * @throws DependencyError on a duplicate name, an unknown dependency or a cycle
     */
    register(name: string, dependencies: readonly string[], options: PhaseOptions<C, R>): this {
        if (this.phases.has(name)) {
            throw new DependencyError(`Phase "${name}" is already registered`, name);
        }
        // Phases declared earlier may already depend on this one
        const dependents = this.list().filter((phase) => phase.dependencies.includes(name));
        for (const dependency of dependencies) {
            const cyclic =
                dependency === name ||
                dependents.some((phase) => phase.name === dependency || this.reaches(phase.name, dependency));
            if (cyclic) {
                throw new DependencyError(`Dependency "${dependency}" of "${name}" would create a cycle`, name);
            }
            if (!this.phases.has(dependency)) {
                throw new DependencyError(`Phase "${name}" depends on unknown phase "${dependency}"`, name);
            }
        }
        this.add({ name, dependencies: [...dependencies], ...options });
        return this;
    }

    /**
     * Register phases in bulk without checks. Problems surface through
     * {@link validateDependencies} and {@link getExecutionOrder}.
     */
    declare(definitions: ReadonlyArray<PhaseDefinition<C, R>>): this {
        for (const definition of definitions) {
            this.add({ ...definition, dependencies: [...definition.dependencies] });
        }
        return this;
    }

    has(name: string): boolean {
        return this.phases.has(name);
    }

    get(name: string): PhaseDefinition<C, R> | undefined {
        return this.phases.get(name);
    }

    /** Phases in declaration order */
    list(): Array<PhaseDefinition<C, R>> {
        return [...this.phases.values()];
    }

    /**
     * Every dangling dependency and cycle, as messages. Never throws.
     */
    validateDependencies(): string[] {
        const problems: string[] = [];

        for (const phase of this.phases.values()) {
            for (const dependency of phase.dependencies) {
                if (!this.phases.has(dependency)) {
                    problems.push(`Phase "${phase.name}" depends on unknown phase "${dependency}"`);
                }
            }
        }

        const { order, blocked } = this.sort();
        if (order.length < this.phases.size) {
            problems.push(`Dependency cycle among phases: ${blocked.join(', ')}`);
        }

        return problems;
    }

    /**
     * Topological order (Kahn's algorithm). Among phases that are ready at the
     * same time, the earliest declared goes first.
     *
     * @throws DependencyError when the graph has dangling dependencies or a cycle
     */
    getExecutionOrder(): string[] {
        const problems = this.validateDependencies();
        if (problems.length > 0) {
            throw new DependencyError(problems.join('; '), problems.length === 1 ? problemPhase(problems[0]) : '*');
        }
        return this.sort().order;
    }

    /**
     * First phase in execution order that is not completed and whose
     * dependencies all are, or null when nothing is runnable.
     */
    nextPhase(completed: ReadonlySet<string>): string | null {
        for (const name of this.getExecutionOrder()) {
            if (completed.has(name)) continue;
            const phase = this.phases.get(name);
            if (phase && phase.dependencies.every((dependency) => completed.has(dependency))) {
                return name;
            }
        }
        return null;
    }

    // ─── Internals ───────────────────────────────────────

    /** Adds the node with edges in both directions, including to phases declared earlier */
    private add(definition: PhaseDefinition<C, R>): void {
        this.phases.set(definition.name, definition);
        this.graph.mergeNode(definition.name);
        for (const dependency of definition.dependencies) {
            if (this.graph.hasNode(dependency)) {
                this.graph.mergeEdge(dependency, definition.name);
            }
        }
        for (const phase of this.phases.values()) {
            if (phase.dependencies.includes(definition.name)) {
                this.graph.mergeEdge(definition.name, phase.name);
            }
        }
    }

    /** Whether `target` is reachable from `source` along dependency edges */
    private reaches(source: string, target: string): boolean {
        if (!this.graph.hasNode(source) || !this.graph.hasNode(target)) return false;
        const stack = [source];
        const seen = new Set<string>();
        while (stack.length > 0) {
            const node = stack.pop();
            if (node === undefined || seen.has(node)) continue;
            if (node === target) return true;
            seen.add(node);
            stack.push(...this.graph.outNeighbors(node));
        }
        return false;
    }

    private sort(): { order: string[]; blocked: string[] } {
        const declared = [...this.phases.keys()];
        const position = new Map(declared.map((name, index) => [name, index]));
        const inDegree = new Map(declared.map((name) => [name, this.graph.inDegree(name)]));

        const ready = declared.filter((name) => inDegree.get(name) === 0);
        const order: string[] = [];

        while (ready.length > 0) {
            ready.sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0));
            const next = ready.shift();
            if (next === undefined) break;
            order.push(next);
            for (const dependent of this.graph.outNeighbors(next)) {
                const remaining = (inDegree.get(dependent) ?? 0) - 1;
                inDegree.set(dependent, remaining);
                if (remaining === 0) ready.push(dependent);
            }
        }

        const placed = new Set(order);
        return { order, blocked: declared.filter((name) => !placed.has(name)) };
    }
}

function problemPhase(problem: string | undefined): string {
    return problem?.match(/"([^"]+)"/)?.[1] ?? '*';
}
