#!/usr/bin/env node
import { Command } from 'commander';
import { DEFAULT_RUN_OPTIONS, LOG_LEVELS, type LogLevel, type ReviewConfig, type RunOptions } from '../types/index.js';
import { loadReviewConfig } from '../utils/config.js';
import { ConfigError, CriticalPhaseError } from '../utils/errors.js';
import { initLogger } from '../utils/logger.js';

const VERSION = '0.1.0';

const program = new Command();

program
    .name('reviewflow')
    .description('Run checkpointed, LLM-assisted systematic literature reviews.')
    .version(VERSION);

interface LoggingOptions {
    logLevel: string;
    jsonLogs: boolean;
}

interface RunCommandOptions extends LoggingOptions {
    resume: boolean;
    resumeFrom?: string;
    dryRun: boolean;
    quickSearch: boolean;
}

function parseLogLevel(value: string): LogLevel {
    const level = LOG_LEVELS.find((candidate) => candidate === value);
    if (!level) {
        console.error(`Invalid log level: ${value}. Valid: ${LOG_LEVELS.join(', ')}`);
        process.exit(1);
    }
    return level;
}

/**
 * Logger first: workflow modules bind their logger when they are imported.
 */
async function loadConfig(configPath: string, logging: LoggingOptions): Promise<ReviewConfig> {
    initLogger({ level: parseLogLevel(logging.logLevel), jsonLogs: logging.jsonLogs });
    try {
        return await loadReviewConfig(configPath);
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(`Configuration error (${error.field}): ${error.message}`);
            process.exit(1);
        }
        throw error;
    }
}

// ─── RUN command ──────────────────────────────────────────

program
    .command('run')
    .description('Run (or resume) a review workflow')
    .argument('<config>', 'Path to the review YAML config')
    .option('--resume', 'Resume the latest workflow with the same topic', false)
    .option('--resume-from <phase>', 'Resume, re-running this phase and every later one')
    .option('--dry-run', 'Validate the config and print the plan without running', false)
    .option('--quick-search', 'Cap results per database at 10', false)
    .option('--log-level <level>', 'Log level: debug | info | warn | error', 'info')
    .option('--json-logs', 'Output JSON logs', false)
    .action(async (configPath: string, opts: RunCommandOptions) => {
        const config = await loadConfig(configPath, opts);
        const { WorkflowManager } = await import('../orchestration/workflow-manager.js');

        const options: RunOptions = {
            resume: opts.resume || opts.resumeFrom !== undefined,
            resumeFrom: opts.resumeFrom,
            dryRun: opts.dryRun,
            quickSearch: opts.quickSearch,
            logLevel: parseLogLevel(opts.logLevel),
            jsonLogs: opts.jsonLogs,
        };
        const manager = new WorkflowManager(config, options);

        if (options.dryRun) {
            const plan = manager.plan();
            console.log(`\nReview: ${config.topic.topic}\n`);
            console.log('Execution plan:');
            plan.groups.forEach((group, i) => console.log(`  ${i + 1}. ${group.join(' | ')}`));
            console.log(`\nSearch strategy:\n${plan.strategy}\n`);
            if (plan.unsupportedDatabases.length > 0) {
                console.log(`Databases without a connector: ${plan.unsupportedDatabases.join(', ')}`);
            }
            if (plan.problems.length > 0) {
                console.error(`Phase graph problems:\n  ${plan.problems.join('\n  ')}`);
                process.exit(1);
            }
            console.log('Configuration is valid.');
            return;
        }

        const controller = new AbortController();
        process.once('SIGINT', () => controller.abort(new Error('Interrupted')));

        try {
            const result = await manager.run(controller.signal);
            console.log(`\nWorkflow ${result.workflowId} complete.`);
            if (result.reportPath) console.log(`Report: ${result.reportPath}`);
            if (result.summary.failed.length > 0) {
                console.log('Non-critical phases without output:');
                for (const failure of result.summary.failed) {
                    console.log(`  ${failure.phase}: ${failure.errorType}: ${failure.message}`);
                }
            }
            console.log(`LLM cost: $${result.observability.costs.totalCostUsd.toFixed(4)}`);
        } catch (error) {
            if (error instanceof CriticalPhaseError) {
                console.error('\nWorkflow aborted by critical phase failure:');
                for (const failure of error.failures) {
                    console.error(`  ${failure.phase}: ${failure.errorType}: ${failure.message}`);
                }
                const first = error.failures[0]?.phase;
                console.error(
                    `\nCheckpoints were kept. Resume with:\n  reviewflow run ${configPath} --resume${first ? ` --resume-from ${first}` : ''}`
                );
                process.exit(1);
            }
            if (error instanceof ConfigError) {
                console.error(`Configuration error (${error.field}): ${error.message}`);
                process.exit(1);
            }
            throw error;
        }
    });

// ─── STATUS command ───────────────────────────────────────

program
    .command('status')
    .description('Show checkpoint status for the configured topic')
    .argument('<config>', 'Path to the review YAML config')
    .option('--log-level <level>', 'Log level: debug | info | warn | error', 'warn')
    .option('--json-logs', 'Output JSON logs', false)
    .action(async (configPath: string, opts: LoggingOptions) => {
        const config = await loadConfig(configPath, opts);
        const { WorkflowManager } = await import('../orchestration/workflow-manager.js');

        const report = new WorkflowManager(config, DEFAULT_RUN_OPTIONS).status();

        console.log(`\nTopic: ${config.topic.topic}`);
        if (!report.match) {
            console.log('No checkpoints found.\n');
        } else {
            console.log(`Workflow: ${report.match.workflowId} (${report.match.validPhases} phases checkpointed)\n`);
            for (const phase of report.phases) {
                const stamp = phase.timestamp ? `  ${phase.timestamp}` : '';
                console.log(`  ${phase.status.padEnd(9)} ${phase.phase}${stamp}`);
            }
            console.log(`\nNext phase: ${report.nextPhase ?? 'none (complete)'}`);
        }

        if (report.runs.length > 0) {
            console.log('\nRuns:');
            for (const run of report.runs) {
                console.log(`  ${run.workflow_id}  ${run.status}  updated ${run.updated_at}`);
            }
        }
        console.log('');
    });

// ─── PHASES command ───────────────────────────────────────

program
    .command('phases')
    .description('Print the phase execution order and validate the phase graph')
    .action(async () => {
        initLogger({ level: 'warn' });
        const { createStandardRegistry } = await import('../orchestration/phases.js');
        const { planGroups } = await import('../orchestration/phase-executor.js');

        const registry = createStandardRegistry();
        const problems = registry.validateDependencies();
        if (problems.length > 0) {
            console.error(`Phase graph problems:\n  ${problems.join('\n  ')}`);
            process.exit(1);
        }

        console.log('\nExecution order:\n');
        const groups = planGroups(registry.getExecutionOrder(), registry);
        groups.forEach((group, i) => {
            for (const phase of group) {
                const flags = [
                    phase.critical ? 'critical' : 'optional',
                    phase.checkpoint ? 'checkpoint' : 'rebuilt',
                    ...(group.length > 1 ? ['parallel'] : []),
                ];
                const deps = phase.dependencies.length > 0 ? ` <- ${phase.dependencies.join(', ')}` : '';
                console.log(`  ${String(i + 1).padStart(2)}. ${phase.name} [${flags.join(', ')}]${deps}`);
            }
        });
        console.log('\nPhase graph is valid.\n');
    });

// ─── CACHE command ────────────────────────────────────────

program
    .command('cache')
    .description('Manage the search response cache')
    .argument('<action>', 'Action: clear | stats')
    .requiredOption('-c, --config <path>', 'Path to the review YAML config')
    .action(async (action: string, opts: { config: string }) => {
        const config = await loadConfig(opts.config, { logLevel: 'warn', jsonLogs: false });
        const { ResponseCache } = await import('../cache/response-cache.js');
        const cache = new ResponseCache({
            cacheDir: config.workflow.cache.directory,
            ttlHours: config.workflow.cache.ttlHours,
            enabled: config.workflow.cache.enabled,
        });

        switch (action) {
            case 'clear':
                cache.clear();
                console.log('Cache cleared.');
                break;
            case 'stats': {
                const stats = cache.getStats();
                console.log(`Cache ${stats.directory}: ${stats.entries} entries, ${(stats.bytes / 1024).toFixed(1)} KB`);
                break;
            }
            default:
                console.error(`Unknown action: ${action}. Valid: clear, stats`);
                process.exit(1);
        }
    });

await program.parseAsync();
