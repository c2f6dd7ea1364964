import chalk from 'chalk';
import {
    Config,
    ConfigError,
    Logger,
    Outcome,
    Policy,
    PolicySchema,
    ReportEmitter,
    VerificationResult,
    VerificationRunner,
    errorMessage,
    formatPercentage,
    loadConfig,
} from '@portcheck/core';
import { exitCodeFor } from '../utils/exit-policy.js';

export interface CheckOptions {
    config?: string;
    threshold?: string;
    policy?: string;
    json?: boolean;
    ci?: boolean;
    verbose?: boolean;
}

function parsePolicyFlag(value?: string): Policy | undefined {
    if (value === undefined) return undefined;
    const parsed = PolicySchema.safeParse(value);
    if (!parsed.success) {
        throw new ConfigError(`Invalid --policy "${value}": expected advisory or gating`);
    }
    return parsed.data;
}

function parseThresholdFlag(value?: string): number | undefined {
    if (value === undefined) return undefined;
    const threshold = Number(value);
    if (value.trim() === '' || !Number.isFinite(threshold) || threshold < 0 || threshold > 100) {
        throw new ConfigError(`Invalid --threshold "${value}": expected a number between 0 and 100`);
    }
    return threshold;
}

/** Config file values, with CLI flags taking precedence. */
export async function resolveCheckConfig(cwd: string, options: CheckOptions): Promise<Config> {
    const policy = parsePolicyFlag(options.policy);
    const threshold = parseThresholdFlag(options.threshold);
    return loadConfig(cwd, options.config, { policy, threshold });
}

function reportConfigError(error: ConfigError, options: CheckOptions) {
    if (options.json) {
        console.log(JSON.stringify({ error: 'CONFIG_ERROR', message: error.message, issues: error.issues }));
        return;
    }
    console.error(chalk.red(`Error: ${error.message}`));
    for (const issue of error.issues) {
        console.error(chalk.red(`  • ${issue}`));
    }
}

function renderCi(result: VerificationResult, outcome: Outcome) {
    const coverage = `${formatPercentage(outcome.percentage)} (threshold ${outcome.threshold}%)`;
    if (outcome.pass) {
        console.log(`PASS ${coverage}`);
        return;
    }
    const { functions, classes } = result.report.missing;
    console.log(`FAIL ${coverage}: ${functions.length + classes.length} missing item(s)`);
    for (const item of functions) console.log(`  - [function] ${item.name} (${item.module})`);
    for (const item of classes) console.log(`  - [class] ${item.name} (${item.module})`);
}

function renderHuman(result: VerificationResult, outcome: Outcome, policy: Policy) {
    console.log(outcome.text);
    console.log('');

    const coverage = `coverage ${formatPercentage(outcome.percentage)}, threshold ${outcome.threshold}%`;
    if (outcome.pass) {
        console.log(chalk.green.bold(`✔ PASS - ${coverage}`));
    } else {
        console.log(chalk.red.bold(`✘ FAIL - ${coverage}`));
        if (policy === 'advisory') {
            console.log(chalk.yellow('Advisory policy: reporting success regardless of coverage.'));
        }
    }

    console.log(chalk.dim(`Missing functions: ${outcome.artifacts.missingFunctions}`));
    console.log(chalk.dim(`Missing classes:   ${outcome.artifacts.missingClasses}`));
    console.log(chalk.dim(`\nFinished in ${(result.stats.duration_ms / 1000).toFixed(1)}s | ${result.stats.candidate_files} candidate files | Policy: ${policy}`));
}

export async function checkCommand(cwd: string, options: CheckOptions = {}) {
    const isSilent = !!options.ci || !!options.json;
    Logger.setLevel(Logger.levelFor({ verbose: options.verbose, quiet: isSilent }));

    let config: Config;
    try {
        config = await resolveCheckConfig(cwd, options);
    } catch (error) {
        // Without a readable config the --policy flag alone decides; default to gating.
        let policy: Policy = 'gating';
        const flag = PolicySchema.safeParse(options.policy);
        if (flag.success) policy = flag.data;

        if (error instanceof ConfigError) {
            reportConfigError(error, options);
            process.exit(exitCodeFor(policy, { kind: 'config-error' }));
        } else {
            Logger.error(`Internal error: ${errorMessage(error)}`, error);
            process.exit(exitCodeFor(policy, { kind: 'internal-error' }));
        }
        return;
    }

    try {
        if (!isSilent) {
            console.log(chalk.blue('Running portcheck verification...\n'));
        }

        const result = await new VerificationRunner(config).run(cwd);
        const outcome = await new ReportEmitter({
            cwd,
            threshold: config.threshold,
            output: config.output,
            policy: config.policy,
        }).emit(result);

        if (options.json) {
            console.log(JSON.stringify({
                pass: outcome.pass,
                percentage: outcome.percentage,
                threshold: outcome.threshold,
                policy: config.policy,
                report: result.report,
                modules: result.modules,
                skipped: result.skipped,
                artifacts: outcome.artifacts,
            }, null, 2));
        } else if (options.ci) {
            renderCi(result, outcome);
        } else {
            renderHuman(result, outcome, config.policy);
        }

        process.exit(exitCodeFor(config.policy, { kind: 'outcome', outcome }));
    } catch (error) {
        Logger.error(`Verification aborted: ${errorMessage(error)}`, error);
        if (config.policy === 'advisory') {
            Logger.warn('Advisory policy: exiting successfully despite the error.');
        }
        process.exit(exitCodeFor(config.policy, { kind: 'internal-error' }));
    }
}
