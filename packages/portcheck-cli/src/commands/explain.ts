import fs from 'fs-extra';
import path from 'path';
import chalk from 'chalk';
import {
    MissingItem,
    SavedReportSchema,
    errorMessage,
    formatPercentage,
    loadConfig,
    percentageOf,
    resolveConfigPath,
} from '@portcheck/core';

const DEFAULT_REPORT = 'portcheck-report.json';

function groupByModule(items: Array<MissingItem & { kind: string }>): Map<string, Array<MissingItem & { kind: string }>> {
    const groups = new Map<string, Array<MissingItem & { kind: string }>>();
    for (const item of items) {
        const group = groups.get(item.module) ?? [];
        group.push(item);
        groups.set(item.module, group);
    }
    return groups;
}

export async function explainCommand(cwd: string, options: { config?: string } = {}) {
    let reportPath = path.join(cwd, DEFAULT_REPORT);

    // Custom report path from config, if there is a usable one
    if (await fs.pathExists(resolveConfigPath(cwd, options.config))) {
        try {
            const config = await loadConfig(cwd, options.config);
            reportPath = path.resolve(cwd, config.output.report_path);
        } catch (error) {
            console.error(chalk.yellow(`Ignoring unreadable config: ${errorMessage(error)}`));
        }
    }

    if (!(await fs.pathExists(reportPath))) {
        console.error(chalk.red(`Error: No report found at ${reportPath}`));
        console.error(chalk.dim('Run `portcheck check` first to generate a report.'));
        process.exit(2);
        return;
    }

    let raw: unknown;
    try {
        raw = await fs.readJson(reportPath);
    } catch (error) {
        console.error(chalk.red(`Error: ${reportPath} is not a portcheck report`));
        console.error(chalk.dim(errorMessage(error)));
        process.exit(2);
        return;
    }

    const parsed = SavedReportSchema.safeParse(raw);
    if (!parsed.success) {
        console.error(chalk.red(`Error: ${reportPath} is not a portcheck report`));
        process.exit(2);
        return;
    }
    const saved = parsed.data;
    const { report } = saved;

    console.log(chalk.bold('\n📋 portcheck Report Explanation\n'));
    console.log(chalk.bold('Status: ') + (saved.pass ? chalk.green.bold('✅ PASS') : chalk.red.bold('🛑 FAIL')));
    console.log(chalk.dim(`Generated ${saved.generatedAt} | threshold ${saved.threshold}% | policy ${saved.policy}`));

    console.log(chalk.bold('\nCoverage: ') + formatPercentage(report.percentage));
    console.log(`  Functions: ${report.implementedFunctions}/${report.totalFunctions} (${formatPercentage(percentageOf(report.implementedFunctions, report.totalFunctions))})`);
    console.log(`  Classes:   ${report.implementedClasses}/${report.totalClasses} (${formatPercentage(percentageOf(report.implementedClasses, report.totalClasses))})`);

    const failedModules = saved.modules.filter(m => m.error !== undefined);
    if (failedModules.length > 0) {
        console.log(chalk.bold.red('\nUnreadable reference modules:'));
        for (const mod of failedModules) console.log(chalk.red(`  - ${mod.module}: ${mod.error}`));
    }

    const missing = [
        ...report.missing.functions.map(item => ({ ...item, kind: 'function' })),
        ...report.missing.classes.map(item => ({ ...item, kind: 'class' })),
    ];
    if (missing.length === 0) {
        console.log(chalk.green('\nEvery extracted symbol has a counterpart.'));
        return;
    }

    console.log(chalk.bold(`\nMissing items (${missing.length}):`));
    for (const [module, items] of groupByModule(missing)) {
        console.log(chalk.bold(`\n  ${module}`));
        for (const item of items) {
            console.log(`    • ${chalk.red(item.name)} ${chalk.dim(`[${item.kind}]`)}`);
        }
    }
    console.log(chalk.dim('\nMatching is textual: a name counts as present when it appears anywhere in a candidate file.'));
}
