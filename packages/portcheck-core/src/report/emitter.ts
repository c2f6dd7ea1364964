import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import {
    CoverageReport,
    MatchResult,
    MissingItem,
    MissingItemSchema,
    Outcome,
    OutputPaths,
    Policy,
    SavedReport,
    VerificationResult,
} from '../types/index.js';
import { percentageOf } from '../aggregate/aggregator.js';

const RULE = '='.repeat(50);

export interface EmitOptions {
    cwd: string;
    threshold: number;
    output: OutputPaths;
    policy: Policy;
}

export interface ArtifactPaths {
    missingFunctions: string;
    missingClasses: string;
}

export function formatPercentage(value: number): string {
    return `${value.toFixed(1)}%`;
}

export function isPassing(report: CoverageReport, threshold: number): boolean {
    return report.percentage >= threshold;
}

function matchLine(label: string, match: MatchResult): string {
    const status = match.found ? `✅ Found in ${match.location}` : `❌ ${match.location}`;
    return `  ${label} '${match.symbol.name}': ${status}`;
}

/**
 * Console report: one section per reference module, then the totals.
 * Lines carry no colour so the text can be stored or compared as is.
 */
export function renderReport(result: VerificationResult, threshold: number): string {
    const { report } = result;
    const lines: string[] = [
        '=== Migration Coverage Verification ===',
        `Generated: ${result.generatedAt}`,
        '',
        '## Reference Module Analysis',
        RULE,
    ];

    for (const mod of result.modules) {
        lines.push('', `### Analyzing ${mod.module}`);
        if (mod.error !== undefined) {
            lines.push(`❌ Error analyzing ${mod.module}: ${mod.error}`);
            continue;
        }
        lines.push(`Found ${mod.functions.length} functions and ${mod.classes.length} classes`);
        for (const match of mod.functions) lines.push(matchLine('Function', match));
        for (const match of mod.classes) lines.push(matchLine('Class', match));
    }

    if (result.skipped.length > 0) {
        lines.push('', `Skipped (module file not found): ${result.skipped.join(', ')}`);
    }

    const implemented = report.implementedFunctions + report.implementedClasses;
    const total = report.totalFunctions + report.totalClasses;
    const missing = report.missing.functions.length + report.missing.classes.length;

    lines.push(
        '',
        '## Summary',
        RULE,
        `Functions: ${report.implementedFunctions}/${report.totalFunctions} implemented (${formatPercentage(percentageOf(report.implementedFunctions, report.totalFunctions))})`,
        `Classes: ${report.implementedClasses}/${report.totalClasses} implemented (${formatPercentage(percentageOf(report.implementedClasses, report.totalClasses))})`,
        `Overall: ${implemented}/${total} (${formatPercentage(report.percentage)})`,
        '',
        `📊 Coverage: ${formatPercentage(report.percentage)} (threshold ${threshold}%)`,
        `📋 Missing items: ${missing}`,
        '',
        isPassing(report, threshold)
            ? '🎉 High confidence: most functionality has a counterpart in the candidate corpus.'
            : '⚠️  Some significant functionality may be missing.',
    );

    return lines.join('\n');
}

/** Overwrites both missing-item artifacts. Paths resolve against `cwd`. */
export async function writeArtifacts(cwd: string, report: CoverageReport, output: OutputPaths): Promise<ArtifactPaths> {
    const missingFunctions = path.resolve(cwd, output.missing_functions);
    const missingClasses = path.resolve(cwd, output.missing_classes);

    await fs.outputJson(missingFunctions, report.missing.functions);
    await fs.outputJson(missingClasses, report.missing.classes);

    return { missingFunctions, missingClasses };
}

export async function readArtifact(filePath: string): Promise<MissingItem[]> {
    const raw: unknown = await fs.readJson(filePath);
    return z.array(MissingItemSchema).parse(raw);
}

export class ReportEmitter {
    constructor(private readonly options: EmitOptions) { }

    async emit(result: VerificationResult): Promise<Outcome> {
        const { cwd, threshold, output } = this.options;
        const pass = isPassing(result.report, threshold);
        const artifacts = await writeArtifacts(cwd, result.report, output);

        const reportPath = path.resolve(cwd, output.report_path);
        const saved: SavedReport = {
            ...result,
            pass,
            threshold,
            policy: this.options.policy,
        };
        await fs.outputJson(reportPath, saved, { spaces: 2 });

        return {
            pass,
            percentage: result.report.percentage,
            threshold,
            text: renderReport(result, threshold),
            artifacts: { ...artifacts, report: reportPath },
        };
    }
}
