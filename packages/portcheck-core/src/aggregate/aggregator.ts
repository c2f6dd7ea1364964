import { CoverageReport, MatchResult, MissingItem, ModuleResult } from '../types/index.js';

/** `implemented / total * 100`, or 100 when there is nothing to implement. */
export function percentageOf(implemented: number, total: number): number {
    return total > 0 ? (implemented / total) * 100 : 100;
}

export class CoverageAggregator {
    private totalFunctions = 0;
    private implementedFunctions = 0;
    private totalClasses = 0;
    private implementedClasses = 0;
    private missingFunctions: MissingItem[] = [];
    private missingClasses: MissingItem[] = [];

    add(result: ModuleResult): this {
        for (const match of result.functions) this.record(match);
        for (const match of result.classes) this.record(match);
        return this;
    }

    record(match: MatchResult): this {
        const { symbol } = match;
        if (symbol.kind === 'function') {
            this.totalFunctions++;
            if (match.found) this.implementedFunctions++;
            else this.missingFunctions.push({ name: symbol.name, module: symbol.module });
        } else {
            this.totalClasses++;
            if (match.found) this.implementedClasses++;
            else this.missingClasses.push({ name: symbol.name, module: symbol.module });
        }
        return this;
    }

    report(): CoverageReport {
        return {
            totalFunctions: this.totalFunctions,
            implementedFunctions: this.implementedFunctions,
            totalClasses: this.totalClasses,
            implementedClasses: this.implementedClasses,
            missing: {
                functions: [...this.missingFunctions],
                classes: [...this.missingClasses],
            },
            percentage: percentageOf(
                this.implementedFunctions + this.implementedClasses,
                this.totalFunctions + this.totalClasses,
            ),
        };
    }
}

export function aggregate(results: ModuleResult[]): CoverageReport {
    const aggregator = new CoverageAggregator();
    for (const result of results) aggregator.add(result);
    return aggregator.report();
}
