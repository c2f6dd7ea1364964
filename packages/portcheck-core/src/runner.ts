import { Config, MatchResult, ModuleResult, VerificationResult } from './types/index.js';
import { ModuleDiscovery } from './discovery.js';
import { extractModule } from './extract/extractor.js';
import { createMatcher } from './search/matcher.js';
import { createSearcher, EquivalenceSearcher } from './search/searcher.js';
import { CoverageAggregator } from './aggregate/aggregator.js';
import { Logger } from './utils/logger.js';

export class VerificationRunner {
    constructor(private config: Config) { }

    async run(cwd: string): Promise<VerificationResult> {
        const start = Date.now();
        const generatedAt = new Date().toISOString();

        // 0. Select reference modules
        const { modules, skipped } = await new ModuleDiscovery().discover(cwd, this.config.reference);
        Logger.debug(`Resolved ${modules.length} reference module(s), ${skipped.length} skipped`);

        // 1. Prepare the candidate corpus
        const matcher = createMatcher(this.config.matcher);
        const searcher = await createSearcher(this.config.search.strategy, cwd, this.config.candidates, matcher);

        // 2. Extract, search, aggregate
        const aggregator = new CoverageAggregator();
        const results: ModuleResult[] = [];
        for (const mod of modules) {
            const extraction = await extractModule(mod.path, mod.module, this.config.extraction);
            const result: ModuleResult = { module: mod.module, path: mod.path, functions: [], classes: [] };

            if (extraction.error !== undefined) {
                Logger.warn(`Error analyzing ${mod.module}: ${extraction.error}`);
                result.error = extraction.error;
            }

            for (const symbol of extraction.symbols) {
                const match = await this.match(searcher, symbol);
                if (symbol.kind === 'function') result.functions.push(match);
                else result.classes.push(match);
            }

            aggregator.add(result);
            results.push(result);
        }

        return {
            generatedAt,
            modules: results,
            skipped,
            report: aggregator.report(),
            stats: {
                duration_ms: Date.now() - start,
                candidate_files: searcher.fileCount,
            },
        };
    }

    private async match(searcher: EquivalenceSearcher, symbol: MatchResult['symbol']): Promise<MatchResult> {
        const hit = await searcher.search(symbol.name);
        return { symbol, found: hit.found, location: hit.location };
    }
}
