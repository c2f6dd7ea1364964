import path from 'path';
import { CandidateRoot, NOT_FOUND } from '../types/index.js';
import { FileScanner } from '../utils/scanner.js';
import { errorMessage } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { Matcher, SubstringMatcher } from './matcher.js';

export interface SearchHit {
    found: boolean;
    /** Path relative to the parent of the matching root, or `NOT FOUND`. */
    location: string;
}

export interface CandidateFile {
    absolutePath: string;
    location: string;
}

export interface EquivalenceSearcher {
    search(name: string): Promise<SearchHit>;
    /** Candidate files seen by the most recent walk. */
    readonly fileCount: number;
}

const MISS: SearchHit = { found: false, location: NOT_FOUND };

/**
 * Candidate files in traversal order: roots in configured order, then each
 * root's extension patterns in order. Roots that do not exist are passed over.
 * Order within one pattern is whatever the filesystem walk yields.
 */
export async function listCandidateFiles(cwd: string, roots: CandidateRoot[]): Promise<CandidateFile[]> {
    const files: CandidateFile[] = [];
    for (const candidate of roots) {
        const absoluteRoot = path.resolve(cwd, candidate.root);
        const parent = path.dirname(absoluteRoot);
        for (const extension of candidate.extensions) {
            const matches = await FileScanner.findFiles({
                cwd: absoluteRoot,
                patterns: [FileScanner.recursivePattern(extension)],
            });
            for (const relative of matches) {
                const absolutePath = path.join(absoluteRoot, relative);
                files.push({
                    absolutePath,
                    location: FileScanner.toPosix(path.relative(parent, absolutePath)),
                });
            }
        }
    }
    return files;
}

async function readLowered(file: CandidateFile): Promise<string | undefined> {
    try {
        return (await FileScanner.readText(file.absolutePath)).toLowerCase();
    } catch (error) {
        Logger.debug(`Skipping unreadable candidate ${file.location}: ${errorMessage(error)}`);
        return undefined;
    }
}

/** Walks and reads the candidate corpus again for every symbol. */
export class ScanningSearcher implements EquivalenceSearcher {
    private lastCount = 0;

    constructor(
        private readonly cwd: string,
        private readonly roots: CandidateRoot[],
        private readonly matcher: Matcher = new SubstringMatcher(),
    ) { }

    get fileCount(): number {
        return this.lastCount;
    }

    async search(name: string): Promise<SearchHit> {
        const files = await listCandidateFiles(this.cwd, this.roots);
        this.lastCount = files.length;
        for (const file of files) {
            const text = await readLowered(file);
            if (text !== undefined && this.matcher.matches(text, name)) {
                return { found: true, location: file.location };
            }
        }
        return MISS;
    }
}

/**
 * Reads the candidate corpus once into lower-cased text and answers every
 * search from memory. First-match order is the same as the scanning searcher's.
 */
export class IndexedSearcher implements EquivalenceSearcher {
    private constructor(
        private readonly entries: Array<{ location: string; text: string }>,
        private readonly listed: number,
        private readonly matcher: Matcher,
    ) { }

    static async build(cwd: string, roots: CandidateRoot[], matcher: Matcher = new SubstringMatcher()): Promise<IndexedSearcher> {
        const entries: Array<{ location: string; text: string }> = [];
        const files = await listCandidateFiles(cwd, roots);
        for (const file of files) {
            const text = await readLowered(file);
            if (text !== undefined) {
                entries.push({ location: file.location, text });
            }
        }
        return new IndexedSearcher(entries, files.length, matcher);
    }

    get fileCount(): number {
        return this.listed;
    }

    async search(name: string): Promise<SearchHit> {
        const entry = this.entries.find(e => this.matcher.matches(e.text, name));
        return entry ? { found: true, location: entry.location } : MISS;
    }
}

export async function createSearcher(
    strategy: 'index' | 'scan',
    cwd: string,
    roots: CandidateRoot[],
    matcher: Matcher,
): Promise<EquivalenceSearcher> {
    if (strategy === 'scan') {
        return new ScanningSearcher(cwd, roots, matcher);
    }
    return IndexedSearcher.build(cwd, roots, matcher);
}
