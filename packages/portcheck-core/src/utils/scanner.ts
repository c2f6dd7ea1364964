import { globby } from 'globby';
import fs from 'fs-extra';
import path from 'path';
import { TextDecoder } from 'util';

export interface ScannerOptions {
    cwd: string;
    patterns: string[];
    ignore?: string[];
}

export class FileScanner {
    /**
     * Relative, `/`-separated paths of the files under `cwd` matching `patterns`.
     * Hidden files are included. A missing `cwd` yields no files.
     */
    static async findFiles(options: ScannerOptions): Promise<string[]> {
        const normalizedCwd = options.cwd.replace(/\\/g, '/');
        if (!(await fs.pathExists(normalizedCwd))) {
            return [];
        }
        const patterns = options.patterns.map(p => p.replace(/\\/g, '/'));
        const ignore = (options.ignore || []).map(p => p.replace(/\\/g, '/'));

        return globby(patterns, {
            cwd: normalizedCwd,
            ignore,
            dot: true,
            onlyFiles: true,
        });
    }

    /**
     * Reads a file as strict UTF-8. Throws on I/O errors and on byte sequences
     * that are not valid UTF-8.
     */
    static async readText(filePath: string): Promise<string> {
        const buffer = await fs.readFile(filePath);
        return new TextDecoder('utf-8', { fatal: true }).decode(buffer);
    }

    /** `*.hpp` style patterns match at any depth; patterns with a slash are used as given. */
    static recursivePattern(pattern: string): string {
        return pattern.includes('/') ? pattern : `**/${pattern}`;
    }

    static toPosix(p: string): string {
        return p.split(path.sep).join('/');
    }
}
