import fs from 'fs-extra';
import path from 'path';
import { Reference } from './types/index.js';
import { FileScanner } from './utils/scanner.js';
import { Logger } from './utils/logger.js';

export interface ReferenceModule {
    /** `/`-separated path relative to the reference root. */
    module: string;
    path: string;
}

export interface DiscoveryResult {
    modules: ReferenceModule[];
    /** Configured modules whose files do not exist. */
    skipped: string[];
}

export class ModuleDiscovery {
    async discover(cwd: string, reference: Reference): Promise<DiscoveryResult> {
        const root = path.resolve(cwd, reference.root);
        const modules: ReferenceModule[] = [];
        const skipped: string[] = [];
        const seen = new Set<string>();

        // 1. Explicit modules, in configured order
        for (const entry of reference.modules) {
            const module = entry.replace(/\\/g, '/');
            const fullPath = path.join(root, module);
            if (!(await fs.pathExists(fullPath))) {
                Logger.warn(`Reference module not found, skipping: ${module}`);
                skipped.push(module);
                continue;
            }
            if (seen.has(module)) continue;
            seen.add(module);
            modules.push({ module, path: fullPath });
        }

        // 2. Auto-discovered modules, sorted and capped
        if (reference.discover) {
            const { dir, pattern, exclude, limit } = reference.discover;
            const discoverRoot = path.join(root, dir);
            const found = (await FileScanner.findFiles({ cwd: discoverRoot, patterns: [pattern], ignore: exclude }))
                .map(relative => FileScanner.toPosix(path.relative(root, path.join(discoverRoot, relative))))
                .sort();

            if (found.length > limit) {
                Logger.info(`Discovered ${found.length} modules under ${dir}, analyzing the first ${limit}`);
            }

            for (const module of found.slice(0, limit)) {
                if (seen.has(module)) continue;
                seen.add(module);
                modules.push({ module, path: path.join(root, module) });
            }
        }

        return { modules, skipped };
    }
}
