import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

/**
 * Resolve CLI version from local package.json at runtime.
 * Same depth from src/utils and dist/utils; falls back when the file is absent.
 */
export function getCliVersion(fallback = '0.0.0'): string {
    const modulePath = fileURLToPath(import.meta.url);
    const pkgPath = path.resolve(path.dirname(modulePath), '../../package.json');
    if (!fs.existsSync(pkgPath)) {
        return fallback;
    }
    const pkg = JSON.parse(fs.readFileSync(pkgPath, 'utf-8')) as { version?: unknown };
    if (typeof pkg.version === 'string' && pkg.version.trim().length > 0) {
        return pkg.version;
    }
    return fallback;
}
