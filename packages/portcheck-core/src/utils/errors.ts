/**
 * Raised for a missing, unparsable or invalid portcheck.yml.
 * `issues` lists `path: message` pairs when the schema rejected the file.
 */
export class ConfigError extends Error {
    constructor(message: string, public readonly issues: string[] = []) {
        super(message);
        this.name = 'ConfigError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
