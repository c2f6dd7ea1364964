import fs from 'fs-extra';
import path from 'path';
import yaml from 'yaml';
import { ZodError } from 'zod';
import { Config, ConfigSchema, Policy } from './types/index.js';
import { ConfigError, errorMessage } from './utils/errors.js';

export const CONFIG_FILE = 'portcheck.yml';

export function resolveConfigPath(cwd: string, configPath?: string): string {
    return configPath ? path.resolve(cwd, configPath) : path.join(cwd, CONFIG_FILE);
}

/** Command-line values that replace the file's before validation. */
export interface ConfigOverrides {
    policy?: Policy;
    threshold?: number;
}

function applyOverrides(raw: unknown, overrides: ConfigOverrides): unknown {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return raw;
    const merged: Record<string, unknown> = { ...raw };
    if (overrides.policy !== undefined) merged.policy = overrides.policy;
    if (overrides.threshold !== undefined) merged.threshold = overrides.threshold;
    return merged;
}

export function parseConfig(content: string, overrides: ConfigOverrides = {}): Config {
    let raw: unknown;
    try {
        raw = yaml.parse(content);
    } catch (error) {
        throw new ConfigError(`Invalid YAML: ${errorMessage(error)}`);
    }

    try {
        return ConfigSchema.parse(applyOverrides(raw, overrides));
    } catch (error) {
        if (error instanceof ZodError) {
            const issues = error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
            throw new ConfigError('Invalid portcheck configuration', issues);
        }
        throw error;
    }
}

export async function loadConfig(cwd: string, configPath?: string, overrides: ConfigOverrides = {}): Promise<Config> {
    const fullPath = resolveConfigPath(cwd, configPath);
    if (!(await fs.pathExists(fullPath))) {
        throw new ConfigError(`Config file not found at ${fullPath}`);
    }
    return parseConfig(await fs.readFile(fullPath, 'utf-8'), overrides);
}
