import fs from 'fs-extra';
import path from 'path';
import yaml from 'yaml';
import { CandidateRoot } from '../types/index.js';

/** Candidate layout of a rewrite, recognised by marker files at the project root. */
export interface Template {
    name: string;
    markers: string[];
    candidates: CandidateRoot[];
}

export const TEMPLATES: Template[] = [
    {
        name: 'cpp',
        markers: ['CMakeLists.txt', 'conanfile.py', 'conanfile.txt', 'meson.build'],
        candidates: [
            { root: 'include', extensions: ['*.hpp', '*.h'] },
            { root: 'src', extensions: ['*.cpp', '*.cc'] },
        ],
    },
    {
        name: 'rust',
        markers: ['Cargo.toml'],
        candidates: [
            { root: 'src', extensions: ['*.rs'] },
        ],
    },
    {
        name: 'go',
        markers: ['go.mod'],
        candidates: [
            { root: '.', extensions: ['*.go'] },
        ],
    },
    {
        name: 'typescript',
        markers: ['tsconfig.json', 'package.json'],
        candidates: [
            { root: 'src', extensions: ['*.ts'] },
        ],
    },
];

export const DEFAULT_TEMPLATE: Template = TEMPLATES[0];

export async function detectTemplate(cwd: string): Promise<{ template: Template; marker?: string }> {
    for (const template of TEMPLATES) {
        for (const marker of template.markers) {
            if (await fs.pathExists(path.join(cwd, marker))) {
                return { template, marker };
            }
        }
    }
    return { template: DEFAULT_TEMPLATE };
}

export interface StarterOptions {
    referenceRoot?: string;
    template?: Template;
}

/** YAML for a new portcheck.yml. Gating is left off until the port is close to done. */
export function renderStarterConfig(options: StarterOptions = {}): string {
    const template = options.template ?? DEFAULT_TEMPLATE;
    const doc = {
        version: 1,
        reference: {
            root: options.referenceRoot ?? 'reference',
            modules: [],
            discover: {
                dir: '.',
                pattern: '**/*.py',
                exclude: ['**/__init__.py', '**/tests/**'],
                limit: 10,
            },
        },
        candidates: template.candidates,
        extraction: {
            function_marker: 'def ',
            class_marker: 'class ',
            private_prefix: '_',
        },
        matcher: 'substring',
        search: { strategy: 'index' },
        threshold: 90,
        policy: 'advisory',
        output: {
            missing_functions: 'missing_functions.json',
            missing_classes: 'missing_classes.json',
            report_path: 'portcheck-report.json',
        },
    };
    return `# portcheck: migration coverage gate (${template.name} rewrite)\n` + yaml.stringify(doc);
}
