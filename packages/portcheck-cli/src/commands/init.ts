import fs from 'fs-extra';
import chalk from 'chalk';
import { detectTemplate, renderStarterConfig, resolveConfigPath } from '@portcheck/core';

export interface InitOptions {
    force?: boolean;
    dryRun?: boolean;
    reference?: string;
}

export async function initCommand(cwd: string, options: InitOptions = {}) {
    const configPath = resolveConfigPath(cwd);
    const { template, marker } = await detectTemplate(cwd);
    const content = renderStarterConfig({ template, referenceRoot: options.reference });

    if (marker) {
        console.log(chalk.dim(`Detected ${template.name} rewrite (${marker})`));
    } else {
        console.log(chalk.dim(`No project marker found, using the ${template.name} layout`));
    }

    if (options.dryRun) {
        console.log(content);
        return;
    }

    if (await fs.pathExists(configPath) && !options.force) {
        console.log(chalk.yellow('portcheck.yml already exists. Use --force to overwrite.'));
        return;
    }

    await fs.writeFile(configPath, content);
    console.log(chalk.green(`✔ Created ${configPath}`));
    console.log(chalk.dim('Edit reference.root and the candidate roots, then run `portcheck check`.'));
}
