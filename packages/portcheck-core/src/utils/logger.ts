import chalk from 'chalk';

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
}

export interface LogFlags {
    /** Debug output, including skipped candidates. */
    verbose?: boolean;
    /** Machine-readable runs (`--json`, `--ci`): errors only unless verbose. */
    quiet?: boolean;
}

/**
 * Run diagnostics. Everything goes to stderr: stdout belongs to the report,
 * and under `check --json` it must hold nothing but the JSON document.
 */
export class Logger {
    private static level: LogLevel = LogLevel.INFO;

    static setLevel(level: LogLevel) {
        this.level = level;
    }

    static levelFor(flags: LogFlags): LogLevel {
        if (flags.verbose) return LogLevel.DEBUG;
        return flags.quiet ? LogLevel.ERROR : LogLevel.INFO;
    }

    static debug(message: string) {
        this.write(LogLevel.DEBUG, chalk.dim('debug: '), message);
    }

    static info(message: string) {
        this.write(LogLevel.INFO, chalk.blue('info: '), message);
    }

    static warn(message: string) {
        this.write(LogLevel.WARN, chalk.yellow('warn: '), message);
    }

    static error(message: string, error?: unknown) {
        this.write(LogLevel.ERROR, chalk.red('error: '), message);
        if (error instanceof Error && error.stack && this.level === LogLevel.DEBUG) {
            console.error(chalk.dim(error.stack));
        }
    }

    private static write(level: LogLevel, label: string, message: string) {
        if (this.level <= level) {
            console.error(label + message);
        }
    }
}
