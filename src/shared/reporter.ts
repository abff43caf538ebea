/**
 * @file reporter.ts
 * @module shared/reporter
 * @license MIT
 *
 * @fileoverview Console output for a generator run: progress lines, counted
 * warnings and the closing summary.
 */

/**
 * Where output ends up. `console` satisfies this interface.
 */
export interface Logger {
    log(message: string): void;
    error(message: string): void;
}

const ORANGE = '\x1b[38;5;208m';
const DIM = '\x1b[2m';
const RESET = '\x1b[0m';

/**
 * Counts warnings and formats every message the generator prints.
 *
 * @example
 * ```typescript
 * const reporter = new Reporter();
 * reporter.warn('yml/word-graph.yml', 'no doxygen output found for WordGraph');
 * reporter.getWarningCount(); // 1
 * ```
 */
export class Reporter {
    private logger: Logger;
    private color: boolean;
    private warnings = 0;
    private reportedMissing: Set<string> = new Set();

    /**
     * @param logger - Output sink, `console` unless a test captures output
     * @param color - Wrap warnings in ANSI colour codes
     */
    constructor(logger: Logger = console, color: boolean = process.stderr.isTTY === true) {
        this.logger = logger;
        this.color = color;
    }

    info(message: string, file?: string): void {
        this.logger.log(file !== undefined ? `${file}: ${message}` : message);
    }

    /**
     * Print a warning attributed to a page spec and count it.
     */
    warn(file: string, message: string): void {
        this.warnings++;
        const text = `WARNING in ${file}: ${message}`;
        this.logger.error(this.color ? `${ORANGE}${text}${RESET}` : text);
    }

    /**
     * Warn that a symbol has no descriptor. Each (name, params) pair is
     * reported once per run, however often it is looked up.
     */
    warnMissing(file: string, name: string, params: string | null): void {
        const key = `${name}${params ?? ''}`;
        if (this.reportedMissing.has(key)) {
            return;
        }
        this.reportedMissing.add(key);
        this.warn(file, `no doxygen output found for ${key}`);
    }

    /**
     * Print output of an external tool de-emphasised.
     */
    dimmed(message: string): void {
        this.logger.log(this.color ? `${DIM}${message}${RESET}` : message);
    }

    getWarningCount(): number {
        return this.warnings;
    }

    summary(rewritten: number, attempted: number): void {
        this.info(`Summary: ${rewritten} / ${attempted} files rewritten and ${this.warnings} warnings!!`);
    }
}
