import chalk from 'chalk';
import { config, type LogLevel } from '../config/index.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export interface LogSink {
    write(line: string): void;
}

const stderrSink: LogSink = {
    write: (line: string) => {
        process.stderr.write(`${line}\n`);
    },
};

/**
 * Leveled, sectioned logger. Sections indent everything logged inside them
 * so nested pipeline stages read as a tree on the terminal.
 */
export class Logger {
    private indent = 0;

    constructor(
        private readonly level: LogLevel = config.logging.level,
        private readonly sink: LogSink = stderrSink
    ) {}

    debug(message: string): void {
        this.log('debug', chalk.gray(message));
    }

    info(message: string): void {
        this.log('info', message);
    }

    success(message: string): void {
        this.log('info', chalk.green(message));
    }

    warn(message: string): void {
        this.log('warn', chalk.yellow(message));
    }

    error(message: string): void {
        this.log('error', chalk.red(message));
    }

    async section<T>(title: string, body: () => Promise<T>): Promise<T> {
        this.log('info', chalk.blue(title));
        this.indent++;
        try {
            return await body();
        } finally {
            this.indent--;
        }
    }

    isEnabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
    }

    private log(level: LogLevel, message: string): void {
        if (!this.isEnabled(level)) return;
        this.sink.write('  '.repeat(this.indent) + message);
    }
}

export const logger = new Logger();
