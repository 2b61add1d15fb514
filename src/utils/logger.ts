import fs from 'fs';
import path from 'path';

type ConsoleMethod = 'log' | 'error' | 'warn' | 'info' | 'debug';

const CONSOLE_METHODS: ConsoleMethod[] = ['log', 'error', 'warn', 'info', 'debug'];

let active_stream: fs.WriteStream | null = null;
let hooks_installed = false;

/**
 * Mirror every console call into `<log_dir>/<file_name>` with a timestamp and level.
 * While a file is open, further calls return its path unchanged.
 *
 * @returns Path of the log file
 */
export function setupFileLogging(log_dir: string, file_name = 'index.log'): string {
    const log_file = path.join(log_dir, file_name);
    if (active_stream) return log_file;

    if (!fs.existsSync(log_dir)) fs.mkdirSync(log_dir, { recursive: true });

    active_stream = fs.createWriteStream(log_file, { flags: 'a' });

    if (!hooks_installed) {
        hooks_installed = true;
        for (const method of CONSOLE_METHODS) {
            const original = console[method].bind(console);
            console[method] = (...args: unknown[]) => {
                active_stream?.write(formatLogLine(method, args, new Date()));
                original(...args);
            };
        }
    }

    return log_file;
}

/**
 * Close the log file; pending writes are flushed first.
 */
export function closeFileLogging(): Promise<void> {
    const log_stream = active_stream;
    if (!log_stream) return Promise.resolve();
    active_stream = null;
    return new Promise((resolve) => {
        log_stream.end(() => resolve());
    });
}

export function formatLogLine(method: ConsoleMethod, args: unknown[], now: Date): string {
    const message = args.map((arg) => (arg instanceof Error ? arg.stack ?? arg.message : String(arg))).join(' ');
    return `[${now.toISOString()}] [${method.toUpperCase()}] ${message}\n`;
}
