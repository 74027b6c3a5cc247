import pino from 'pino';
import type { LogLevel } from '../types/index.js';

export interface LoggerOptions {
    level?: LogLevel;
    /** One JSON object per line instead of pino-pretty output */
    jsonLogs?: boolean;
}

/** Pipeline stage a log record comes from. */
export type LogStage = 'parse' | 'classify' | 'calibrate' | 'digitize' | 'cv' | 'export' | 'config' | 'cli';

let root: pino.Logger | null = null;
const stages = new Map<LogStage, pino.Logger>();

/**
 * Configure the shared logger. Records go to stderr so that stdout stays
 * free for command output. Loggers handed out earlier keep the previous
 * setup; library code calls `getLogger()` at each log site.
 */
export function initLogger(options: LoggerOptions = {}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    root = jsonLogs
        ? pino({ name: 'vecplot', level }, pino.destination(2))
        : pino({
              name: 'vecplot',
              level,
              transport: {
                  target: 'pino-pretty',
                  options: {
                      colorize: true,
                      translateTime: 'HH:MM:ss',
                      ignore: 'pid,hostname,name',
                      messageFormat: '{if stage}[{stage}] {end}{msg}',
                      destination: 2,
                  },
              },
          });
    stages.clear();

    return root;
}

/**
 * The shared logger, or a child bound to `stage`. Falls back to an
 * info-level pretty logger when `initLogger()` has not run.
 */
export function getLogger(stage?: LogStage): pino.Logger {
    const base = root ?? initLogger();
    if (stage === undefined) return base;

    let child = stages.get(stage);
    if (!child) {
        child = base.child({ stage });
        stages.set(stage, child);
    }
    return child;
}
