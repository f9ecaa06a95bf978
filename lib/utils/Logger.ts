// IMPORTS
// ================================================================================================
import type { Logger as ILogger, LogFunction } from 'nfsr-cycles';
import { noop } from './index';

// INTERFACES
// ================================================================================================
interface TaskEntry {
    readonly prefix : string;
    readonly started: number;
    lastLogged      : number;
}

const SUB_TASK_PREFIX = '  ';

// CLASS DEFINITION
// ================================================================================================
export class Logger implements ILogger {

    private readonly tasks          : Map<LogFunction, TaskEntry>;
    private readonly enableSubLog   : boolean;

    // CONSTRUCTOR
    // --------------------------------------------------------------------------------------------
    constructor(enableSubLog = true) {
        this.tasks = new Map();
        this.enableSubLog = enableSubLog;
    }

    // PUBLIC METHODS
    // --------------------------------------------------------------------------------------------
    start(message?: string, prefix = ''): LogFunction {
        if (message) {
            console.log(`${prefix}${message}`);
        }

        const now = Date.now();
        const task: TaskEntry = { prefix, started: now, lastLogged: now };
        const log = (message: string) => {
            const now = Date.now();
            console.log(`${task.prefix}${message} in ${now - task.lastLogged} ms`);
            task.lastLogged = now;
        };
        this.tasks.set(log, task);
        return log;
    }

    /** Starts an indented task; returns a no-op when sub-task logging is disabled */
    sub(message?: string): LogFunction {
        return this.enableSubLog ? this.start(message, SUB_TASK_PREFIX) : noop;
    }

    done(log: LogFunction, message?: string): void {
        const task = this.tasks.get(log);
        if (!task) return;
        if (message) {
            console.log(`${task.prefix}${message} in ${Date.now() - task.started} ms`);
        }
        this.tasks.delete(log);
    }
}

// NOOP LOGGER
// ================================================================================================
export const noopLogger: ILogger = {
    start   : () => noop,
    sub     : () => noop,
    done    : () => undefined
};
