/**
 * @module core/logging
 * @description Structured logging for training and evaluation runs
 *
 * Fixed field schemas (versioned, append-only) for step, episode, report and
 * event entries. Loggers are injected into runners and sync endpoints; the
 * framework never writes to a global logger.
 */

// ==================== Types ====================

/**
 * Log level for console output
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

/**
 * Base log entry structure (all logs must include these fields)
 */
export interface BaseLogEntry {
    /** Schema version for compatibility */
    schemaVersion: string;
    /** Run identifier (environment/algorithm pair) */
    task: string;
    /** Random seed for reproducibility */
    seed: number;
    /** Timestamp in milliseconds */
    timestamp: number;
}

/**
 * Step-level log entry
 */
export interface StepLogEntry extends BaseLogEntry {
    logType: 'step';
    episode: number;
    step: number;
    /** Player that acted */
    playerIndex: number;
    action: unknown;
    /** Reward of every player for this step */
    rewards: number[];
    done: boolean;
    info?: Record<string, unknown>;
}

/**
 * Episode-level summary log entry
 */
export interface EpisodeLogEntry extends BaseLogEntry {
    logType: 'episode';
    episode: number;
    totalSteps: number;
    episodeRewards: number[];
    doneReason: string;
    trainCount: number;
}

/**
 * Report-level log entry (final summary)
 */
export interface ReportLogEntry extends BaseLogEntry {
    logType: 'report';
    mode: 'train' | 'evaluate';
    totalEpisodes: number;
    totalSteps: number;
    /** Mean episode reward per player */
    avgEpisodeRewards: number[];
    avgEpisodeLength: number;
    trainCount: number;
    config: Record<string, unknown>;
}

/**
 * Free-form event (dropped message, skipped training step, ...)
 */
export interface EventLogEntry extends BaseLogEntry {
    logType: 'event';
    level: LogLevel;
    source: string;
    message: string;
    data?: Record<string, unknown>;
}

/**
 * Union of all log entry types
 */
export type LogEntry = StepLogEntry | EpisodeLogEntry | ReportLogEntry | EventLogEntry;

type EntryInput<T extends LogEntry> = Omit<T, 'logType' | 'schemaVersion' | 'timestamp' | 'task' | 'seed'>;

export type StepLogInput = EntryInput<StepLogEntry>;
export type EpisodeLogInput = EntryInput<EpisodeLogEntry>;
export type ReportLogInput = EntryInput<ReportLogEntry>;
export type EventLogInput = EntryInput<EventLogEntry>;

/**
 * Logger interface
 */
export interface Logger {
    /** Log a step */
    logStep(entry: StepLogInput): void;
    /** Log episode summary */
    logEpisode(entry: EpisodeLogInput): void;
    /** Log final report */
    logReport(entry: ReportLogInput): void;
    /** Log an event */
    logEvent(entry: EventLogInput): void;
    /** Flush pending writes */
    flush(): void;
    /** Close the logger */
    close(): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    task: string;
    seed: number;
    /** Schema version */
    schemaVersion?: string;
    /** Minimum level printed by the console logger */
    level?: LogLevel;
}

// ==================== Constants ====================

export const LOG_SCHEMA_VERSION = '1.0.0';

function formatRewards(rewards: readonly number[]): string {
    return `[${rewards.map(r => r.toFixed(3)).join(', ')}]`;
}

// ==================== Console Logger ====================

/**
 * Console Logger: Print to console (for debugging)
 */
export class ConsoleLogger implements Logger {
    private level: LogLevel;
    private config: { task: string; seed: number };

    constructor(levelOrConfig: LogLevel | LoggerConfig = 'info') {
        if (typeof levelOrConfig === 'string') {
            this.level = levelOrConfig;
            this.config = { task: 'unknown', seed: 0 };
        } else {
            this.level = levelOrConfig.level ?? 'info';
            this.config = { task: levelOrConfig.task, seed: levelOrConfig.seed };
        }
    }

    private enabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
    }

    logStep(entry: StepLogInput): void {
        if (this.enabled('debug')) {
            console.log(
                `[STEP] ${this.config.task} E${entry.episode} S${entry.step} P${entry.playerIndex}: ` +
                `action=${JSON.stringify(entry.action)}, rewards=${formatRewards(entry.rewards)}`
            );
        }
    }

    logEpisode(entry: EpisodeLogInput): void {
        if (this.enabled('info')) {
            console.log(
                `[EPISODE] ${this.config.task} E${entry.episode}: steps=${entry.totalSteps}, ` +
                `rewards=${formatRewards(entry.episodeRewards)}, done=${entry.doneReason}, train=${entry.trainCount}`
            );
        }
    }

    logReport(entry: ReportLogInput): void {
        console.log(
            `[REPORT] ${this.config.task} (${entry.mode}) Episodes=${entry.totalEpisodes}, ` +
            `AvgRewards=${formatRewards(entry.avgEpisodeRewards)}, ` +
            `AvgLength=${entry.avgEpisodeLength.toFixed(1)}`
        );
    }

    logEvent(entry: EventLogInput): void {
        if (!this.enabled(entry.level)) {
            return;
        }
        const line = `[${entry.level.toUpperCase()}] ${entry.source}: ${entry.message}`;
        if (entry.level === 'error') {
            console.error(line, entry.data ?? '');
        } else if (entry.level === 'warn') {
            console.warn(line, entry.data ?? '');
        } else {
            console.log(line, entry.data ?? '');
        }
    }

    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }
}

// ==================== Memory Logger ====================

/**
 * Memory Logger: Store logs in memory
 * Useful for testing and for post-run analysis.
 */
export class MemoryLogger implements Logger {
    private config: { task: string; seed: number; schemaVersion: string };
    public steps: StepLogEntry[] = [];
    public episodes: EpisodeLogEntry[] = [];
    public reports: ReportLogEntry[] = [];
    public events: EventLogEntry[] = [];

    constructor(config: LoggerConfig) {
        this.config = {
            task: config.task,
            seed: config.seed,
            schemaVersion: config.schemaVersion ?? LOG_SCHEMA_VERSION,
        };
    }

    private createBaseEntry(): BaseLogEntry {
        return {
            schemaVersion: this.config.schemaVersion,
            task: this.config.task,
            seed: this.config.seed,
            timestamp: Date.now(),
        };
    }

    logStep(entry: StepLogInput): void {
        this.steps.push({ ...this.createBaseEntry(), logType: 'step', ...entry });
    }

    logEpisode(entry: EpisodeLogInput): void {
        this.episodes.push({ ...this.createBaseEntry(), logType: 'episode', ...entry });
    }

    logReport(entry: ReportLogInput): void {
        this.reports.push({ ...this.createBaseEntry(), logType: 'report', ...entry });
    }

    logEvent(entry: EventLogInput): void {
        this.events.push({ ...this.createBaseEntry(), logType: 'event', ...entry });
    }

    /** Get all logs */
    getAllLogs(): LogEntry[] {
        return [...this.steps, ...this.episodes, ...this.reports, ...this.events];
    }

    /** Export to JSON string */
    toJSON(): string {
        return JSON.stringify({
            steps: this.steps,
            episodes: this.episodes,
            reports: this.reports,
            events: this.events,
        }, null, 2);
    }

    /** Export to JSONL string */
    toJSONL(): string {
        return this.getAllLogs().map(entry => JSON.stringify(entry)).join('\n');
    }

    clear(): void {
        this.steps = [];
        this.episodes = [];
        this.reports = [];
        this.events = [];
    }

    flush(): void { /* no-op for memory logger */ }
    close(): void { /* no-op for memory logger */ }
}
