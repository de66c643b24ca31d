/**
 * Radar Composite CDN — Scheduler
 *
 * Drives cycles on a fixed interval aligned to UTC boundaries. At most one
 * cycle runs at a time: a tick that lands while one is running is skipped
 * and counted. A failing cycle is logged and counted, and the timer keeps
 * firing. When a regular cycle finds nothing new, short quick checks follow
 * until data appears or the check limit is reached.
 */

import { createLogger, type Logger } from '../log';
import { msUntilNextBoundary } from '../time';
import { countDiscovered, type CycleReport } from '../types';

export type CycleRunner = (signal: AbortSignal) => Promise<CycleReport>;

export type TickKind = 'regular' | 'quick';

export interface SchedulerOptions {
    intervalMs: number;
    quickCheckIntervalMs: number;
    /** 0 disables quick checks */
    quickCheckLimit: number;
    /** Run one cycle as soon as `start()` is called */
    runImmediately?: boolean;
    /** Defaults to Date.now */
    now?: () => number;
    logger?: Logger;
}

export interface SchedulerStats {
    cyclesStarted: number;
    cyclesCompleted: number;
    cyclesFailed: number;
    ticksSkipped: number;
    quickChecks: number;
}

export interface SchedulerShutdownResult {
    /** False when the in-flight cycle had to be aborted */
    completed: boolean;
}

interface InFlightCycle {
    controller: AbortController;
    done: Promise<CycleReport | null>;
}

export class Scheduler {
    private readonly options: Required<Omit<SchedulerOptions, 'logger'>>;
    private readonly log: Logger;
    private current: InFlightCycle | null = null;
    private startTimer: ReturnType<typeof setTimeout> | undefined;
    private intervalTimer: ReturnType<typeof setInterval> | undefined;
    private quickTimer: ReturnType<typeof setTimeout> | undefined;
    private started = false;
    private stopped = false;

    readonly stats: SchedulerStats = {
        cyclesStarted: 0,
        cyclesCompleted: 0,
        cyclesFailed: 0,
        ticksSkipped: 0,
        quickChecks: 0
    };

    constructor(private readonly runCycle: CycleRunner, options: SchedulerOptions) {
        if (options.intervalMs <= 0) throw new Error(`Invalid interval ${options.intervalMs}`);
        this.options = {
            intervalMs: options.intervalMs,
            quickCheckIntervalMs: options.quickCheckIntervalMs,
            quickCheckLimit: options.quickCheckLimit,
            runImmediately: options.runImmediately ?? false,
            now: options.now ?? Date.now
        };
        this.log = options.logger ?? createLogger('scheduler');
    }

    get isRunning(): boolean {
        return this.current !== null;
    }

    get isStopped(): boolean {
        return this.stopped;
    }

    /**
     * Arm the timer. The first regular tick fires on the next UTC multiple of
     * the interval, then every interval after that.
     */
    start(): void {
        if (this.started || this.stopped) return;
        this.started = true;

        const { intervalMs } = this.options;
        const firstDelay = msUntilNextBoundary(this.options.now(), intervalMs);
        this.log.info(`Started: every ${intervalMs}ms, first tick in ${firstDelay}ms`);

        this.startTimer = setTimeout(() => {
            this.startTimer = undefined;
            this.intervalTimer = setInterval(() => void this.tick('regular'), intervalMs);
            void this.tick('regular');
        }, firstDelay);

        if (this.options.runImmediately) {
            void this.tick('regular');
        }
    }

    /**
     * Run one cycle unless one is already running. Resolves to the report, or
     * null when the tick was skipped or the cycle failed. Never rejects.
     */
    tick(kind: TickKind = 'regular'): Promise<CycleReport | null> {
        if (this.stopped) return Promise.resolve(null);
        if (this.current) {
            this.stats.ticksSkipped++;
            this.log.warn(`Skipping ${kind} tick: previous cycle still running`);
            return Promise.resolve(null);
        }
        if (kind === 'regular') this.cancelQuickChecks();
        if (kind === 'quick') this.stats.quickChecks++;

        const controller = new AbortController();
        const cycle: InFlightCycle = { controller, done: Promise.resolve(null) };
        cycle.done = this.execute(kind, controller.signal).finally(() => {
            if (this.current === cycle) this.current = null;
        });
        this.current = cycle;
        return cycle.done;
    }

    /**
     * Stop the timers, then give the running cycle `graceMs` to finish
     * before aborting it.
     */
    async shutdown(graceMs: number): Promise<SchedulerShutdownResult> {
        this.stopped = true;
        clearTimeout(this.startTimer);
        clearInterval(this.intervalTimer);
        this.cancelQuickChecks();

        const cycle = this.current;
        if (!cycle) return { completed: true };

        let timer: ReturnType<typeof setTimeout> | undefined;
        const graceExpired = new Promise<'timeout'>((resolve) => {
            timer = setTimeout(() => resolve('timeout'), graceMs);
        });
        const winner = await Promise.race([cycle.done.then(() => 'done' as const), graceExpired]);
        clearTimeout(timer);

        if (winner === 'done') return { completed: true };

        this.log.warn(`Cycle still running after ${graceMs}ms, aborting`);
        cycle.controller.abort();
        return { completed: false };
    }

    private async execute(kind: TickKind, signal: AbortSignal): Promise<CycleReport | null> {
        this.stats.cyclesStarted++;
        let report: CycleReport;
        try {
            report = await this.runCycle(signal);
        } catch (error) {
            this.stats.cyclesFailed++;
            this.log.error(`${kind} cycle failed:`, error);
            return null;
        }

        this.stats.cyclesCompleted++;
        const discovered = countDiscovered(report);
        this.log.info(`${kind} cycle finished: ${discovered} new source file(s)`);

        if (kind === 'regular' && discovered === 0) {
            this.scheduleQuickCheck(this.options.quickCheckLimit);
        }
        return report;
    }

    private scheduleQuickCheck(remaining: number): void {
        this.cancelQuickChecks();
        if (remaining <= 0 || this.stopped) return;
        this.quickTimer = setTimeout(() => {
            this.quickTimer = undefined;
            void this.quickCheck(remaining);
        }, this.options.quickCheckIntervalMs);
    }

    private async quickCheck(remaining: number): Promise<void> {
        const report = await this.tick('quick');
        if (report && countDiscovered(report) > 0) {
            this.log.info('Quick check found new data');
            return;
        }
        this.scheduleQuickCheck(remaining - 1);
    }

    private cancelQuickChecks(): void {
        clearTimeout(this.quickTimer);
        this.quickTimer = undefined;
    }
}
