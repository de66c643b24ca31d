/**
 * Radar Composite CDN — Job Pool
 *
 * Bounded pool of async jobs. When every slot is busy, jobs wait in a FIFO
 * queue. A job receives a frozen copy of its input and an AbortSignal, and
 * its promise always resolves to an outcome; one failing job never rejects
 * its siblings.
 */

import { createLogger, type Logger } from '../log';

export type JobHandler<TJob, TResult> = (job: Readonly<TJob>, signal: AbortSignal) => Promise<TResult>;

export type JobOutcome<TResult> =
    | { status: 'fulfilled'; value: TResult }
    | { status: 'failed'; error: Error }
    | { status: 'abandoned' };

interface PendingJob {
    start: () => void;
    abandon: () => void;
}

interface RunningJob {
    controller: AbortController;
    done: Promise<void>;
    abandon: () => void;
}

export interface PoolShutdownResult {
    /** True when every running job settled within the grace period */
    completed: boolean;
    /** Queued or aborted jobs that never finished */
    abandoned: number;
}

export class WorkerPool {
    private running = new Set<RunningJob>();
    private queue: PendingJob[] = [];
    private closed = false;
    private readonly log: Logger;

    constructor(readonly size: number, logger?: Logger) {
        if (!Number.isInteger(size) || size < 1) {
            throw new Error(`Invalid pool size ${size}`);
        }
        this.log = logger ?? createLogger('pool');
    }

    get activeCount(): number {
        return this.running.size;
    }

    get queuedCount(): number {
        return this.queue.length;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    /**
     * Submit a job. After shutdown has begun the job is abandoned immediately.
     */
    run<TJob extends object, TResult>(job: TJob, handler: JobHandler<TJob, TResult>): Promise<JobOutcome<TResult>> {
        const frozen = Object.freeze({ ...job });

        return new Promise((resolve) => {
            if (this.closed) {
                resolve({ status: 'abandoned' });
                return;
            }

            const pending: PendingJob = {
                start: () => this.start(frozen, handler, resolve),
                abandon: () => resolve({ status: 'abandoned' })
            };
            this.queue.push(pending);
            this.processQueue();
        });
    }

    /**
     * Stop accepting work, abandon queued jobs, wait up to `graceMs` for
     * running jobs, then abort whatever is still running.
     */
    async shutdown(graceMs: number): Promise<PoolShutdownResult> {
        this.closed = true;
        const queued = this.queue.splice(0);
        for (const pending of queued) pending.abandon();

        const running = Array.from(this.running);
        if (running.length === 0) {
            return { completed: true, abandoned: queued.length };
        }

        let timer: ReturnType<typeof setTimeout> | undefined;
        const graceExpired = new Promise<'timeout'>((resolve) => {
            timer = setTimeout(() => resolve('timeout'), graceMs);
        });
        const settled = Promise.all(running.map((job) => job.done)).then(() => 'settled' as const);
        const winner = await Promise.race([settled, graceExpired]);
        clearTimeout(timer);

        if (winner === 'settled') {
            return { completed: true, abandoned: queued.length };
        }

        const stillRunning = Array.from(this.running);
        this.log.warn(`Grace period of ${graceMs}ms elapsed, aborting ${stillRunning.length} running job(s)`);
        for (const job of stillRunning) {
            job.controller.abort();
            job.abandon();
            this.running.delete(job);
        }
        return { completed: false, abandoned: queued.length + stillRunning.length };
    }

    private processQueue(): void {
        while (this.running.size < this.size && this.queue.length > 0) {
            const next = this.queue.shift();
            next?.start();
        }
    }

    private start<TJob, TResult>(
        job: Readonly<TJob>,
        handler: JobHandler<TJob, TResult>,
        resolve: (outcome: JobOutcome<TResult>) => void
    ): void {
        const controller = new AbortController();
        let settledOutcome = false;
        const settle = (outcome: JobOutcome<TResult>) => {
            if (settledOutcome) return;
            settledOutcome = true;
            resolve(outcome);
        };

        const entry: RunningJob = {
            controller,
            done: Promise.resolve(),
            abandon: () => settle({ status: 'abandoned' })
        };

        entry.done = Promise.resolve()
            .then(() => handler(job, controller.signal))
            .then(
                (value) => settle(controller.signal.aborted ? { status: 'abandoned' } : { status: 'fulfilled', value }),
                (error: unknown) => settle(
                    controller.signal.aborted
                        ? { status: 'abandoned' }
                        : { status: 'failed', error: error instanceof Error ? error : new Error(String(error)) }
                )
            )
            .finally(() => {
                this.running.delete(entry);
                this.processQueue();
            });

        this.running.add(entry);
    }
}
