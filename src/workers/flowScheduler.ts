/**
 * Flow scheduler
 *
 * Runs every registered playlist job once at startup and then on a fixed
 * interval. Each playlist has its own single-slot queue: a tick that arrives
 * while the previous cycle for the same playlist is still running is skipped.
 */

import PQueue from "p-queue";
import { isTransient } from "../utils/errors";
import { logger as rootLogger, type Logger } from "../utils/logger";

export type FlowJob = (now: Date) => Promise<unknown>;

export interface FlowSchedulerOptions {
    /** Minutes between ticks; 0 or less runs each job once. */
    intervalMinutes: number;
    clock?: () => Date;
    logger?: Logger;
}

export class FlowScheduler {
    private readonly jobs = new Map<string, FlowJob>();
    private readonly queues = new Map<string, PQueue>();
    private readonly clock: () => Date;
    private readonly log: Logger;
    private timer: NodeJS.Timeout | null = null;
    private stopped = false;

    constructor(private readonly options: FlowSchedulerOptions) {
        this.clock = options.clock ?? (() => new Date());
        this.log = (options.logger ?? rootLogger).child("scheduler");
    }

    register(playlistName: string, job: FlowJob): void {
        this.jobs.set(playlistName, job);
        this.queues.set(playlistName, new PQueue({ concurrency: 1 }));
    }

    get isRecurring(): boolean {
        return this.options.intervalMinutes > 0;
    }

    /**
     * Runs the job for one playlist. Resolves false without running when a
     * cycle for that playlist is already in flight or the scheduler stopped.
     * Job failures are logged, never rethrown, so the next tick still runs.
     */
    async trigger(playlistName: string): Promise<boolean> {
        const job = this.jobs.get(playlistName);
        const queue = this.queues.get(playlistName);
        if (!job || !queue) {
            throw new Error(`No flow job registered for "${playlistName}"`);
        }
        if (this.stopped) {
            return false;
        }
        if (queue.pending + queue.size > 0) {
            this.log.warn(
                `Previous cycle for "${playlistName}" still running; skipping this tick`
            );
            return false;
        }

        await queue.add(async () => {
            try {
                await job(this.clock());
            } catch (error) {
                if (isTransient(error)) {
                    this.log.warn(
                        `Flow cycle for "${playlistName}" failed; retrying on the next tick`,
                        { error }
                    );
                    return;
                }
                this.log.error(`Flow cycle for "${playlistName}" failed`, { error });
            }
        });
        return true;
    }

    async triggerAll(): Promise<void> {
        await Promise.all([...this.jobs.keys()].map((name) => this.trigger(name)));
    }

    /**
     * Runs every job immediately, then schedules the interval. Resolves once
     * the initial run has finished.
     */
    async start(): Promise<void> {
        this.stopped = false;
        if (!this.isRecurring) {
            this.log.warn("Run interval is not positive; running each flow once");
            await this.triggerAll();
            return;
        }

        const intervalMs = this.options.intervalMinutes * 60 * 1000;
        this.log.info(
            `Flows scheduled every ${this.options.intervalMinutes} minutes; running once now`
        );
        this.timer = setInterval(() => {
            void this.triggerAll();
        }, intervalMs);
        await this.triggerAll();
    }

    /** Stops future ticks and waits for in-flight cycles to finish. */
    async stop(): Promise<void> {
        this.stopped = true;
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
        await Promise.all([...this.queues.values()].map((queue) => queue.onIdle()));
    }
}
