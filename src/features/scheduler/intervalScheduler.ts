import { describeError } from '../../helper/helper';
import { MAX_TIMER_DELAY_MS } from '../../utils/constant';

export interface IntervalSchedulerOptions {
    name: string;
    intervalMs: number;
    task: () => Promise<unknown>;
}

/**
 * Runs a task once on start and then on a fixed interval, one run at a time.
 * A tick that fires while the previous run is still going is skipped, not queued.
 */
export class IntervalScheduler {
    private readonly name: string;
    private readonly intervalMs: number;
    private readonly task: () => Promise<unknown>;
    private timer: NodeJS.Timeout | null = null;
    private inFlight: Promise<void> | null = null;
    private skipped = 0;

    constructor({ name, intervalMs, task }: IntervalSchedulerOptions) {
        if (!Number.isFinite(intervalMs) || intervalMs <= 0 || intervalMs > MAX_TIMER_DELAY_MS) {
            throw new Error(`Invalid interval for ${name}: ${intervalMs}`);
        }
        this.name = name;
        this.intervalMs = intervalMs;
        this.task = task;
    }

    get running(): boolean {
        return this.timer !== null;
    }

    get busy(): boolean {
        return this.inFlight !== null;
    }

    get skippedTicks(): number {
        return this.skipped;
    }

    /**
     * Start the timer and kick off the first run immediately.
     *
     * @returns The first run, for callers that want to wait on it
     */
    start(): Promise<void> {
        if (this.timer) {
            return this.inFlight ?? Promise.resolve();
        }

        this.timer = setInterval(() => {
            void this.tick();
        }, this.intervalMs);

        console.log(`(INFO) Scheduler started - ${this.name} will run every ${this.intervalMs / 60_000} minute(s)`);
        return this.tick();
    }

    /**
     * Run the task now unless a run is already in progress.
     */
    tick(): Promise<void> {
        if (this.inFlight) {
            this.skipped++;
            console.warn(`(WARNING) ${this.name} is still running, skipping this tick`);
            return this.inFlight;
        }

        const run = Promise.resolve()
            .then(() => this.task())
            .then(() => undefined)
            .catch((error: unknown) => {
                console.error(`(ERROR) Error running ${this.name}: ${describeError(error)}`);
            })
            .finally(() => {
                this.inFlight = null;
            });

        this.inFlight = run;
        return run;
    }

    /**
     * Stop scheduling and wait for the current run, if any, to finish.
     */
    async stop(): Promise<void> {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
            console.log(`(INFO) Scheduler for ${this.name} stopped`);
        }
        if (this.inFlight) {
            await this.inFlight;
        }
    }
}
