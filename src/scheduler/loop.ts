/**
 * SCHEDULER LOOP
 *
 * Runs a task immediately and then every `intervalMs`. A tick that fires
 * while the previous run is still in flight is skipped, so runs never
 * overlap and store appends stay sequential.
 */

import createDebug from 'debug';
import { describeError } from '../lib/errors.js';

const log = createDebug('engine:scheduler');

export class SchedulerLoop {
    private timer: NodeJS.Timeout | undefined;
    private running: Promise<void> | undefined;
    private skipped = 0;

    constructor(
        private intervalMs: number,
        private task: () => Promise<unknown>,
        private onError: (err: unknown) => void = (err) => console.error('[scheduler] run failed:', describeError(err))
    ) { }

    start(): void {
        if (this.timer) return;
        void this.tick();
        this.timer = setInterval(() => { void this.tick(); }, this.intervalMs);
    }

    /** Stops scheduling; resolves once any in-flight run has settled. */
    stop(): Promise<void> {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = undefined;
        }
        return this.running ?? Promise.resolve();
    }

    get isRunning(): boolean {
        return this.running !== undefined;
    }

    get skippedTicks(): number {
        return this.skipped;
    }

    /** Starts a run unless one is in flight; resolves when the current run settles. */
    tick(): Promise<void> {
        if (this.running) {
            this.skipped++;
            log('previous run still in flight, skipping tick');
            return this.running;
        }
        const started = Date.now();
        this.running = this.task()
            .then(() => log('run finished in %dms', Date.now() - started))
            .catch((err: unknown) => this.onError(err))
            .finally(() => { this.running = undefined; });
        return this.running;
    }
}
