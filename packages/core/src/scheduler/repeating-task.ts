import { errorMessage } from '../errors.js';

export type RepeatingTaskFn = (signal: AbortSignal) => Promise<void> | void;

export interface RepeatingTaskOptions {
    initialDelayMs: number;
    /** Delay between the end of one run and the start of the next. */
    gapMs: number;
    onError?: (error: unknown, taskName: string) => void;
}

function logTaskError(error: unknown, taskName: string): void {
    console.error(`[SCHEDULER] Task '${taskName}' failed: ${errorMessage(error)}`);
}

/**
 * Fixed-delay executor: waits `initialDelayMs`, runs the task to completion, waits
 * `gapMs`, and repeats until stopped. Slow runs push later runs back.
 */
export class RepeatingTask {
    public readonly name: string;
    private readonly task: RepeatingTaskFn;
    private readonly initialDelayMs: number;
    private readonly gapMs: number;
    private readonly onError: (error: unknown, taskName: string) => void;
    private readonly abortController = new AbortController();
    private timer: NodeJS.Timeout | null = null;
    private inFlight: Promise<void> | null = null;
    private started = false;
    private runCount = 0;

    constructor(name: string, task: RepeatingTaskFn, options: RepeatingTaskOptions) {
        this.name = name;
        this.task = task;
        this.initialDelayMs = Math.max(0, options.initialDelayMs);
        this.gapMs = Math.max(0, options.gapMs);
        this.onError = options.onError ?? logTaskError;
    }

    public get runs(): number {
        return this.runCount;
    }

    public get stopped(): boolean {
        return this.abortController.signal.aborted;
    }

    public start(): void {
        if (this.started || this.stopped) {
            return;
        }
        this.started = true;
        this.schedule(this.initialDelayMs);
    }

    /** Cancels the pending run and resolves once the in-flight run has settled. */
    public async stop(): Promise<void> {
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        if (!this.stopped) {
            this.abortController.abort();
        }
        if (this.inFlight) {
            await this.inFlight;
        }
    }

    private schedule(delayMs: number): void {
        if (this.stopped) {
            return;
        }
        this.timer = setTimeout(() => {
            this.timer = null;
            this.inFlight = this.runOnce().finally(() => {
                this.inFlight = null;
                this.schedule(this.gapMs);
            });
        }, delayMs);
    }

    private async runOnce(): Promise<void> {
        this.runCount += 1;
        try {
            await this.task(this.abortController.signal);
        } catch (error) {
            if (this.stopped) {
                return;
            }
            try {
                this.onError(error, this.name);
            } catch (hookError) {
                logTaskError(hookError, this.name);
            }
        }
    }
}
