import { RepeatingTask, RepeatingTaskFn, RepeatingTaskOptions } from './repeating-task.js';

/**
 * Owns every background task of one client. Tasks are spawned by name and
 * all stopped together on shutdown.
 */
export class TaskGroup {
    private readonly tasks: Map<string, RepeatingTask> = new Map();
    private closed = false;

    public get size(): number {
        return this.tasks.size;
    }

    public get isClosed(): boolean {
        return this.closed;
    }

    public has(name: string): boolean {
        return this.tasks.has(name);
    }

    public get(name: string): RepeatingTask | undefined {
        return this.tasks.get(name);
    }

    public names(): string[] {
        return Array.from(this.tasks.keys());
    }

    /** Starts a task under `name`; returns the already running task if the name is taken. */
    public spawn(name: string, task: RepeatingTaskFn, options: RepeatingTaskOptions): RepeatingTask {
        if (this.closed) {
            throw new Error(`TaskGroup is closed; cannot spawn '${name}'`);
        }
        const existing = this.tasks.get(name);
        if (existing) {
            return existing;
        }
        const repeating = new RepeatingTask(name, task, options);
        this.tasks.set(name, repeating);
        repeating.start();
        return repeating;
    }

    public async stopAll(): Promise<void> {
        this.closed = true;
        const tasks = Array.from(this.tasks.values());
        await Promise.all(tasks.map((task) => task.stop()));
    }
}
