import { logger } from "../lib/debug-logger";
import { DEFAULT_JOIN_WARN_MS } from "../lib/runtime-config";
import { WorkerConflictError } from "../screens/errors";

/**
 * Cooperative cancellation handed to every worker task. Setting the flag is a
 * request only; the task must poll `cancelled` at safe points and return.
 */
export interface CancellationToken {
  readonly cancelled: boolean;
  readonly signal: AbortSignal;
}

export type WorkerTask = (token: CancellationToken) => void | Promise<void>;

export type WorkerOutcome =
  | { status: "completed" }
  | { status: "cancelled" }
  | { status: "failed"; error: string };

export type WorkerExitListener = (handle: WorkerHandle, outcome: WorkerOutcome) => void;

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class WorkerHandle {
  private readonly controller = new AbortController();
  private readonly done: Promise<WorkerOutcome>;
  private alive = true;

  constructor(
    public readonly name: string,
    task: WorkerTask,
    onExit: WorkerExitListener,
  ) {
    this.done = this.run(task).then((outcome) => {
      this.alive = false;
      onExit(this, outcome);
      return outcome;
    });
  }

  /** The kill flag. */
  public get killed(): boolean {
    return this.controller.signal.aborted;
  }

  public isAlive(): boolean {
    return this.alive;
  }

  public kill(): void {
    if (!this.killed) {
      this.controller.abort();
    }
  }

  /** Resolves once the task has returned. Never rejects. */
  public join(): Promise<WorkerOutcome> {
    return this.done;
  }

  private async run(task: WorkerTask): Promise<WorkerOutcome> {
    // Start on a later turn of the event loop so whoever spawned the worker
    // keeps control until it yields.
    await new Promise<void>((resolve) => {
      setImmediate(resolve);
    });

    const signal = this.controller.signal;
    const token: CancellationToken = {
      get cancelled() {
        return signal.aborted;
      },
      signal,
    };

    try {
      await task(token);
      return token.cancelled ? { status: "cancelled" } : { status: "completed" };
    } catch (error) {
      logger.workers.error("Worker task failed", { worker: this.name, error: describeError(error) });
      return { status: "failed", error: describeError(error) };
    }
  }
}

export interface WorkerRegistryOptions {
  /** Log a warning when a join takes longer than this. */
  joinWarnMs?: number;
}

/**
 * Name → live worker map. Owned by whoever orchestrates the screens and handed
 * to them by reference; at most one live worker per name.
 */
export class WorkerRegistry {
  private readonly workers = new Map<string, WorkerHandle>();
  private readonly joinWarnMs: number;

  constructor(options: WorkerRegistryOptions = {}) {
    this.joinWarnMs = options.joinWarnMs ?? DEFAULT_JOIN_WARN_MS;
  }

  public add(name: string, task: WorkerTask): WorkerHandle {
    if (this.workers.has(name)) {
      throw new WorkerConflictError(name);
    }

    const handle = new WorkerHandle(name, task, (exited, outcome) => {
      if (this.workers.get(name) === exited) {
        this.workers.delete(name);
      }
      logger.workers.debug("Worker exited", { worker: name, status: outcome.status });
    });

    this.workers.set(name, handle);
    logger.workers.debug("Worker started", { worker: name });
    return handle;
  }

  /** The live worker registered under `name`, if any. */
  public get(name: string): WorkerHandle | undefined {
    return this.workers.get(name);
  }

  public has(name: string): boolean {
    return this.workers.has(name);
  }

  public names(): string[] {
    return [...this.workers.keys()];
  }

  public get size(): number {
    return this.workers.size;
  }

  public async join(handle: WorkerHandle): Promise<WorkerOutcome> {
    const timer = setTimeout(() => {
      logger.workers.warn("Worker is slow to exit", {
        worker: handle.name,
        killed: handle.killed,
        waitedMs: this.joinWarnMs,
      });
    }, this.joinWarnMs);
    timer.unref();

    try {
      return await handle.join();
    } finally {
      clearTimeout(timer);
    }
  }

  /** Waits for every worker alive right now. */
  public async waitAll(): Promise<void> {
    await Promise.all([...this.workers.values()].map((handle) => this.join(handle)));
  }

  /** Requests every live worker to stop, then waits for them. */
  public async cancelAll(): Promise<void> {
    for (const handle of this.workers.values()) {
      handle.kill();
    }
    await this.waitAll();
  }
}
