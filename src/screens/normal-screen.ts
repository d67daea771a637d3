import { logger } from "../lib/debug-logger";
import type { ScreenSelector } from "../ui/types";
import type { CancellationToken, WorkerHandle } from "../workers/worker-registry";
import { AbstractInstantiationError } from "./errors";
import { Screen } from "./screen";
import type { CheckState, ScreenContext, ScreenRuntime } from "./types";

const CHECK_WORKER_PREFIX = "Ana";
const CHECK_WORKER_SUFFIX = "Check";

/**
 * Name of the check worker for a screen title: whitespace dropped, wrapped in
 * a fixed prefix and suffix ("Date & Time" → "AnaDate&TimeCheck").
 */
export function checkWorkerNameFor(title: string): string {
  return CHECK_WORKER_PREFIX + title.replace(/\s+/g, "") + CHECK_WORKER_SUFFIX;
}

/**
 * A screen the user opens from a hub. Most screens are this kind. It hides
 * the hub entirely and shows where the user is and how to get back.
 */
export abstract class NormalScreen<TContext extends ScreenContext = ScreenContext> extends Screen<TContext> {
  public readonly kind = "normal";

  /** The hub tile for this screen, assigned by the hub. */
  public selector: ScreenSelector | null = null;

  private currentCheck: WorkerHandle | null = null;
  private state: CheckState = "idle";
  private backNavigation: Promise<unknown> = Promise.resolve();

  constructor(context: TContext, runtime: ScreenRuntime) {
    if (new.target === NormalScreen) {
      throw new AbstractInstantiationError("NormalScreen");
    }

    super(context, runtime);

    this.window.connect("back-clicked", () => {
      this.onBackClicked().catch((error: unknown) => {
        logger.screens.error("Back navigation failed", {
          screen: this.screenName,
          error: error instanceof Error ? error.message : String(error),
        });
      });
    });
  }

  public get checkWorkerName(): string {
    return checkWorkerNameFor(this.title ?? this.screenName);
  }

  public get checkState(): CheckState {
    return this.state;
  }

  /** The live check worker, if one is running. */
  public get checkWorker(): WorkerHandle | undefined {
    return this.runtime.workers.get(this.checkWorkerName);
  }

  /**
   * Runs whatever validation this screen needs. Called on a worker when the
   * user leaves the screen; only one check per screen runs at a time, and a
   * hub continuing past the screen waits for it.
   *
   * Implementations first clean up after any previous run, including one
   * that was cancelled partway, and return early once `token.cancelled` is
   * set.
   */
  public check(_token: CancellationToken): void | Promise<void> {
    return undefined;
  }

  /**
   * Whether the screen has what it needs to be displayed. Keep the default
   * unless the screen depends on a long-running probe, such as storage
   * discovery.
   */
  public get ready(): boolean {
    return true;
  }

  /**
   * Leaves the screen and restarts its check. Calls are serialized so a
   * second back navigation waits for the first to finish swapping workers.
   */
  public onBackClicked(): Promise<WorkerHandle> {
    const next = this.backNavigation.then(() => this.restartCheck());
    this.backNavigation = next.catch(() => undefined);
    return next;
  }

  private async restartCheck(): Promise<WorkerHandle> {
    this.window.hide();
    this.runtime.loop.quit();

    const name = this.checkWorkerName;
    const running = this.runtime.workers.get(name);
    if (running) {
      this.state = "stale-checking";
      logger.screens.debug("Cancelling stale check", { screen: this.screenName, worker: name });
      running.kill();
      await this.runtime.workers.join(running);
    }

    let handle: WorkerHandle;
    try {
      handle = this.runtime.workers.add(name, (token) => this.check(token));
    } catch (error) {
      // The stale check is gone; nothing runs for this screen now.
      this.currentCheck = null;
      this.state = "idle";
      throw error;
    }
    this.currentCheck = handle;
    this.state = "checking";

    void handle.join().then((outcome) => {
      if (this.currentCheck !== handle) return;
      this.currentCheck = null;
      this.state = outcome.status === "cancelled" ? "idle" : "done";
    });

    return handle;
  }
}
