import type { WorkerRegistry } from "../workers/worker-registry";
import type { DisplayLoop, ScreenWindow } from "../ui/types";

/**
 * The handles every screen is built with. The core never looks inside them:
 * screens read all four freely and write only their own part of `data` from
 * `apply()`.
 */
export interface ScreenContext<TData = unknown, TStorage = unknown, TPayload = unknown, TInstallClass = unknown> {
  /** The shared configuration object screens populate. */
  readonly data: TData;
  /** Device inventory of the target machine. */
  readonly storage: TStorage;
  /** Package payload being installed. */
  readonly payload: TPayload;
  /** Distribution-specific defaults. */
  readonly installClass: TInstallClass;
}

export interface ScreenRuntime {
  readonly workers: WorkerRegistry;
  readonly loop: DisplayLoop;
  /** Supplies the window for a screen; a headless window is used without one. */
  readonly createWindow?: (screenName: string) => ScreenWindow;
}

export type ScreenKind = "standalone" | "normal" | "personalization";

export type CheckState = "idle" | "checking" | "stale-checking" | "done";
