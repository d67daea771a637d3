import type { HubCategory } from "../hubs/categories";
import type { Disconnect } from "../ui/types";
import { AbstractInstantiationError, InvalidConfigurationError } from "./errors";
import { Screen } from "./screen";
import type { ScreenContext, ScreenRuntime } from "./types";

export type StandaloneEvent = "continue" | "quit";

export const DEFAULT_STANDALONE_PRIORITY = 100;

/**
 * A screen displayed apart from any hub, e.g. a welcome screen. It takes the
 * full window but carries navigation that makes it look like part of the
 * surrounding flow.
 *
 * Placement is static:
 *
 * - `preForHub` / `postForHub`: the hub this screen runs before or after.
 *   Only one may be set. Every post action of a hub runs before any pre
 *   action of the next one.
 * - `priority`: lower runs earlier. A post action with priority 0 runs right
 *   after its hub; a pre action with priority 0 runs first of all.
 */
export abstract class StandaloneScreen<TContext extends ScreenContext = ScreenContext> extends Screen<TContext> {
  public static readonly preForHub?: HubCategory;
  public static readonly postForHub?: HubCategory;
  public static readonly priority: number = DEFAULT_STANDALONE_PRIORITY;

  public readonly kind = "standalone";

  public readonly preForHub?: HubCategory;
  public readonly postForHub?: HubCategory;
  public readonly priority: number;

  constructor(context: TContext, runtime: ScreenRuntime) {
    if (new.target === StandaloneScreen) {
      throw new AbstractInstantiationError("StandaloneScreen");
    }

    if (new.target.preForHub && new.target.postForHub) {
      throw new InvalidConfigurationError(
        `StandaloneScreen ${new.target.name} may not have both preForHub and postForHub set`,
      );
    }

    super(context, runtime);

    this.preForHub = new.target.preForHub;
    this.postForHub = new.target.postForHub;
    this.priority = new.target.priority;
  }

  /**
   * Applies the screen, then hands control to `callback`. When `apply()`
   * throws, `callback` is skipped and the error goes to `onError`, or back to
   * whoever emitted the signal when no `onError` is given.
   */
  public onContinue(callback: () => void, onError?: (error: unknown) => void): Disconnect {
    return this.window.connect("continue-clicked", () => {
      if (!onError) {
        this.handleContinue(callback);
        return;
      }
      try {
        this.handleContinue(callback);
      } catch (error) {
        onError(error);
      }
    });
  }

  /** Leaves without applying anything. */
  public onQuit(callback: () => void): Disconnect {
    return this.window.connect("quit-clicked", () => {
      callback();
    });
  }

  public registerEventCallback(event: StandaloneEvent, callback: () => void): Disconnect {
    switch (event) {
      case "continue":
        return this.onContinue(callback);
      case "quit":
        return this.onQuit(callback);
    }
  }

  private handleContinue(callback: () => void): void {
    this.apply();
    callback();
  }
}
