import { logger } from "../lib/debug-logger";
import { err, ok, type Result } from "../lib/result";
import { InvalidConfigurationError } from "../screens/errors";
import { NormalScreen } from "../screens/normal-screen";
import { PersonalizationScreen } from "../screens/personalization-screen";
import { isStandaloneClass, type ScreenRegistry } from "../screens/registry";
import type { ScreenContext, ScreenRuntime } from "../screens/types";
import { HeadlessSelector } from "../ui/headless";
import type { ScreenSelector, SelectorState } from "../ui/types";
import type { WorkerHandle } from "../workers/worker-registry";
import type { HubCategory } from "./categories";

export type HubScreen<TContext extends ScreenContext = ScreenContext> =
  | NormalScreen<TContext>
  | PersonalizationScreen<TContext>;

export interface HubOptions<TContext extends ScreenContext = ScreenContext> {
  category: HubCategory;
  registry: ScreenRegistry<TContext>;
  context: TContext;
  runtime: ScreenRuntime;
  createSelector?: (screen: HubScreen<TContext>) => ScreenSelector;
}

export interface HubBlockers {
  incomplete: string[];
  notReady: string[];
}

export type HubContinueResult = Result<void, HubBlockers>;

export function displayTitle(screen: { title?: string; screenName: string }): string {
  return screen.title ?? screen.screenName;
}

function compareScreens(a: { title?: string; screenName: string }, b: { title?: string; screenName: string }): number {
  return displayTitle(a).localeCompare(displayTitle(b));
}

/**
 * A dashboard of the screens in one category. Builds its screens from the
 * registry, keeps their selectors current, and decides whether the user may
 * move past it.
 */
export class Hub<TContext extends ScreenContext = ScreenContext> {
  public readonly category: HubCategory;
  public readonly screens: readonly HubScreen<TContext>[];

  private readonly runtime: ScreenRuntime;

  constructor(options: HubOptions<TContext>) {
    this.category = options.category;
    this.runtime = options.runtime;

    const screens: HubScreen<TContext>[] = [];
    for (const screenClass of options.registry.collect(options.category.name)) {
      // Standalone screens are built by the flow; a category on one is ignored.
      if (isStandaloneClass(screenClass)) {
        logger.hub.warn("Standalone screen declares a hub category; ignoring", {
          hub: options.category.name,
          screen: screenClass.name,
        });
        continue;
      }

      const screen = new screenClass(options.context, options.runtime);
      if (screen instanceof NormalScreen || screen instanceof PersonalizationScreen) {
        screens.push(screen);
      } else {
        logger.hub.warn("Screen kind cannot be shown on a hub; ignoring", {
          hub: options.category.name,
          screen: screen.screenName,
          kind: screen.kind,
        });
      }
    }

    screens.sort(compareScreens);
    assertDistinctCheckWorkers(options.category.name, screens);

    const createSelector = options.createSelector ?? (() => new HeadlessSelector());
    for (const screen of screens) {
      if (screen instanceof NormalScreen) {
        screen.selector = createSelector(screen);
      }
    }

    this.screens = screens;
    this.refreshSelectors();
  }

  public get name(): string {
    return this.category.name;
  }

  public get normalScreens(): NormalScreen<TContext>[] {
    return this.screens.filter((screen): screen is NormalScreen<TContext> => screen instanceof NormalScreen);
  }

  public get personalizationScreens(): PersonalizationScreen<TContext>[] {
    return this.screens.filter(
      (screen): screen is PersonalizationScreen<TContext> => screen instanceof PersonalizationScreen,
    );
  }

  public runningChecks(): WorkerHandle[] {
    const handles: WorkerHandle[] = [];
    for (const screen of this.normalScreens) {
      const handle = screen.checkWorker;
      if (handle) handles.push(handle);
    }
    return handles;
  }

  public describe(screen: HubScreen<TContext>): SelectorState {
    return {
      title: displayTitle(screen),
      icon: screen.icon,
      status: screen.status,
      completed: screen.completed,
      ready: screen instanceof NormalScreen ? screen.ready : true,
      checking: screen instanceof NormalScreen ? screen.checkWorker !== undefined : false,
    };
  }

  public summary(): SelectorState[] {
    return this.screens.map((screen) => this.describe(screen));
  }

  public refreshSelectors(): void {
    for (const screen of this.normalScreens) {
      screen.selector?.update(this.describe(screen));
    }
  }

  public blockers(): HubBlockers {
    const incomplete: string[] = [];
    const notReady: string[] = [];

    for (const screen of this.screens) {
      if (screen instanceof NormalScreen && !screen.ready) {
        notReady.push(displayTitle(screen));
      }
      if (!screen.completed) {
        incomplete.push(displayTitle(screen));
      }
    }

    return { incomplete, notReady };
  }

  /**
   * Called when the user presses the hub's continue button. Checks still
   * running are waited for first, since their results feed `completed`.
   */
  public async continue(): Promise<HubContinueResult> {
    const running = this.runningChecks();
    if (running.length > 0) {
      logger.hub.info("Waiting for screen checks", {
        hub: this.name,
        workers: running.map((handle) => handle.name),
      });
      await Promise.all(running.map((handle) => this.runtime.workers.join(handle)));
    }

    this.refreshSelectors();
    const blockers = this.blockers();
    if (blockers.incomplete.length > 0 || blockers.notReady.length > 0) {
      logger.hub.info("Hub cannot continue", { hub: this.name, ...blockers });
      return err(blockers);
    }

    return ok(undefined);
  }
}

/**
 * Check workers are keyed by a name derived from the screen title, so two
 * screens with the same title would cancel each other's checks.
 */
export function assertDistinctCheckWorkers<TContext extends ScreenContext>(
  scope: string,
  screens: readonly HubScreen<TContext>[],
): void {
  const owners = new Map<string, string>();
  for (const screen of screens) {
    if (!(screen instanceof NormalScreen)) continue;

    const name = screen.checkWorkerName;
    const owner = owners.get(name);
    if (owner !== undefined) {
      throw new InvalidConfigurationError(
        `Screens ${owner} and ${screen.screenName} on ${scope} share check worker ${name}`,
      );
    }
    owners.set(name, screen.screenName);
  }
}
