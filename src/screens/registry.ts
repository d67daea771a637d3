import type { HubCategory } from "../hubs/categories";
import { logger } from "../lib/debug-logger";
import { err, ok, type Result } from "../lib/result";
import { NormalScreen } from "./normal-screen";
import { PersonalizationScreen } from "./personalization-screen";
import { Screen } from "./screen";
import { StandaloneScreen } from "./standalone-screen";
import type { ScreenContext, ScreenRuntime } from "./types";

export interface ScreenMetadata {
  readonly name: string;
  readonly category?: HubCategory;
  readonly icon?: string;
  readonly title?: string;
}

export type ScreenClass<
  TContext extends ScreenContext = ScreenContext,
  TScreen extends Screen<TContext> = Screen<TContext>,
> = (new (context: TContext, runtime: ScreenRuntime) => TScreen) & ScreenMetadata;

export type StandaloneScreenClass<TContext extends ScreenContext = ScreenContext> = ScreenClass<
  TContext,
  StandaloneScreen<TContext>
>;

/** Resolves one screen module's namespace, typically a dynamic `import()`. */
export interface ScreenModuleLoader {
  id: string;
  load: () => Promise<Record<string, unknown>>;
}

export interface ModuleLoadFailure {
  id: string;
  error: string;
}

export interface ModuleLoadReport {
  loaded: string[];
  failed: ModuleLoadFailure[];
  registered: string[];
}

const ABSTRACT_BASES: ReadonlySet<unknown> = new Set<unknown>([
  Screen,
  StandaloneScreen,
  NormalScreen,
  PersonalizationScreen,
]);

/**
 * True for classes derived from one of the screen bases. The bases
 * themselves are excluded; they cannot be built.
 */
export function isScreenClass<TContext extends ScreenContext = ScreenContext>(
  value: unknown,
): value is ScreenClass<TContext> {
  if (typeof value !== "function" || ABSTRACT_BASES.has(value)) {
    return false;
  }

  const prototype: unknown = value.prototype;
  return prototype instanceof Screen;
}

/**
 * Whether a screen class belongs on the hub named `categoryName`.
 */
export function matchesCategory(screen: ScreenMetadata, categoryName: string): boolean {
  return screen.category !== undefined && screen.category.name === categoryName;
}

/**
 * Every screen the installer knows about. Screen modules register their
 * classes here at startup, or are listed in a manifest of loaders.
 */
export class ScreenRegistry<TContext extends ScreenContext = ScreenContext> {
  private readonly screens: ScreenClass<TContext>[] = [];

  public register(...screens: ScreenClass<TContext>[]): this {
    for (const screen of screens) {
      if (this.screens.includes(screen)) continue;
      this.screens.push(screen);
      logger.registry.debug("Registered screen", {
        screen: screen.name,
        category: screen.category?.name ?? null,
      });
    }
    return this;
  }

  public has(screen: ScreenClass<TContext>): boolean {
    return this.screens.includes(screen);
  }

  public all(): ScreenClass<TContext>[] {
    return [...this.screens];
  }

  /**
   * Loads each module and registers every screen class it exports. A module
   * that fails to load is logged and skipped; the others still register.
   */
  public async loadModules(loaders: readonly ScreenModuleLoader[]): Promise<ModuleLoadReport> {
    const report: ModuleLoadReport = { loaded: [], failed: [], registered: [] };

    for (const loader of loaders) {
      const result = await loadModule(loader);
      if (!result.ok) {
        logger.registry.warn("Skipping screen module", { module: loader.id, error: result.error });
        report.failed.push({ id: loader.id, error: result.error });
        continue;
      }

      report.loaded.push(loader.id);
      for (const exported of Object.values(result.value)) {
        // Module namespaces are untyped; the caller vouches for the context type.
        if (!isScreenClass<TContext>(exported) || this.screens.includes(exported)) continue;
        this.screens.push(exported);
        report.registered.push(exported.name);
      }
    }

    logger.registry.info("Screen modules loaded", {
      loaded: report.loaded.length,
      failed: report.failed.length,
      registered: report.registered.length,
    });
    return report;
  }

  /**
   * The screens offered on the hub named `categoryName`. Order is
   * registration order; hubs sort for display themselves.
   */
  public collect(categoryName: string): ScreenClass<TContext>[] {
    return this.screens.filter((screen) => matchesCategory(screen, categoryName));
  }

  /** Every standalone screen, for sequencing around hubs. */
  public collectStandalone(): StandaloneScreenClass<TContext>[] {
    return this.screens.filter((screen): screen is StandaloneScreenClass<TContext> => isStandaloneClass(screen));
  }
}

export function isStandaloneClass<TContext extends ScreenContext>(
  screen: ScreenClass<TContext>,
): screen is StandaloneScreenClass<TContext> {
  const prototype: unknown = screen.prototype;
  return prototype instanceof StandaloneScreen;
}

async function loadModule(loader: ScreenModuleLoader): Promise<Result<Record<string, unknown>, string>> {
  try {
    return ok(await loader.load());
  } catch (error) {
    return err(error instanceof Error ? error.message : String(error));
  }
}
