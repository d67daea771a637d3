import type { HubCategory } from "../hubs/categories";
import { HeadlessWindow } from "../ui/headless";
import { UIObject } from "../ui/ui-object";
import { AbstractInstantiationError, NotImplementedError } from "./errors";
import type { ScreenContext, ScreenKind, ScreenRuntime } from "./types";

/**
 * A single configuration screen. Where it is shown depends on the variant:
 * before or after a hub (`StandaloneScreen`), launched from a hub
 * (`NormalScreen`), or over the progress hub while packages install
 * (`PersonalizationScreen`).
 *
 * Display metadata lives in static members so discovery can read it without
 * building an instance:
 *
 * - `category`: the hub this screen is offered on. Screens without one are
 *   never shown on a hub; standalone screens do not need one.
 * - `icon`, `title`: what the hub selector shows. The selector's defaults
 *   apply when unset.
 */
export abstract class Screen<TContext extends ScreenContext = ScreenContext> extends UIObject<TContext["data"]> {
  public static readonly category?: HubCategory;
  public static readonly icon?: string;
  public static readonly title?: string;

  public abstract readonly kind: ScreenKind;

  /** Class name of the concrete screen, used in logs and errors. */
  public readonly screenName: string;
  public readonly category?: HubCategory;
  public readonly icon?: string;
  public readonly title?: string;

  public readonly storage: TContext["storage"];
  public readonly payload: TContext["payload"];
  public readonly installClass: TContext["installClass"];

  protected readonly runtime: ScreenRuntime;

  /**
   * The handles are kept by reference. A screen does not get the whole
   * installer; it works with the shared data object, the device inventory,
   * the payload and the install class, nothing more.
   */
  constructor(context: TContext, runtime: ScreenRuntime) {
    if (new.target === Screen) {
      throw new AbstractInstantiationError("Screen");
    }

    const screenName = new.target.name;
    super(context.data, runtime.createWindow?.(screenName) ?? new HeadlessWindow(screenName));

    this.screenName = screenName;
    this.category = new.target.category;
    this.icon = new.target.icon;
    this.title = new.target.title;

    this.storage = context.storage;
    this.payload = context.payload;
    this.installClass = context.installClass;
    this.runtime = runtime;
  }

  /**
   * Writes the selections made on this screen back into `data`. Every
   * concrete screen provides this.
   */
  public apply(): void {
    throw new NotImplementedError(this.screenName, "apply()");
  }

  /**
   * Whether the screen has been visited and its selections are valid. Hubs
   * flag incomplete screens and refuse to continue past them.
   */
  public get completed(): boolean {
    return false;
  }

  /**
   * A very short summary of what this screen configures, shown under its
   * title on the hub.
   */
  public get status(): string {
    throw new NotImplementedError(this.screenName, "status");
  }
}
