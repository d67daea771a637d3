import { AbstractInstantiationError } from "./errors";
import { Screen } from "./screen";
import type { ScreenContext, ScreenRuntime } from "./types";

/**
 * A screen the user opens from the progress hub while packages install. It
 * covers the middle of the window and leaves the hub's action area, and the
 * progress shown there, visible.
 */
export abstract class PersonalizationScreen<TContext extends ScreenContext = ScreenContext> extends Screen<TContext> {
  public readonly kind = "personalization";

  constructor(context: TContext, runtime: ScreenRuntime) {
    if (new.target === PersonalizationScreen) {
      throw new AbstractInstantiationError("PersonalizationScreen");
    }

    super(context, runtime);
  }
}
