import type { ScreenWindow } from "./types";

/**
 * Common base for anything with a window: holds the shared data object the
 * UI edits and the window it is drawn into.
 */
export abstract class UIObject<TData> {
  public readonly data: TData;
  public readonly window: ScreenWindow;

  protected constructor(data: TData, window: ScreenWindow) {
    this.data = data;
    this.window = window;
  }
}
