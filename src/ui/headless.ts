import type {
  Disconnect,
  DisplayLoop,
  ScreenSelector,
  ScreenWindow,
  SelectorState,
  SignalHandler,
  WindowSignal,
} from "./types";

/**
 * In-process window used when no presentation layer supplies one. `emit`
 * stands in for the user pressing a navigation button.
 */
export class HeadlessWindow implements ScreenWindow {
  private readonly handlers = new Map<WindowSignal, Set<SignalHandler>>();
  private shown = false;

  constructor(public readonly name = "window") {}

  public get visible(): boolean {
    return this.shown;
  }

  public show(): void {
    this.shown = true;
  }

  public hide(): void {
    this.shown = false;
  }

  public connect(signal: WindowSignal, handler: SignalHandler): Disconnect {
    const set = this.handlers.get(signal) ?? new Set<SignalHandler>();
    this.handlers.set(signal, set);
    set.add(handler);

    return () => {
      set.delete(handler);
    };
  }

  public emit(signal: WindowSignal): void {
    const set = this.handlers.get(signal);
    if (!set) return;

    // Copy so handlers may disconnect themselves while being dispatched.
    for (const handler of [...set]) {
      handler();
    }
  }

  public listenerCount(signal: WindowSignal): number {
    return this.handlers.get(signal)?.size ?? 0;
  }
}

/**
 * Display loop whose iterations are awaited with `run()`; each `quit()` ends
 * every pending iteration.
 */
export class HeadlessDisplayLoop implements DisplayLoop {
  private waiters: Array<() => void> = [];
  private quits = 0;

  public get quitCount(): number {
    return this.quits;
  }

  public run(): Promise<void> {
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  public quit(): void {
    this.quits += 1;
    const pending = this.waiters;
    this.waiters = [];
    for (const resolve of pending) {
      resolve();
    }
  }
}

export class HeadlessSelector implements ScreenSelector {
  private current: SelectorState | null = null;

  public get state(): SelectorState | null {
    return this.current;
  }

  public update(state: SelectorState): void {
    this.current = { ...state };
  }
}
