export type WindowSignal = "continue-clicked" | "quit-clicked" | "back-clicked";

export type SignalHandler = () => void;

/** Disconnects a handler registered with `ScreenWindow.connect`. */
export type Disconnect = () => void;

/**
 * The window a screen draws into. Owned by the presentation layer; screens
 * only show/hide it and listen for its navigation signals.
 */
export interface ScreenWindow {
  readonly visible: boolean;
  show(): void;
  hide(): void;
  connect(signal: WindowSignal, handler: SignalHandler): Disconnect;
}

/**
 * The hub's display loop. Quitting it returns control from a screen to the
 * hub that launched it.
 */
export interface DisplayLoop {
  quit(): void;
}

export interface SelectorState {
  title: string;
  icon?: string;
  status: string;
  completed: boolean;
  ready: boolean;
  checking: boolean;
}

/**
 * The hub-side tile representing one screen.
 */
export interface ScreenSelector {
  readonly state: SelectorState | null;
  update(state: SelectorState): void;
}
