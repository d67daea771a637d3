export { HeadlessDisplayLoop, HeadlessSelector, HeadlessWindow } from "./headless";
export { UIObject } from "./ui-object";
export type {
  Disconnect,
  DisplayLoop,
  ScreenSelector,
  ScreenWindow,
  SelectorState,
  SignalHandler,
  WindowSignal,
} from "./types";
