import { HeadlessDisplayLoop, HeadlessWindow } from "../../src/ui/headless";
import type { ScreenContext, ScreenRuntime } from "../../src/screens/types";
import { WorkerRegistry } from "../../src/workers/worker-registry";

export interface TestData {
  events: string[];
  timezone?: string;
  hostname?: string;
}

export interface TestStorage {
  probed: boolean;
  disks: string[];
}

export interface TestPayload {
  packages: string[];
}

export interface TestInstallClass {
  defaultHostname: string;
}

export type TestContext = ScreenContext<TestData, TestStorage, TestPayload, TestInstallClass>;

export function createContext(overrides: Partial<TestContext> = {}): TestContext {
  return {
    data: { events: [] },
    storage: { probed: true, disks: ["sda"] },
    payload: { packages: ["base"] },
    installClass: { defaultHostname: "localhost" },
    ...overrides,
  };
}

export interface TestRuntime extends ScreenRuntime {
  readonly workers: WorkerRegistry;
  readonly loop: HeadlessDisplayLoop;
  readonly windows: Map<string, HeadlessWindow>;
}

export function createRuntime(): TestRuntime {
  const windows = new Map<string, HeadlessWindow>();
  return {
    workers: new WorkerRegistry({ joinWarnMs: 60_000 }),
    loop: new HeadlessDisplayLoop(),
    windows,
    createWindow: (screenName: string) => {
      const window = new HeadlessWindow(screenName);
      windows.set(screenName, window);
      return window;
    },
  };
}

export function windowFor(runtime: TestRuntime, screenName: string): HeadlessWindow {
  const window = runtime.windows.get(screenName);
  if (!window) {
    throw new Error(`No window created for ${screenName}`);
  }
  return window;
}

/** Lets pending promise callbacks and one macrotask turn run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => {
    setImmediate(resolve);
  });
}

export interface Gate {
  promise: Promise<void>;
  open(): void;
}

export function createGate(): Gate {
  let open: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { promise, open: () => open() };
}
