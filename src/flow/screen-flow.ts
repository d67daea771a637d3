import type { HubCategory } from "../hubs/categories";
import { Hub, assertDistinctCheckWorkers, displayTitle, type HubBlockers, type HubScreen } from "../hubs/hub";
import { logger } from "../lib/debug-logger";
import { resolveRuntimeConfig } from "../lib/runtime-config";
import { FlowAlreadyStartedError } from "../screens/errors";
import type { ScreenRegistry } from "../screens/registry";
import type { StandaloneScreen } from "../screens/standalone-screen";
import type { ScreenContext, ScreenRuntime } from "../screens/types";
import type { Disconnect, DisplayLoop, ScreenSelector, ScreenWindow } from "../ui/types";
import { WorkerRegistry } from "../workers/worker-registry";
import { sequenceFlow, type FlowStep, type Placement, type UnplacedScreen } from "./sequence";

export type FlowExit = "continue" | "quit";

/**
 * The presentation layer the flow drives. It draws screens and hubs and
 * emits the window signals the screens listen for.
 */
export interface FlowPresenter<TContext extends ScreenContext = ScreenContext> {
  /** Display a standalone screen; the flow waits for its continue or quit signal. */
  showStandalone(screen: StandaloneScreen<TContext>): void | Promise<void>;
  /** Run a hub until the user continues past it or quits. */
  runHub(hub: Hub<TContext>): Promise<FlowExit>;
  /** The user tried to continue but the hub is not done. */
  hubBlocked?(hub: Hub<TContext>, blockers: HubBlockers): void;
}

export interface FlowStepDescriptor {
  kind: "standalone" | "hub";
  name: string;
  title: string;
  placement?: Placement;
}

export type FlowStatus = "idle" | "running" | "finished" | "quit" | "failed";

export interface FlowState {
  status: FlowStatus;
  stepIndex: number;
  totalSteps: number;
  current: FlowStepDescriptor | null;
  error?: string;
}

export type FlowResult =
  | { status: "finished" }
  | { status: "quit"; step: FlowStepDescriptor };

export interface ScreenFlowOptions<TContext extends ScreenContext = ScreenContext> {
  registry: ScreenRegistry<TContext>;
  context: TContext;
  /** Hubs in the order the user meets them. */
  hubs: readonly HubCategory[];
  presenter: FlowPresenter<TContext>;
  loop: DisplayLoop;
  workers?: WorkerRegistry;
  createWindow?: (screenName: string) => ScreenWindow;
  createSelector?: (screen: HubScreen<TContext>) => ScreenSelector;
}

type ResolvedStep<TContext extends ScreenContext> =
  | { kind: "standalone"; placement: Placement; screen: StandaloneScreen<TContext> }
  | { kind: "hub"; hub: Hub<TContext> };

export function describeStep<TContext extends ScreenContext>(step: ResolvedStep<TContext>): FlowStepDescriptor {
  if (step.kind === "hub") {
    return { kind: "hub", name: step.hub.name, title: step.hub.category.title ?? step.hub.name };
  }
  return {
    kind: "standalone",
    name: step.screen.screenName,
    title: displayTitle(step.screen),
    placement: step.placement,
  };
}

/**
 * Runs an installer session: standalone screens sequenced around hubs, each
 * step finishing before the next begins. Owns the worker registry every
 * screen's checks run in.
 */
export class ScreenFlow<TContext extends ScreenContext = ScreenContext> {
  public readonly workers: WorkerRegistry;
  public readonly runtime: ScreenRuntime;
  public readonly hubs: readonly Hub<TContext>[];
  public readonly unplaced: readonly UnplacedScreen[];

  private readonly presenter: FlowPresenter<TContext>;
  private readonly steps: readonly ResolvedStep<TContext>[];
  private readonly listeners = new Set<() => void>();
  private state: FlowState;

  constructor(options: ScreenFlowOptions<TContext>) {
    this.presenter = options.presenter;
    this.workers = options.workers ?? new WorkerRegistry({ joinWarnMs: resolveRuntimeConfig().joinWarnMs });
    this.runtime = {
      workers: this.workers,
      loop: options.loop,
      createWindow: options.createWindow,
    };

    const standalone = options.registry
      .collectStandalone()
      .map((screenClass) => new screenClass(options.context, this.runtime));

    this.hubs = options.hubs.map(
      (category) =>
        new Hub({
          category,
          registry: options.registry,
          context: options.context,
          runtime: this.runtime,
          createSelector: options.createSelector,
        }),
    );
    assertDistinctCheckWorkers(
      "the installer",
      this.hubs.flatMap((hub) => hub.screens),
    );

    const sequence = sequenceFlow(options.hubs, standalone);
    for (const entry of sequence.unplaced) {
      logger.flow.warn("Standalone screen not placed in flow", { ...entry });
    }
    this.unplaced = sequence.unplaced;
    this.steps = sequence.steps.map((step) => this.resolveStep(step));

    this.state = {
      status: "idle",
      stepIndex: 0,
      totalSteps: this.steps.length,
      current: null,
    };
  }

  public subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  public getSnapshot = (): FlowState => this.state;

  public get stepDescriptors(): FlowStepDescriptor[] {
    return this.steps.map((step) => describeStep(step));
  }

  public async run(): Promise<FlowResult> {
    if (this.state.status !== "idle") {
      throw new FlowAlreadyStartedError();
    }

    logger.flow.info("Flow started", { steps: this.steps.length });

    try {
      for (const [index, step] of this.steps.entries()) {
        const descriptor = describeStep(step);
        this.setState({ status: "running", stepIndex: index, current: descriptor });

        const exit = step.kind === "hub" ? await this.runHub(step.hub) : await this.runStandalone(step.screen);
        if (exit === "quit") {
          logger.flow.info("Flow quit", { step: descriptor.name });
          await this.workers.cancelAll();
          this.setState({ status: "quit" });
          return { status: "quit", step: descriptor };
        }
      }

      await this.workers.waitAll();
      this.setState({ status: "finished", stepIndex: this.steps.length, current: null });
      logger.flow.info("Flow finished");
      return { status: "finished" };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.flow.error("Flow failed", { error: message });
      await this.workers.cancelAll();
      this.setState({ status: "failed", error: message });
      throw error;
    }
  }

  private resolveStep(step: FlowStep<TContext>): ResolvedStep<TContext> {
    if (step.kind === "standalone") {
      return { kind: "standalone", placement: step.placement, screen: step.screen };
    }

    const hub = this.hubs.find((candidate) => candidate.category === step.hub);
    if (!hub) {
      // sequenceFlow only emits hubs it was given.
      throw new Error(`Hub ${step.hub.name} is not part of this flow`);
    }
    return { kind: "hub", hub };
  }

  private async runStandalone(screen: StandaloneScreen<TContext>): Promise<FlowExit> {
    const disconnects: Disconnect[] = [];
    // Continue may arrive on any later turn; an apply() failure fails the step.
    const exit = new Promise<FlowExit>((resolve, reject) => {
      disconnects.push(
        screen.onContinue(() => resolve("continue"), reject),
        screen.onQuit(() => resolve("quit")),
      );
    });

    screen.window.show();
    try {
      const [, result] = await Promise.all([this.presenter.showStandalone(screen), exit]);
      return result;
    } finally {
      for (const disconnect of disconnects) disconnect();
      screen.window.hide();
    }
  }

  private async runHub(hub: Hub<TContext>): Promise<FlowExit> {
    for (;;) {
      hub.refreshSelectors();
      const exit = await this.presenter.runHub(hub);
      if (exit === "quit") return "quit";

      const result = await hub.continue();
      if (result.ok) return "continue";
      this.presenter.hubBlocked?.(hub, result.error);
    }
  }

  private setState(patch: Partial<FlowState>): void {
    this.state = { ...this.state, ...patch };
    for (const listener of this.listeners) {
      listener();
    }
  }
}
