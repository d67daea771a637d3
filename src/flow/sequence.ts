import type { HubCategory } from "../hubs/categories";
import type { StandaloneScreen } from "../screens/standalone-screen";
import type { ScreenContext } from "../screens/types";

export type Placement = "pre" | "post";

export type FlowStep<TContext extends ScreenContext = ScreenContext> =
  | { kind: "standalone"; placement: Placement; hub: HubCategory; screen: StandaloneScreen<TContext> }
  | { kind: "hub"; hub: HubCategory };

export type UnplacedReason = "no-hub" | "unknown-hub";

export interface UnplacedScreen {
  screen: string;
  reason: UnplacedReason;
}

export interface FlowSequence<TContext extends ScreenContext = ScreenContext> {
  steps: FlowStep<TContext>[];
  unplaced: UnplacedScreen[];
}

function byPriority(a: { priority: number }, b: { priority: number }): number {
  return a.priority - b.priority;
}

/**
 * Orders standalone screens around the hubs they belong to:
 *
 *   pre(hub1)… hub1 post(hub1)… pre(hub2)… hub2 post(hub2)…
 *
 * Each pre/post group is sorted by priority, ties keeping registration order,
 * so every post action of one hub runs before any pre action of the next.
 * Screens naming no hub, or a hub not in `hubs`, are reported as unplaced.
 */
export function sequenceFlow<TContext extends ScreenContext>(
  hubs: readonly HubCategory[],
  screens: readonly StandaloneScreen<TContext>[],
): FlowSequence<TContext> {
  const pre = new Map<HubCategory, StandaloneScreen<TContext>[]>();
  const post = new Map<HubCategory, StandaloneScreen<TContext>[]>();
  const unplaced: UnplacedScreen[] = [];

  for (const hub of hubs) {
    pre.set(hub, []);
    post.set(hub, []);
  }

  for (const screen of screens) {
    const hub = screen.preForHub ?? screen.postForHub;
    if (!hub) {
      unplaced.push({ screen: screen.screenName, reason: "no-hub" });
      continue;
    }

    const group = screen.preForHub ? pre.get(hub) : post.get(hub);
    if (!group) {
      unplaced.push({ screen: screen.screenName, reason: "unknown-hub" });
      continue;
    }
    group.push(screen);
  }

  const steps: FlowStep<TContext>[] = [];
  for (const hub of hubs) {
    for (const screen of (pre.get(hub) ?? []).sort(byPriority)) {
      steps.push({ kind: "standalone", placement: "pre", hub, screen });
    }
    steps.push({ kind: "hub", hub });
    for (const screen of (post.get(hub) ?? []).sort(byPriority)) {
      steps.push({ kind: "standalone", placement: "post", hub, screen });
    }
  }

  return { steps, unplaced };
}
