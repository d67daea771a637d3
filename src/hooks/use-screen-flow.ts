import { useSyncExternalStore } from "react";

import type { FlowState } from "../flow/screen-flow";

/** Anything exposing flow state the way `ScreenFlow` does. */
export interface FlowStateSource {
  subscribe(listener: () => void): () => void;
  getSnapshot(): FlowState;
}

export interface FlowProgress {
  /** 0-100 */
  percent: number;
  isFirst: boolean;
  isLast: boolean;
  done: boolean;
}

export function getFlowProgress(state: FlowState): FlowProgress {
  const done = state.status === "finished";
  if (state.totalSteps === 0) {
    return { percent: 100, isFirst: true, isLast: true, done };
  }

  const completedSteps = done ? state.totalSteps : state.stepIndex;
  return {
    percent: Math.round((completedSteps / state.totalSteps) * 100),
    isFirst: state.stepIndex === 0,
    isLast: state.stepIndex >= state.totalSteps - 1,
    done,
  };
}

/**
 * Subscribes a component to a running flow. Re-renders on every step change
 * and when the flow ends.
 */
export function useScreenFlow(flow: FlowStateSource): FlowState {
  return useSyncExternalStore(flow.subscribe, flow.getSnapshot, flow.getSnapshot);
}
