export {
  ScreenFlow,
  describeStep,
  type FlowExit,
  type FlowPresenter,
  type FlowResult,
  type FlowState,
  type FlowStatus,
  type FlowStepDescriptor,
  type ScreenFlowOptions,
} from "./screen-flow";
export {
  sequenceFlow,
  type FlowSequence,
  type FlowStep,
  type Placement,
  type UnplacedReason,
  type UnplacedScreen,
} from "./sequence";
