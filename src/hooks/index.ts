export { getFlowProgress, useScreenFlow, type FlowProgress, type FlowStateSource } from "./use-screen-flow";
