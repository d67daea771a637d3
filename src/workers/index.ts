export {
  WorkerHandle,
  WorkerRegistry,
  type CancellationToken,
  type WorkerExitListener,
  type WorkerOutcome,
  type WorkerRegistryOptions,
  type WorkerTask,
} from "./worker-registry";
