export type ScreenErrorCode =
  | "ABSTRACT_INSTANTIATION"
  | "INVALID_CONFIGURATION"
  | "NOT_IMPLEMENTED"
  | "WORKER_CONFLICT"
  | "FLOW_ALREADY_STARTED";

/**
 * Base class for every error raised while assembling or driving screens.
 * All of these signal a programming defect, not a user-recoverable state.
 */
export class ScreenError extends Error {
  public readonly code: ScreenErrorCode;

  constructor(code: ScreenErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class AbstractInstantiationError extends ScreenError {
  constructor(public readonly typeName: string) {
    super("ABSTRACT_INSTANTIATION", `${typeName} is an abstract class`);
  }
}

export class InvalidConfigurationError extends ScreenError {
  constructor(message: string) {
    super("INVALID_CONFIGURATION", message);
  }
}

export class NotImplementedError extends ScreenError {
  constructor(
    public readonly typeName: string,
    public readonly member: string,
  ) {
    super("NOT_IMPLEMENTED", `${typeName} does not implement ${member}`);
  }
}

export class WorkerConflictError extends ScreenError {
  constructor(public readonly workerName: string) {
    super("WORKER_CONFLICT", `Worker ${workerName} is already running`);
  }
}

export class FlowAlreadyStartedError extends ScreenError {
  constructor() {
    super("FLOW_ALREADY_STARTED", "Screen flow has already been started");
  }
}
