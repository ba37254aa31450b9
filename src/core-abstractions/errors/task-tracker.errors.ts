// CORE ABSTRACTIONS - Transport errors raised while relaying a task
// Kept apart from TaskFormError: these are never the user's input's fault

export class TaskTrackerGatewayError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TaskTrackerGatewayError';
  }
}

export class TaskTrackerUnavailableError extends TaskTrackerGatewayError {
  constructor(
    public readonly url: string,
    public readonly causeMessage: string
  ) {
    super(`Failed to connect to TaskTracker API at ${url}: ${causeMessage}`);
    this.name = 'TaskTrackerUnavailableError';
  }
}

export class TaskTrackerRejectedError extends TaskTrackerGatewayError {
  constructor(
    public readonly url: string,
    public readonly status: number,
    public readonly responseText: string
  ) {
    super(`TaskTracker API at ${url} answered ${status}: ${responseText}`);
    this.name = 'TaskTrackerRejectedError';
  }
}
