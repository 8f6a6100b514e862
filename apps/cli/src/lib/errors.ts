export class EmrSparkError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigError extends EmrSparkError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR");
  }
}

export class NotFoundError extends EmrSparkError {
  constructor(message: string) {
    super(message, "NOT_FOUND");
  }
}

export class MonitorTimeoutError extends EmrSparkError {
  constructor(public readonly clusterId: string) {
    super(`Timeout. Cluster ${clusterId} terminated.`, "MONITOR_TIMEOUT");
  }
}

export class AbnormalTerminationError extends EmrSparkError {
  constructor(
    public readonly clusterId: string,
    public readonly failedSteps: { name: string; state: string }[],
  ) {
    const detail = failedSteps.map((s) => `${s.name} (${s.state})`).join(", ");
    super(
      `Cluster ${clusterId} terminated with abnormal step: ${detail}`,
      "ABNORMAL_TERMINATION",
    );
  }
}

export class MonitorCancelledError extends EmrSparkError {
  constructor(clusterId: string) {
    super(
      `Monitoring of cluster ${clusterId} cancelled. The cluster was left running.`,
      "MONITOR_CANCELLED",
    );
  }
}

export class TransportError extends EmrSparkError {
  constructor(
    public readonly operation: string,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${operation} failed: ${detail}`, "TRANSPORT_ERROR", { cause });
  }
}
