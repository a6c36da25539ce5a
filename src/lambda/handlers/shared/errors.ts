/**
 * Base class for every failure the guardian raises on purpose.
 *
 * Resource-scoped errors (action, constraint, persistence) are folded into
 * the run summary by the orchestrator. Only discovery and config errors
 * abort a run.
 */
export class OperationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** A backend listing call failed, so the resource universe is incomplete. */
export class DiscoveryError extends OperationError {}

/** A single stop/deactivate/create call failed. */
export class ActionError extends OperationError {
  constructor(
    public readonly targetId: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
  }
}

/** A policy precondition (such as the two-key cap) blocks an action. */
export class ConstraintError extends OperationError {}

/** Upserting a credential record into Secrets Manager failed. */
export class PersistenceError extends OperationError {
  constructor(
    public readonly secretName: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
  }
}

/** Webhook delivery failed. Logged only. */
export class NotificationError extends OperationError {}

export class ConfigError extends OperationError {}

export function describeError(e: unknown): string {
  if (e instanceof Error) {
    return e.cause instanceof Error
      ? `${e.message}: ${e.cause.message}`
      : e.message
  }
  return String(e)
}
