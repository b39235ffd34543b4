/**
 * Error kinds surfaced by the forwarding pipeline.
 * Each carries a stable `code` and the ids needed to trace it in the logs.
 */
export class ForwarderError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context: Record<string, unknown> = {},
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'ForwarderError';
  }
}

/**
 * Operation on a user that has no configuration
 */
export class ConfigNotFoundError extends ForwarderError {
  constructor(public readonly userId: number) {
    super(`No configuration for user ${userId}`, 'CONFIG_NOT_FOUND', { userId });
    this.name = 'ConfigNotFoundError';
  }
}

/**
 * Store read/write failure. The in-memory registry is left as it was before the call.
 */
export class PersistenceError extends ForwarderError {
  constructor(operation: string, userId: number | undefined, cause: unknown) {
    super(
      `Persistence failed during ${operation}${userId !== undefined ? ` for user ${userId}` : ''}`,
      'PERSISTENCE_ERROR',
      { operation, userId },
      { cause }
    );
    this.name = 'PersistenceError';
  }
}

/**
 * Outbound send failure to one target chat
 */
export class DeliveryError extends ForwarderError {
  constructor(
    public readonly userId: number,
    public readonly targetChatId: number,
    cause: unknown
  ) {
    super(
      `Delivery to chat ${targetChatId} failed for user ${userId}`,
      'DELIVERY_ERROR',
      { userId, targetChatId },
      { cause }
    );
    this.name = 'DeliveryError';
  }
}

/**
 * Command argument rejected before anything was written
 */
export class InvalidInputError extends ForwarderError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'INVALID_INPUT', context);
    this.name = 'InvalidInputError';
  }
}
