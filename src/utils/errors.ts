/**
 * Base class for errors raised by the bridge itself. Transport errors coming
 * out of the MQTT client are not wrapped.
 */
export class BridgeError extends Error {
  constructor(message: string, public readonly code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BridgeError';
  }
}

/**
 * Inbound payload that is not JSON or does not carry the required snapshot fields.
 */
export class MalformedMessageError extends BridgeError {
  constructor(message: string, public readonly topic?: string, options?: { cause?: unknown }) {
    super(message, 'MALFORMED_MESSAGE', options);
    this.name = 'MalformedMessageError';
  }
}

/**
 * A player command was called with an argument it cannot send. Raised before
 * anything is published or mutated.
 */
export class InvalidCommandArgumentError extends BridgeError {
  constructor(message: string) {
    super(message, 'INVALID_COMMAND_ARGUMENT');
    this.name = 'InvalidCommandArgumentError';
  }
}

export class DeviceNotFoundError extends BridgeError {
  constructor(public readonly deviceId: string) {
    super(`Device ${deviceId} not found`, 'DEVICE_NOT_FOUND');
    this.name = 'DeviceNotFoundError';
  }
}

/**
 * Command issued against a mirror that is not subscribed yet, or already torn down.
 */
export class MirrorUnavailableError extends BridgeError {
  constructor(entityId: string, reason: 'not_started' | 'destroyed') {
    super(
      reason === 'destroyed'
        ? `Media player ${entityId} has been removed`
        : `Media player ${entityId} is not subscribed yet`,
      'MIRROR_UNAVAILABLE'
    );
    this.name = 'MirrorUnavailableError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
