/**
 * Event queue error codes
 */
export type EventQueueErrorCode =
  | 'MISSING_FUNCTION'
  | 'FUNCTION_ERROR'
  | 'EMPTY_PAYLOAD'
  | 'BAD_STATUS'
  | 'INVALID_RESPONSE';

/**
 * Failure reported by the event queue service
 */
export class EventQueueError extends Error {
  constructor(
    message: string,
    public readonly code: EventQueueErrorCode
  ) {
    super(message);
    this.name = 'EventQueueError';
  }
}

/**
 * State handed to the page params builder does not have the shape it
 * must have. Always a programming error.
 */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}
