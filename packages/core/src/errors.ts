/**
 * Error types raised by writers.
 */

/**
 * Thrown when a writer tries to write to a destination that has been ended
 * or destroyed. Raised from the log or progress call that triggered the write.
 */
export class DestinationClosedError extends Error {
  override readonly name = 'DestinationClosedError';
  readonly writerId: string;

  constructor(writerId: string) {
    super(`Destination of writer ${writerId} is no longer writable`);
    this.writerId = writerId;
    Object.setPrototypeOf(this, DestinationClosedError.prototype);
  }
}

/**
 * Thrown when a second writer is opened on a destination that already has one.
 */
export class DestinationInUseError extends Error {
  override readonly name = 'DestinationInUseError';
  readonly ownerId: string;

  constructor(ownerId: string) {
    super(`Destination is already owned by writer ${ownerId}`);
    this.ownerId = ownerId;
    Object.setPrototypeOf(this, DestinationInUseError.prototype);
  }
}
