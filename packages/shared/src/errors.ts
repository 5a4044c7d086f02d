/**
 * Thrown by the event constructors when a payload is malformed.
 */
export class EventValidationError extends Error {
  override readonly name = 'EventValidationError';
  readonly eventKind: 'log' | 'progress';
  readonly issues: string[];

  constructor(eventKind: 'log' | 'progress', issues: string[]) {
    super(`Invalid ${eventKind} event: ${issues.join('; ')}`);
    this.eventKind = eventKind;
    this.issues = issues;
    Object.setPrototypeOf(this, EventValidationError.prototype);
  }
}
