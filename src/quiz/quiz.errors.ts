export class QuizError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The question source is missing, unreadable or not in the expected shape. */
export class ContentUnavailableError extends QuizError {}

/** A question index outside the bank was requested. */
export class OutOfRangeError extends QuizError {
  constructor(
    readonly index: number,
    readonly count: number,
  ) {
    super(`Question index ${index} is out of range (bank has ${count} questions)`);
  }
}

/** The messaging provider could not be reached or rejected a message. */
export class SendFailureError extends QuizError {}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
