/**
 * Errors raised by the dialog storage layer. None of them are retried or
 * wrapped internally; callers decide how to recover.
 */
export class DialogStorageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** No stored context exists for the requested intent id (expired, closed or never created). */
export class UnknownIntentError extends DialogStorageError {}

/**
 * A persisted state identifier does not match the currently registered state groups.
 * Usually means stored data predates a change in the state definitions.
 */
export class UnknownStateError extends DialogStorageError {}

export class DialogStackOverflowError extends DialogStorageError {}

export class DialogStackEmptyError extends DialogStorageError {}
