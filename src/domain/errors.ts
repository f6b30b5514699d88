export class FinanceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad user-supplied amount or category. Recovered with a re-prompt. */
export class ValidationError extends FinanceError {}

/** The backing store could not be written; the operation was not applied. */
export class PersistenceError extends FinanceError {}

/** Neither classification tier produced a valid intent label. */
export class ClassificationAmbiguous extends FinanceError {
  constructor(readonly label: string) {
    super(`Unrecognized intent label: ${JSON.stringify(label)}`);
  }
}
