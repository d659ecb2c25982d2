export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export type QuarantineStep = 'copy' | 'tag' | 'delete' | 'publish';

/**
 * Raised when one of the quarantine side effects fails. Earlier steps are not
 * rolled back, so a `tag` failure leaves the quarantine copy in place.
 */
export class QuarantineStepError extends Error {
  readonly step: QuarantineStep;

  constructor(step: QuarantineStep, message: string, cause: unknown) {
    super(`Quarantine step "${step}" failed: ${message}`, { cause });
    this.name = 'QuarantineStepError';
    this.step = step;
  }
}
