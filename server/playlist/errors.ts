export type FailureStage = 'configuration' | 'acquisition';

export abstract class PlaylistError extends Error {
  abstract readonly stage: FailureStage;
}

/** Missing credentials, origins or a usable taxonomy. Raised before any network call. */
export class ConfigurationError extends PlaylistError {
  readonly stage = 'configuration' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export interface OriginFailure {
  origin: string;
  reason: string;
}

/** Every attempt against every origin failed. */
export class AcquisitionError extends PlaylistError {
  readonly stage = 'acquisition' as const;
  readonly attempts: number;
  readonly failures: OriginFailure[];

  constructor(attempts: number, failures: OriginFailure[]) {
    super(`No origin produced a valid playlist after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${summarizeFailures(failures)}`);
    this.name = 'AcquisitionError';
    this.attempts = attempts;
    this.failures = failures;
  }
}

export const summarizeFailures = (failures: OriginFailure[]): string =>
  failures.length ? failures.map((f) => `${f.origin}: ${f.reason}`).join('; ') : 'no attempts were made';

export const isPlaylistError = (error: unknown): error is PlaylistError => error instanceof PlaylistError;

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
