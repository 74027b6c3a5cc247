/**
 * Failure kinds raised by the digitization pipeline.
 * Every kind is fatal for the run that raised it.
 */
export type DigitizerErrorKind =
    | 'MalformedDocument'
    | 'UnparsableLabel'
    | 'UnassociatedLabel'
    | 'InsufficientCalibration'
    | 'DegenerateCalibration'
    | 'InconsistentCalibration'
    | 'MissingCurve'
    | 'AmbiguousCurve'
    | 'AmbiguousCurrentAxis'
    | 'UnsupportedUnit'
    | 'MissingScanRate';

/**
 * Error raised by any pipeline stage. `kind` discriminates the failure;
 * `details` carries the offending values for logging.
 */
export class DigitizerError extends Error {
    constructor(
        public readonly kind: DigitizerErrorKind,
        message: string,
        public readonly details?: Readonly<Record<string, unknown>>,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'DigitizerError';
    }
}

/**
 * Type guard for DigitizerError, optionally of a specific kind.
 */
export function isDigitizerError(value: unknown, kind?: DigitizerErrorKind): value is DigitizerError {
    return value instanceof DigitizerError && (kind === undefined || value.kind === kind);
}
