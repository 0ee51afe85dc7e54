/**
 * Raised for any configuration that cannot be processed.
 * `parameter` is the dotted path of the offending value, e.g. `focusPoints[1].radiusPixels`.
 */
export class ConfigurationError extends Error {
    constructor(
        public readonly parameter: string,
        message: string
    ) {
        super(`${parameter}: ${message}`);
        this.name = 'ConfigurationError';
    }
}

export const isConfigurationError = (error: unknown): error is ConfigurationError =>
    error instanceof ConfigurationError;
