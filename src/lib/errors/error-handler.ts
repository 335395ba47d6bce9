/**
 * Centralized error formatting for the command line.
 */

import { isShowcaseError } from './errors.js';

export interface ErrorMessageOptions {
    /** The error that occurred */
    error: unknown;
    /** Base error message to display */
    baseMessage: string;
    /** Custom error code handlers */
    errorHandlers?: Record<string, string>;
}

/**
 * Maps showcase errors to readable messages with consistent formatting.
 * @param options - Error handling options
 * @returns Formatted error message string
 */
export function formatErrorMessage(options: ErrorMessageOptions): string {
    const { error, baseMessage, errorHandlers = {} } = options;

    let errorMessage = `${baseMessage}: `;

    if (isShowcaseError(error)) {
        const custom = errorHandlers[error.code];
        if (custom) {
            errorMessage += custom;
        } else {
            switch (error.code) {
                case 'USAGE_ERROR':
                    errorMessage += `${error.message}\nRun with --help to see the available flags.`;
                    break;
                case 'CACHE_ERROR':
                    errorMessage += `${error.message}\nCheck the --cache path or regenerate it with --write-cache.`;
                    break;
                case 'CONFIG_ERROR':
                    errorMessage += `${error.message}\nFix the environment (or .env file) and try again.`;
                    break;
                default:
                    errorMessage += error.message;
            }
        }
    } else if (error instanceof Error) {
        errorMessage += error.message;
    } else {
        errorMessage += String(error);
    }

    return errorMessage;
}
