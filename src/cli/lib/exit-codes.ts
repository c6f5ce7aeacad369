// Semantic exit codes for CLI
import { isFetchError, isRenderError, isValidationError, isConfigError } from '../../lib/errors.js'

export const EXIT_SUCCESS = 0
export const EXIT_ERROR = 1
export const EXIT_USER_ERROR = 2      // Invalid input, missing args, bad config
export const EXIT_NOT_FOUND = 3       // Secret does not exist
export const EXIT_ACCESS_DENIED = 4   // Credentials or IAM policy
export const EXIT_NETWORK_ERROR = 5   // Endpoint unreachable, timeouts
export const EXIT_ENCODING_ERROR = 6  // Content not representable in the format
export const EXIT_WRITE_ERROR = 7     // Output file could not be written

export function exitCodeFor(error: unknown): number {
  if (isFetchError(error)) {
    switch (error.kind) {
      case 'NotFound':
        return EXIT_NOT_FOUND
      case 'AccessDenied':
        return EXIT_ACCESS_DENIED
      case 'NetworkError':
        return EXIT_NETWORK_ERROR
      case 'Other':
        return EXIT_ERROR
    }
  }
  if (isRenderError(error)) {
    return error.stage === 'encode' ? EXIT_ENCODING_ERROR : EXIT_WRITE_ERROR
  }
  if (isValidationError(error) || isConfigError(error)) {
    return EXIT_USER_ERROR
  }
  return EXIT_ERROR
}
