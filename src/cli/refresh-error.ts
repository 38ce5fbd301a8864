import type { AppError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import { formatAppError } from '../errors/formatter.js';
import type { RefreshError } from '../application/services/cache-service.js';
import type { ResolveError } from '../application/services/cache-root-resolver.js';
import { assertNever } from '../runtime/assert-never.js';

/**
 * Lift a refresh/resolve failure into the application error union shown to the user.
 */
export function toAppError(error: RefreshError | ResolveError): AppError {
  switch (error.code) {
    case 'UNRESOLVED':
      return Err.rootUnresolved(error.variable);
    case 'STORE_FAILED':
      return Err.unexpected(`Could not store $${error.variable}`, error.message);
    case 'ROOT_UNAVAILABLE':
    case 'ROOT_UNREADABLE':
    case 'SCAN_FAILED':
      return Err.rootUnavailable(error.rootPath, error.message);
    default:
      return assertNever(error);
  }
}

export function describeRefreshError(error: RefreshError | ResolveError): string {
  return formatAppError(toAppError(error));
}
