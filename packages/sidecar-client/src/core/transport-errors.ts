// Pure classification of transport failures

const MAX_CAUSE_DEPTH = 8;

const hasErrorCode = (value: unknown, code: string): boolean =>
  typeof value === 'object' && value !== null && 'code' in value && value.code === code;

/**
 * Detect a refused TCP connection anywhere in an error's cause chain.
 *
 * undici reports it as `TypeError: fetch failed` with the socket error as
 * `cause`; with address-family autoselection the cause can be an
 * AggregateError holding one refusal per attempted address.
 */
export const isConnectionRefused = (error: unknown, depth = 0): boolean => {
  if (depth > MAX_CAUSE_DEPTH || typeof error !== 'object' || error === null) {
    return false;
  }

  if (hasErrorCode(error, 'ECONNREFUSED')) {
    return true;
  }

  if (error instanceof AggregateError && error.errors.some((inner) => isConnectionRefused(inner, depth + 1))) {
    return true;
  }

  return error instanceof Error && isConnectionRefused(error.cause, depth + 1);
};

/**
 * Message of an unknown thrown value.
 */
export const getErrorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
