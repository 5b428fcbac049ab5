// Pure address helpers - no side effects

/**
 * Pick the sidecar address for a call: the explicit override when it is a
 * non-empty string, otherwise the configured default. Trailing slashes are
 * removed from the returned value.
 */
export const resolveAddress = (explicit: string | undefined, defaultAddress: string): string => {
  const address = explicit !== undefined && explicit.trim() !== '' ? explicit.trim() : defaultAddress;
  return address.replace(/\/+$/, '');
};

/**
 * Join a resolved address with an API path.
 */
export const buildSidecarUrl = (address: string, path: string): string => {
  const cleanPath = path.startsWith('/') ? path : `/${path}`;
  return `${address}${cleanPath}`;
};

/**
 * Build an API path from literal and caller-supplied segments.
 * Caller-supplied segments are URI-encoded.
 */
export const sidecarPath = (literals: TemplateStringsArray, ...segments: string[]): string =>
  literals.reduce((path, literal, index) => {
    const segment = segments[index];
    return segment === undefined ? `${path}${literal}` : `${path}${literal}${encodeURIComponent(segment)}`;
  }, '');
