// Pure interpretation of non-success sidecar responses

import { z } from 'zod';

import { ErrorCodes, ErrorMessages, NormalizedError } from '../errors.js';

/**
 * Sidecar error envelope. Fields that are missing or not strings count as empty.
 */
export const SidecarErrorEnvelopeSchema = z.object({
  errorCode: z.string().optional().catch(undefined),
  message: z.string().optional().catch(undefined),
});

export type SidecarErrorEnvelope = z.infer<typeof SidecarErrorEnvelopeSchema>;

/**
 * Build the error for a body that could not be read or is not a JSON object.
 * The response status is kept as is.
 */
export const malformedErrorBody = (status: number, cause: unknown): NormalizedError =>
  new NormalizedError('sidecar-error', status, ErrorCodes.UNKNOWN, ErrorMessages.ERROR_BODY_NOT_JSON, cause);

/**
 * Parse an error body into its envelope fields.
 * Returns a NormalizedError when the body is not a JSON object.
 */
export const parseErrorEnvelope = (status: number, body: string): SidecarErrorEnvelope | NormalizedError => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    return malformedErrorBody(status, error);
  }

  const result = SidecarErrorEnvelopeSchema.safeParse(parsed);
  if (!result.success) {
    return malformedErrorBody(status, result.error);
  }
  return result.data;
};

/**
 * Turn a non-success status and its (optional) body text into a NormalizedError.
 *
 * An undefined or empty body leaves both fields empty. Defaults only fill
 * fields the sidecar left empty, so a sidecar-specific 404 code or message
 * is never masked.
 */
export const interpretErrorResponse = (status: number, body: string | undefined): NormalizedError => {
  let envelope: SidecarErrorEnvelope = {};

  if (body !== undefined && body.trim() !== '') {
    const parsed = parseErrorEnvelope(status, body);
    if (parsed instanceof NormalizedError) {
      return parsed;
    }
    envelope = parsed;
  }

  const errorCode = envelope.errorCode ?? '';
  const message = envelope.message ?? '';

  if (status === 404) {
    return new NormalizedError(
      'sidecar-error',
      status,
      errorCode || ErrorCodes.DOES_NOT_EXIST,
      message || ErrorMessages.RESOURCE_NOT_CONFIGURED
    );
  }

  return new NormalizedError(
    'sidecar-error',
    status,
    errorCode || ErrorCodes.UNKNOWN,
    message || ErrorMessages.NO_MEANINGFUL_MESSAGE
  );
};
