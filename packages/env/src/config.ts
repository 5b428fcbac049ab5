import { z } from 'zod';

export const DEFAULT_SIDECAR_HTTP_PORT = 3500;

/**
 * Parse a sidecar port value. Anything that is not a whole number in the
 * TCP port range falls back to the default port.
 */
export function parseSidecarPort(value: string | undefined): number {
  if (value === undefined || !/^\s*\+?\d+\s*$/.test(value)) {
    return DEFAULT_SIDECAR_HTTP_PORT;
  }

  const port = Number.parseInt(value, 10);
  return port >= 1 && port <= 65535 ? port : DEFAULT_SIDECAR_HTTP_PORT;
}

const envSchema = z.object({
  DAPR_HTTP_PORT: z
    .string()
    .optional()
    .transform((value) => parseSidecarPort(value)),
});

export type ValidatedEnv = z.infer<typeof envSchema>;

/**
 * Immutable configuration handed to the sidecar client at construction.
 */
export interface SidecarEnvConfig {
  readonly defaultAddress: string;
  readonly port: number;
}

let validatedEnv: ValidatedEnv | undefined;

/**
 * Validates environment variables.
 * When called without an explicit env, the process env is validated once and cached.
 * @throws Error if validation fails
 */
export function validateEnv(env?: NodeJS.ProcessEnv): ValidatedEnv {
  if (env) {
    return parseEnv(env);
  }

  if (!validatedEnv) {
    validatedEnv = parseEnv(process.env);
  }
  return validatedEnv;
}

function parseEnv(env: NodeJS.ProcessEnv): ValidatedEnv {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }
  return result.data;
}

/**
 * Sidecar settings, with the default base address `http://localhost:<DAPR_HTTP_PORT>`.
 */
export function getSidecarEnvConfig(env?: NodeJS.ProcessEnv): SidecarEnvConfig {
  const { DAPR_HTTP_PORT } = validateEnv(env);
  return Object.freeze({
    defaultAddress: `http://localhost:${DAPR_HTTP_PORT}`,
    port: DAPR_HTTP_PORT,
  });
}

const testEnvironmentSchema = z.object({
  DAPR_TEST_APP_REGISTRY: z
    .string({ required_error: 'Environment variable DAPR_TEST_APP_REGISTRY is not set' })
    .trim()
    .min(1, { message: 'Environment variable DAPR_TEST_APP_REGISTRY is not set' }),
  DAPR_TEST_APP_TAG: z
    .string({ required_error: 'Environment variable DAPR_TEST_APP_TAG is not set' })
    .trim()
    .min(1, { message: 'Environment variable DAPR_TEST_APP_TAG is not set' }),
});

export type TestEnvironmentEnv = z.infer<typeof testEnvironmentSchema>;

/**
 * Registry and tag of the test applications used by end-to-end environments.
 * @throws Error if either variable is unset or empty
 */
export function getTestEnvironmentEnv(env: NodeJS.ProcessEnv = process.env): TestEnvironmentEnv {
  const result = testEnvironmentSchema.safeParse(env);
  if (!result.success) {
    throw new Error(result.error.issues.map((e) => e.message).join('; '));
  }
  return result.data;
}

/**
 * Clears the cached process env validation. Tests only.
 */
export function resetEnvCache(): void {
  validatedEnv = undefined;
}
