import { getSidecarEnvConfig } from '@daprlink/env';
import { err, ok, type Result } from 'neverthrow';

import { SidecarClient } from './client.js';
import { getErrorMessage } from './core/transport-errors.js';
import type { SidecarEffects } from './core/types.js';
import type { SidecarClientConfig } from './types.js';

export interface CreateSidecarClientOptions {
  /** Environment to read DAPR_HTTP_PORT from. Defaults to process.env. */
  env?: NodeJS.ProcessEnv | undefined;
  config?: Partial<SidecarClientConfig> | undefined;
  effects?: Partial<SidecarEffects> | undefined;
}

/**
 * Create a sidecar client whose default address comes from the environment,
 * `http://localhost:<DAPR_HTTP_PORT>` (port 3500 when unset or unparseable).
 * An explicit `config.defaultAddress` wins over the environment.
 */
export function createSidecarClient(options: CreateSidecarClientOptions = {}): Result<SidecarClient, Error> {
  try {
    const { defaultAddress } = getSidecarEnvConfig(options.env);
    return ok(new SidecarClient({ defaultAddress, ...options.config }, options.effects));
  } catch (error) {
    return err(new Error(`Failed to create sidecar client: ${getErrorMessage(error)}`));
  }
}
