/**
 * CLI context: configuration and client construction
 * @module @devstate/cli/context
 */

import type { Command } from 'commander';
import { createDeviceStateClient, loadConfig, type DeviceStateClient, type DeviceStateConfig } from '@devstate/core';
import { failure } from './output';

/**
 * Builds the client a command talks to; tests substitute in-memory stores
 */
export type ClientFactory = (config: DeviceStateConfig) => DeviceStateClient;

/**
 * Global options shared by all commands
 */
export type GlobalOptions = {
  context?: string;
  kubeconfig?: string;
  namespace?: string;
};

/**
 * Environment configuration overridden by command-line flags
 */
export function resolveConfig(options: GlobalOptions, env: NodeJS.ProcessEnv = process.env): DeviceStateConfig {
  const config = loadConfig(env);
  return {
    ...config,
    context: options.context ?? config.context,
    kubeconfig: options.kubeconfig,
    namespace: options.namespace ?? config.namespace,
  };
}

export const defaultClientFactory: ClientFactory = createDeviceStateClient;

/**
 * Run a command handler with a client built from the resolved configuration.
 * Any failure, configuration errors included, is printed and sets exit code 1.
 */
export async function runCommand(
  command: Command,
  factory: ClientFactory,
  handler: (client: DeviceStateClient, config: DeviceStateConfig) => Promise<void>,
): Promise<void> {
  try {
    const config = resolveConfig(command.optsWithGlobals<GlobalOptions>());
    await handler(factory(config), config);
  } catch (err) {
    failure(err);
    process.exitCode = 1;
  }
}
