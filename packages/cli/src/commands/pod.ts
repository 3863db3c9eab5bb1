/**
 * Pod Commands
 *
 * Inspect pod device state and release tentative allocations
 * @module @devstate/cli/commands/pod
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { DeviceStateClient } from '@devstate/core';
import type { ContainerInfo, PodInfo } from '@devstate/shared';
import { runCommand, type ClientFactory } from '../context';
import { getOutputFormat, json, keyValue, resourceTable, success } from '../output';

function printContainers(title: string, containers: Record<string, ContainerInfo>): void {
  for (const [name, container] of Object.entries(containers)) {
    console.log();
    console.log(chalk.bold(`${title} ${name}`));
    resourceTable({
      requests: container.requests,
      kubeRequests: container.kubeRequests,
      devRequests: container.devRequests,
      allocateFrom: container.allocateFrom,
    });
  }
}

function printPodInfo(info: PodInfo): void {
  if (getOutputFormat() === 'json') {
    json(info);
    return;
  }
  keyValue({ Name: info.name, Node: info.nodeName });
  printContainers('Init container', info.initContainers);
  printContainers('Container', info.runningContainers);
}

/**
 * Show handler - prints the reconciled device model of a pod
 */
export async function showPodHandler(
  client: DeviceStateClient,
  name: string,
  namespace: string,
  invalidate: boolean,
): Promise<void> {
  printPodInfo(await client.getPodInfo(name, namespace, invalidate));
}

/**
 * Invalidate handler - drops the pod's device allocation on the cluster
 */
export async function invalidatePodHandler(client: DeviceStateClient, name: string, namespace: string): Promise<void> {
  const { info } = await client.invalidatePodInfo(name, namespace);
  if (getOutputFormat() === 'json') {
    json(info);
    return;
  }
  success(`Invalidated device allocation of pod ${namespace}/${name}`);
}

interface PodShowOptions {
  invalidate?: boolean;
}

/**
 * Creates the pod command group
 */
export function createPodCommand(factory: ClientFactory): Command {
  const pod = new Command('pod').description('Pod device state');

  pod
    .command('show <name>')
    .description('Show the device model of a pod')
    .option('--invalidate', 'Show the model as it would be after invalidation (nothing is written)')
    .action((name: string, options: PodShowOptions, command: Command) =>
      runCommand(command, factory, (client, config) =>
        showPodHandler(client, name, config.namespace, options.invalidate === true),
      ),
    );

  pod
    .command('invalidate <name>')
    .description("Clear a pod's device assignment and mark its device requests outstanding")
    .action((name: string, _options: unknown, command: Command) =>
      runCommand(command, factory, (client, config) => invalidatePodHandler(client, name, config.namespace)),
    );

  return pod;
}
