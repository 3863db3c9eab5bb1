/**
 * Node Commands
 *
 * Inspect and resynchronize node device state
 * @module @devstate/cli/commands/node
 */

import { Command } from 'commander';
import type { DeviceStateClient } from '@devstate/core';
import type { NodeInfo } from '@devstate/shared';
import { runCommand, type ClientFactory } from '../context';
import { getOutputFormat, json, keyValue, resourceTable, success } from '../output';

function printNodeInfo(info: NodeInfo): void {
  if (getOutputFormat() === 'json') {
    json(info);
    return;
  }
  keyValue({ Name: info.name });
  console.log();
  resourceTable({
    capacity: info.capacity,
    allocatable: info.allocatable,
    used: info.used,
    kubeCap: info.kubeCap,
    kubeAlloc: info.kubeAlloc,
  });
}

/**
 * Show handler - prints the reconciled device model of a node
 */
export async function showNodeHandler(client: DeviceStateClient, name: string): Promise<void> {
  const info = await client.getNodeInfo(name);
  printNodeInfo(info);
}

/**
 * Sync handler - writes the reconciled model back to the node's annotation
 */
export async function syncNodeHandler(client: DeviceStateClient, name: string): Promise<void> {
  const info = await client.getNodeInfo(name);
  const node = await client.writeNodeInfo(name, info);
  success(`Synchronized device info of node ${name} (resourceVersion ${node.metadata?.resourceVersion ?? 'unknown'})`);
}

/**
 * Creates the node command group
 */
export function createNodeCommand(factory: ClientFactory): Command {
  const node = new Command('node').description('Node device state');

  node
    .command('show <name>')
    .description('Show the device model of a node')
    .action((name: string, _options: unknown, command: Command) =>
      runCommand(command, factory, (client) => showNodeHandler(client, name)),
    );

  node
    .command('sync <name>')
    .description('Re-read a node and write its reconciled device model back')
    .action((name: string, _options: unknown, command: Command) =>
      runCommand(command, factory, (client) => syncNodeHandler(client, name)),
    );

  return node;
}
