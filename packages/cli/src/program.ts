/**
 * devstate CLI program
 * @module @devstate/cli/program
 */

import { Command } from 'commander';
import { createNodeCommand, createPodCommand } from './commands';
import { defaultClientFactory, type ClientFactory } from './context';
import { isOutputFormat, setOutputFormat } from './output';

const VERSION = '0.1.0';

const DESCRIPTION = `
devstate CLI

Inspect and repair the device state a device scheduler keeps in the
KubeDevice/DeviceInfo annotation of nodes and pods.

Examples:
  $ devstate node show gpu-node-1
  $ devstate node sync gpu-node-1
  $ devstate pod show trainer-0 -n ml --invalidate
  $ devstate pod invalidate trainer-0 -n ml
`;

/**
 * Creates and configures the main CLI program
 */
export function createProgram(factory: ClientFactory = defaultClientFactory): Command {
  const program = new Command();

  program
    .name('devstate')
    .version(VERSION, '-v, --version', 'Display CLI version')
    .description(DESCRIPTION)
    .option('-o, --output <format>', 'Output format: json, plain', 'plain')
    .option('-n, --namespace <namespace>', 'Namespace of pods')
    .option('--context <context>', 'kubeconfig context')
    .option('--kubeconfig <path>', 'kubeconfig file')
    .option('--no-color', 'Disable colored output')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts<{ output?: string; color?: boolean }>();
      if (isOutputFormat(opts.output)) {
        setOutputFormat(opts.output);
      }
      if (opts.color === false) {
        process.env.FORCE_COLOR = '0';
      }
    });

  program.addCommand(createNodeCommand(factory));
  program.addCommand(createPodCommand(factory));

  return program;
}
