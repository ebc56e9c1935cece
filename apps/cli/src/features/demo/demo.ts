import { withBankingClient } from '@bankwire/banking-client';
import type { Command } from 'commander';
import type { z } from 'zod';

import { prepareCommand } from '../shared/command-execution.js';
import { DemoCommandOptionsSchema } from '../shared/schemas.js';

import { runDemo } from './demo-runner.js';

/**
 * Demo command options validated by Zod at CLI boundary
 */
export type DemoCommandOptions = z.infer<typeof DemoCommandOptionsSchema>;

export function registerDemoCommand(program: Command): void {
  program
    .command('demo')
    .description('Run a scripted walkthrough of every operation')
    .option('--username <name>', 'Username for the authenticated step (default: testuser)')
    .option('--password <password>', 'Password for the authenticated step (default: password)')
    .option('--json', 'Output the step results in JSON format')
    .addHelpText(
      'after',
      `
Examples:
  $ bankwire demo
  $ bankwire --base-url http://localhost:8123 --log-file banking_client.log demo
`
    )
    .action(async (_options: unknown, command: Command) => {
      await executeDemoCommand(command.optsWithGlobals());
    });
}

async function executeDemoCommand(rawOptions: unknown): Promise<void> {
  const { clientOptions, options, output } = prepareCommand('demo', DemoCommandOptionsSchema, rawOptions);
  output.intro('bankwire demo');

  const report = await withBankingClient(clientOptions, (client) =>
    runDemo(client, output, { username: options.username, password: options.password })
  );

  output.json('demo', report);
  output.outro('Demo completed!');
}
