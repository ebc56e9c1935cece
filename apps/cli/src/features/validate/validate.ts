import { withBankingClient } from '@bankwire/banking-client';
import type { Command } from 'commander';
import pc from 'picocolors';
import type { z } from 'zod';

import { exitWithFailure, prepareCommand, toFailure } from '../shared/command-execution.js';
import { ValidateCommandOptionsSchema } from '../shared/schemas.js';

/**
 * Validate command options validated by Zod at CLI boundary
 */
export type ValidateCommandOptions = z.infer<typeof ValidateCommandOptionsSchema>;

export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Check whether an account exists and is active')
    .argument('<accountId>', 'Account ID to validate')
    .option('--json', 'Output results in JSON format')
    .addHelpText(
      'after',
      `
Examples:
  $ bankwire validate ACC1000
  $ bankwire --base-url http://localhost:8123 validate ACC2000 --json
`
    )
    .action(async (accountId: string, _options: unknown, command: Command) => {
      await executeValidateCommand(accountId, command.optsWithGlobals());
    });
}

async function executeValidateCommand(accountId: string, rawOptions: unknown): Promise<void> {
  const { clientOptions, output } = prepareCommand('validate', ValidateCommandOptionsSchema, rawOptions);
  output.intro('bankwire validate');

  const result = await withBankingClient(clientOptions, (client) => client.validateAccount(accountId));
  if (result.isErr()) {
    exitWithFailure(output, 'validate', toFailure(result.error));
    return;
  }

  output.json('validate', { accountId, valid: result.value });
  output.outro(result.value ? pc.green(`✓ Valid: ${accountId}`) : pc.red(`✗ Invalid: ${accountId}`));
}
