import { withBankingClient, type AccountBalance } from '@bankwire/banking-client';
import type { Command } from 'commander';
import { err, type Result } from 'neverthrow';
import pc from 'picocolors';
import type { z } from 'zod';

import {
  authenticateIfRequested,
  exitWithFailure,
  prepareCommand,
  toFailure,
  type CommandFailure,
} from '../shared/command-execution.js';
import { BalanceCommandOptionsSchema } from '../shared/schemas.js';

/**
 * Balance command options validated by Zod at CLI boundary
 */
export type BalanceCommandOptions = z.infer<typeof BalanceCommandOptionsSchema>;

export function registerBalanceCommand(program: Command): void {
  program
    .command('balance')
    .description('Show the balance of one account')
    .argument('<accountId>', 'Account ID')
    .option('--auth', 'Authenticate first and send the bearer token')
    .option('--username <name>', 'Username for --auth (default: testuser)')
    .option('--password <password>', 'Password for --auth (default: password)')
    .option('--json', 'Output results in JSON format')
    .addHelpText(
      'after',
      `
Examples:
  $ bankwire balance ACC1000
  $ bankwire balance ACC1000 --auth --json
`
    )
    .action(async (accountId: string, _options: unknown, command: Command) => {
      await executeBalanceCommand(accountId, command.optsWithGlobals());
    });
}

async function executeBalanceCommand(accountId: string, rawOptions: unknown): Promise<void> {
  const { clientOptions, options, output } = prepareCommand('balance', BalanceCommandOptionsSchema, rawOptions);
  output.intro('bankwire balance');

  const result = await withBankingClient(
    clientOptions,
    async (client): Promise<Result<AccountBalance, CommandFailure>> => {
      const auth = await authenticateIfRequested(client, options);
      if (auth.isErr()) {
        return err(auth.error);
      }
      return (await client.getAccountBalance(accountId, auth.value)).mapErr(toFailure);
    }
  );

  if (result.isErr()) {
    exitWithFailure(output, 'balance', result.error);
    return;
  }

  const balance = result.value;
  output.json('balance', { ...balance, balance: balance.balance?.toFixed() });
  output.note(
    [
      `Account: ${balance.accountId ?? accountId}`,
      `Balance: ${balance.balance?.toFixed() ?? 'N/A'}`,
      `Currency: ${balance.currency ?? 'N/A'}`,
    ].join('\n'),
    'Balance'
  );
  output.outro(pc.green('✓ Balance retrieved'));
}
