import { withBankingClient, type Account } from '@bankwire/banking-client';
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
import { AccountsCommandOptionsSchema } from '../shared/schemas.js';

/**
 * Accounts command options validated by Zod at CLI boundary
 */
export type AccountsCommandOptions = z.infer<typeof AccountsCommandOptionsSchema>;

export function formatAccountLine(account: Account): string {
  return `${account.accountId ?? 'N/A'}: ${account.accountHolder ?? 'N/A'}`;
}

export function registerAccountsCommand(program: Command): void {
  program
    .command('accounts')
    .description('List all accounts')
    .option('--auth', 'Authenticate first and send the bearer token')
    .option('--username <name>', 'Username for --auth (default: testuser)')
    .option('--password <password>', 'Password for --auth (default: password)')
    .option('--json', 'Output results in JSON format')
    .addHelpText(
      'after',
      `
Examples:
  $ bankwire accounts
  $ bankwire accounts --auth --json
`
    )
    .action(async (_options: unknown, command: Command) => {
      await executeAccountsCommand(command.optsWithGlobals());
    });
}

async function executeAccountsCommand(rawOptions: unknown): Promise<void> {
  const { clientOptions, options, output } = prepareCommand('accounts', AccountsCommandOptionsSchema, rawOptions);
  output.intro('bankwire accounts');

  const result = await withBankingClient(clientOptions, async (client): Promise<Result<Account[], CommandFailure>> => {
    const auth = await authenticateIfRequested(client, options);
    if (auth.isErr()) {
      return err(auth.error);
    }
    return (await client.getAccounts(auth.value)).mapErr(toFailure);
  });

  if (result.isErr()) {
    exitWithFailure(output, 'accounts', result.error);
    return;
  }

  const accounts = result.value;
  output.json('accounts', accounts, { count: accounts.length });
  for (const account of accounts) {
    output.log(`  - ${formatAccountLine(account)}`);
  }
  output.outro(pc.green(`✓ Found ${accounts.length} accounts`));
}
