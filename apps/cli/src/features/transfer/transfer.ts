import { withBankingClient, type TransferResult } from '@bankwire/banking-client';
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
import { TransferCommandOptionsSchema } from '../shared/schemas.js';

/**
 * Transfer command options validated by Zod at CLI boundary
 */
export type TransferCommandOptions = z.infer<typeof TransferCommandOptionsSchema>;

export function registerTransferCommand(program: Command): void {
  program
    .command('transfer')
    .description('Move funds between two accounts')
    .requiredOption('--from <accountId>', 'Source account')
    .requiredOption('--to <accountId>', 'Destination account')
    .requiredOption('--amount <amount>', 'Amount to transfer (must be greater than 0)')
    .option('--auth', 'Authenticate first and send the bearer token')
    .option('--username <name>', 'Username for --auth (default: testuser)')
    .option('--password <password>', 'Password for --auth (default: password)')
    .option('--json', 'Output results in JSON format')
    .addHelpText(
      'after',
      `
Examples:
  $ bankwire transfer --from ACC1000 --to ACC1001 --amount 100
  $ bankwire transfer --from ACC1002 --to ACC1003 --amount 250.50 --auth
  $ bankwire transfer --from ACC1000 --to ACC1001 --amount 10 --json

Notes:
  - Failed transfers are retried on 429/5xx. A service that does not deduplicate may book a retried transfer twice.
`
    )
    .action(async (_options: unknown, command: Command) => {
      await executeTransferCommand(command.optsWithGlobals());
    });
}

async function executeTransferCommand(rawOptions: unknown): Promise<void> {
  const { clientOptions, options, output } = prepareCommand('transfer', TransferCommandOptionsSchema, rawOptions);
  output.intro('bankwire transfer');

  const result = await withBankingClient(
    clientOptions,
    async (client): Promise<Result<TransferResult, CommandFailure>> => {
      const auth = await authenticateIfRequested(client, options);
      if (auth.isErr()) {
        return err(auth.error);
      }
      const transfer = await client.transferFunds(options.from, options.to, options.amount, auth.value);
      return transfer.mapErr(toFailure);
    }
  );

  if (result.isErr()) {
    exitWithFailure(output, 'transfer', result.error);
    return;
  }

  const transfer = result.value;
  output.json('transfer', {
    transactionId: transfer.transactionId,
    status: transfer.status,
    message: transfer.message,
    fromAccount: transfer.fromAccount,
    toAccount: transfer.toAccount,
    amount: transfer.amount.toFixed(),
  });
  output.note(
    [
      `Transaction ID: ${transfer.transactionId}`,
      `Status: ${transfer.status}`,
      `Message: ${transfer.message}`,
      `${transfer.fromAccount} -> ${transfer.toAccount}: ${transfer.amount.toFixed()}`,
    ].join('\n'),
    'Transfer'
  );
  output.outro(pc.green('✓ Transfer submitted'));
}
