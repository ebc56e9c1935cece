import { Command } from 'commander';

import { registerAccountsCommand } from './features/accounts/accounts.js';
import { registerBalanceCommand } from './features/balance/balance.js';
import { registerDemoCommand } from './features/demo/demo.js';
import { registerTransferCommand } from './features/transfer/transfer.js';
import { registerValidateCommand } from './features/validate/validate.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('bankwire')
    .description('Client for the remote banking service')
    .version('1.0.0')
    .option('--base-url <url>', 'Banking service base URL (overrides BANKWIRE_BASE_URL)')
    .option('--timeout <seconds>', 'Per-attempt timeout in seconds (overrides BANKWIRE_TIMEOUT_SECONDS)')
    .option('--max-retries <n>', 'Retries after the first attempt (overrides BANKWIRE_MAX_RETRIES)')
    .option('--log-file <path>', 'Also write JSON-lines logs to this file')
    .option('--verbose', 'Log every request attempt and retry');

  // Scripted walkthrough of every operation
  registerDemoCommand(program);

  registerValidateCommand(program);
  registerTransferCommand(program);
  registerAccountsCommand(program);
  registerBalanceCommand(program);

  return program;
}
