import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { tryParseDecimal } from './decimal-utils.js';
import { ValidationError } from './errors.js';

export type AmountInput = number | string | Decimal;

/**
 * A transfer that passed pre-network validation: both account ids are
 * non-blank and the amount is a positive decimal that a JSON number carries exactly.
 */
export class TransferRequest {
  private constructor(
    readonly fromAccount: string,
    readonly toAccount: string,
    readonly amount: Decimal
  ) {}

  static create(fromAccount: string, toAccount: string, amount: AmountInput): Result<TransferRequest, ValidationError> {
    const parsed = tryParseDecimal(amount);
    if (!parsed) {
      return err(new ValidationError(`Amount must be a finite number, got ${String(amount)}`, 'amount'));
    }
    if (parsed.lte(0)) {
      return err(new ValidationError(`Amount must be greater than 0, got ${parsed.toFixed()}`, 'amount'));
    }
    const wireAmount = parsed.toNumber();
    if (!Number.isFinite(wireAmount) || wireAmount <= 0 || !new Decimal(wireAmount).eq(parsed)) {
      return err(
        new ValidationError(`Amount cannot be sent as a JSON number without loss, got ${parsed.toString()}`, 'amount')
      );
    }
    if (fromAccount.trim() === '') {
      return err(new ValidationError('Source account must not be empty', 'fromAccount'));
    }
    if (toAccount.trim() === '') {
      return err(new ValidationError('Destination account must not be empty', 'toAccount'));
    }
    return ok(new TransferRequest(fromAccount, toAccount, parsed));
  }

  /**
   * Wire shape. The service takes the amount as a JSON number.
   */
  toJSON(): { amount: number; fromAccount: string; toAccount: string } {
    return {
      fromAccount: this.fromAccount,
      toAccount: this.toAccount,
      amount: this.amount.toNumber(),
    };
  }
}
