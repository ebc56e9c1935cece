import { z } from 'zod';

/**
 * Commander hands option values over as strings; these parse them to numbers.
 */
const secondsOption = (flag: string) =>
  z
    .string()
    .trim()
    .min(1, `${flag} must not be empty`)
    .pipe(z.coerce.number().finite().positive(`${flag} must be a positive number of seconds`));

const countOption = (flag: string) =>
  z
    .string()
    .trim()
    .min(1, `${flag} must not be empty`)
    .pipe(
      z.coerce
        .number()
        .int(`${flag} must be a whole number`)
        .nonnegative(`${flag} must be a non-negative whole number`)
    );

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

/**
 * Options declared on the root program, visible to every command.
 */
export const GlobalOptionsSchema = z.object({
  baseUrl: z.string().url('--base-url must be a valid URL').optional(),
  timeout: secondsOption('--timeout').optional(),
  maxRetries: countOption('--max-retries').optional(),
  logFile: z.string().min(1, '--log-file must not be empty').optional(),
  verbose: z.boolean().optional(),
});

export const AuthOptionsSchema = z.object({
  auth: z.boolean().optional(),
  username: z.string().min(1, '--username must not be empty').optional(),
  password: z.string().min(1, '--password must not be empty').optional(),
});

export const ValidateCommandOptionsSchema = GlobalOptionsSchema.extend(JsonFlagSchema.shape);

/**
 * Amount stays a string here; the client parses it into a Decimal.
 */
export const TransferCommandOptionsSchema = GlobalOptionsSchema.extend(JsonFlagSchema.shape)
  .extend(AuthOptionsSchema.shape)
  .extend({
    from: z.string().trim().min(1, '--from must not be empty'),
    to: z.string().trim().min(1, '--to must not be empty'),
    amount: z.string().trim().min(1, '--amount must not be empty'),
  });

export const AccountsCommandOptionsSchema = GlobalOptionsSchema.extend(JsonFlagSchema.shape).extend(
  AuthOptionsSchema.shape
);

export const BalanceCommandOptionsSchema = GlobalOptionsSchema.extend(JsonFlagSchema.shape).extend(
  AuthOptionsSchema.shape
);

export const DemoCommandOptionsSchema = GlobalOptionsSchema.extend(JsonFlagSchema.shape).extend({
  username: z.string().min(1, '--username must not be empty').optional(),
  password: z.string().min(1, '--password must not be empty').optional(),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;
export type AuthOptions = z.infer<typeof AuthOptionsSchema>;
