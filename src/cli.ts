import { z } from 'zod';
import { ConfigError } from './utils/errors';

const CliArgsSchema = z.object({
  start: z.coerce.number().int().min(1).default(1),
  n: z.coerce.number().int().optional(),
  concurrency: z.coerce.number().int().min(1).optional(),
  resume: z.string().min(1).optional(),
});

export type CliArgs = z.infer<typeof CliArgsSchema>;

/** Value of `--name=value`; everything after the first `=` is kept */
export function readFlag(args: readonly string[], name: string): string | undefined {
  return args.find((a) => a.startsWith(`--${name}=`))?.slice(name.length + 3);
}

export function parseArgs(args: string[]): CliArgs {
  const parsed = CliArgsSchema.safeParse({
    start: readFlag(args, 'start'),
    n: readFlag(args, 'n'),
    concurrency: readFlag(args, 'concurrency'),
    resume: readFlag(args, 'resume'),
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `--${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid arguments: ${issues}`);
  }
  return parsed.data;
}
