import { parseArgs } from 'util';
import { z } from 'zod';
import { ValidationError } from '../errors';

export type CliOptions = {
  query: string;
  maxResults: number;
  file?: string;
  debug: boolean;
  help: boolean;
};

export const USAGE = `Usage: get-papers-list --query "<PubMed query>" [options]

Options:
  -q, --query <query>   PubMed search query (required)
  -m, --max <n>         Maximum number of results to fetch
  -f, --file <path>     Write results to a CSV file instead of the console
  -d, --debug           Print debug information during execution
  -h, --help            Show this help`;

const ArgsSchema = z.object({
  query: z
    .string({ required_error: '--query is required' })
    .trim()
    .min(1, '--query must not be empty'),
  max: z.coerce
    .number({ invalid_type_error: '--max must be a number' })
    .int('--max must be an integer')
    .min(0, '--max must be zero or greater')
    .optional(),
  file: z.string().trim().min(1, '--file must not be empty').optional(),
  debug: z.boolean().default(false),
});

function readArgv(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        query: { type: 'string', short: 'q' },
        max: { type: 'string', short: 'm' },
        file: { type: 'string', short: 'f' },
        debug: { type: 'boolean', short: 'd' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (err) {
    throw new ValidationError('Invalid arguments', [err instanceof Error ? err.message : String(err)]);
  }
}

export function parseCliArgs(argv: string[], defaultMaxResults: number): CliOptions {
  const values = readArgv(argv);

  if (values.help === true) {
    return { query: '', maxResults: defaultMaxResults, debug: false, help: true };
  }

  const parsed = ArgsSchema.safeParse(values);
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid arguments',
      parsed.error.issues.map((issue) => issue.message)
    );
  }

  return {
    query: parsed.data.query,
    maxResults: parsed.data.max ?? defaultMaxResults,
    file: parsed.data.file,
    debug: parsed.data.debug,
    help: false,
  };
}
