import { z } from 'zod';
import { parseArgs } from '../cli/parser.js';
import { UsageError } from '../errors.js';
import { LOG_LEVELS } from '../utils/logger.js';

export const LOG_LEVEL_ENV = 'DEVOPS_READINESS_LOG_LEVEL';

export const CliOptionsSchema = z.object({
  path: z.string().min(1).default('.'),
  json: z.boolean().default(false),
  failOnCritical: z.boolean().default(false),
  out: z.string().min(1).optional(),
  logLevel: z.enum(LOG_LEVELS).default('warn'),
  help: z.boolean().default(false),
  version: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export const BOOLEAN_FLAGS: ReadonlySet<string> = new Set([
  'json',
  'fail-on-critical',
  'help',
  'version',
]);

const FLAG_KEYS = new Map<string, keyof CliOptions>([
  ['path', 'path'],
  ['json', 'json'],
  ['fail-on-critical', 'failOnCritical'],
  ['out', 'out'],
  ['log-level', 'logLevel'],
  ['help', 'help'],
  ['h', 'help'],
  ['version', 'version'],
  ['v', 'version'],
]);

const FLAG_NAMES = new Map<string, string>([
  ['path', '--path'],
  ['json', '--json'],
  ['failOnCritical', '--fail-on-critical'],
  ['out', '--out'],
  ['logLevel', '--log-level'],
  ['help', '--help'],
  ['version', '--version'],
]);

/** Parse and validate the command line. Throws UsageError on anything unexpected. */
export function parseCliOptions(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): CliOptions {
  const { positionals, flags } = parseArgs(argv, BOOLEAN_FLAGS);
  if (positionals.length > 0) {
    throw new UsageError(`Unexpected argument: ${positionals[0]}`);
  }

  const raw: Record<string, string | boolean> = {};
  const envLevel = env[LOG_LEVEL_ENV];
  if (envLevel) raw['logLevel'] = envLevel;

  for (const [flag, value] of Object.entries(flags)) {
    const key = FLAG_KEYS.get(flag);
    if (!key) {
      throw new UsageError(`Unknown option: ${flag.length === 1 ? '-' : '--'}${flag}`);
    }
    raw[key] = value;
  }

  const parsed = CliOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const flag = FLAG_NAMES.get(String(issue?.path[0])) ?? 'options';
    throw new UsageError(`${flag}: ${issue?.message ?? 'invalid value'}`);
  }
  return parsed.data;
}
