import { type CliOptions, LOG_LEVEL_ENV, parseCliOptions } from '../config/options.js';
import { PathError, UsageError } from '../errors.js';
import { runAudit, VERSION } from '../index.js';
import { exitCodeFor } from '../report.js';
import { renderHuman } from '../reporters/human.js';
import { renderJson, writeJson } from '../reporters/json.js';
import type { AuditReport } from '../types.js';
import { createLogger } from '../utils/logger.js';

export interface CliIo {
  out(text: string): void;
  err(text: string): void;
}

const processIo: CliIo = {
  out: (text) => process.stdout.write(text + '\n'),
  err: (text) => process.stderr.write(text + '\n'),
};

export const HELP = `devops-readiness v${VERSION} - audit a repository for DevOps maturity

Usage: devops-readiness [options]

Options:
  --path <dir>          Repository root to scan (default: current directory)
  --json                Print the report as JSON
  --fail-on-critical    Exit with code 1 if any critical check fails
  --out <dir>           Also write report.json into <dir>
  --log-level <level>   debug, info, warn, error or silent (env: ${LOG_LEVEL_ENV})
  --help, -h            Show this help message
  --version, -v         Show version

Exit codes: 0 done, 1 critical failure with --fail-on-critical,
            2 invalid path, invalid arguments or unwritable --out`;

/** Whole CLI run; returns the process exit code. */
export async function runCli(
  argv: readonly string[],
  io: CliIo = processIo,
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliOptions(argv, env);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    io.err(`Error: ${err.message}`);
    io.err(`Run 'devops-readiness --help' for usage.`);
    return 2;
  }

  if (options.help) {
    io.out(HELP);
    return 0;
  }
  if (options.version) {
    io.out(`devops-readiness v${VERSION}`);
    return 0;
  }

  const logger = createLogger({ level: options.logLevel, json: options.json });

  let report: AuditReport;
  try {
    report = await runAudit(options.path, { logger });
  } catch (err) {
    if (!(err instanceof PathError)) throw err;
    logger.debug('Audit aborted', { root: err.root, reason: err.reason });
    io.err(`Invalid path: ${err.root}`);
    return 2;
  }

  io.out(options.json ? renderJson(report) : renderHuman(report));

  if (options.out) {
    try {
      const file = await writeJson(report, options.out);
      logger.info('Wrote JSON report', { file });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.debug('Report write failed', { out: options.out, error: message });
      io.err(`Could not write report to ${options.out}: ${message}`);
      return 2;
    }
  }

  return exitCodeFor(report, options.failOnCritical);
}
