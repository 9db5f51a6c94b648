import { parseDateArg } from './date-key.js';
import { parseLogLevel, type LogLevel } from './logger.js';

export interface JobCliOptions {
  date?: Date;
  logLevel?: LogLevel;
  noProxy?: boolean;
  headed?: boolean;
  dryRun?: boolean;
}

export interface ParsedArgs {
  command: string | undefined;
  options: JobCliOptions;
}

/**
 * Parse command line arguments supporting both formats:
 * - --param=value
 * - --param value
 *
 * Boolean flags (like --dry-run) don't take values.
 * @throws Error on an unknown flag or a malformed value
 */
export function parseArgs(args: string[]): ParsedArgs {
  const command = args[0]?.startsWith('--') ? undefined : args[0];
  const options: JobCliOptions = {};

  for (let i = command === undefined ? 0 : 1; i < args.length; i++) {
    const arg = args[i];

    const valueOf = (name: string): string => {
      if (arg.startsWith(`${name}=`)) {
        return arg.slice(name.length + 1);
      }
      if (i + 1 >= args.length) {
        throw new Error(`Missing value for ${name}`);
      }
      return args[++i];
    };

    if (arg === '--date' || arg.startsWith('--date=')) {
      options.date = parseDateArg(valueOf('--date'));
    } else if (arg === '--log-level' || arg.startsWith('--log-level=')) {
      options.logLevel = parseLogLevel(valueOf('--log-level'));
    } else if (arg === '--no-proxy') {
      options.noProxy = true;
    } else if (arg === '--headed') {
      options.headed = true;
    } else if (arg === '--dry-run') {
      options.dryRun = true;
    } else {
      throw new Error(`Unknown option: ${arg}`);
    }
  }

  return { command, options };
}
