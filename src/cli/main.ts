// Command-line surface over the integrity core: keygen, seal, verify, compare, digest.

import { parseArgs, stringFlag } from './args.js';
import type { CommandContext, ExitCode } from './commands.js';
import { EXIT, runCompare, runDigest, runKeygen, runSeal, runVerify } from './commands.js';
import { resolveConfig } from '../config.js';
import { createConsoleLogger } from '../logger.js';
import { OracleError, describeError } from '../errors.js';
import { describeProtocol } from '../versions.js';

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
  env: Readonly<Record<string, string | undefined>>;
}

const defaultIo: CliIo = {
  out: line => process.stdout.write(`${line}\n`),
  err: line => process.stderr.write(`${line}\n`),
  env: process.env,
};

const USAGE = [
  'Usage:',
  '  sentiment-oracle keygen --out <keystore.json> [--force]',
  '  sentiment-oracle seal <record.json> --out <signed.json> [--keystore <keystore.json>]',
  '  sentiment-oracle verify <signed.json> [--against <original.json>]',
  '  sentiment-oracle compare <a.json> <b.json>',
  '  sentiment-oracle digest <record.json>',
  'Options:',
  '  --keystore <path>     keystore file (env ORACLE_KEYSTORE)',
  '  --log-level <level>   debug|info|warn|error|silent (env ORACLE_LOG_LEVEL)',
  `Protocol: ${describeProtocol()}`,
];

const COMMANDS: Readonly<Record<string, (ctx: CommandContext) => ExitCode>> = {
  keygen: runKeygen,
  seal: runSeal,
  verify: runVerify,
  compare: runCompare,
  digest: runDigest,
};

function findCommand(name: string): ((ctx: CommandContext) => ExitCode) | undefined {
  return Object.prototype.hasOwnProperty.call(COMMANDS, name) ? COMMANDS[name] : undefined;
}

/**
 * Run one CLI invocation and return its exit code:
 * 0 ok/valid/equal, 1 invalid or different, 2 usage, 3 I/O, key or encoding error.
 * Errors that are not OracleErrors are bugs and propagate.
 */
export function runCli(argv: readonly string[], io: CliIo = defaultIo): ExitCode {
  const args = parseArgs(argv);
  const printUsage = () => USAGE.forEach(line => io.err(line));

  if (args.command === undefined) {
    printUsage();
    return EXIT.USAGE;
  }
  if (args.command === 'help' || args.command === '--help' || args.flags.help === true) {
    printUsage();
    return EXIT.OK;
  }
  const handler = findCommand(args.command);
  if (!handler) {
    io.err(`Unknown command: ${args.command}`);
    printUsage();
    return EXIT.USAGE;
  }

  let ctx: CommandContext;
  try {
    const config = resolveConfig(io.env, {
      keystorePath: stringFlag(args.flags, 'keystore'),
      logLevel: stringFlag(args.flags, 'log-level'),
    });
    ctx = {
      args,
      config,
      logger: createConsoleLogger(config.logLevel, io.err),
      print: io.out,
      usage: message => {
        io.err(`error: ${message}`);
        printUsage();
        return EXIT.USAGE;
      },
    };
  } catch (err) {
    if (err instanceof OracleError) {
      io.err(`error: ${err.message}`);
      return EXIT.USAGE;
    }
    throw err;
  }

  try {
    return handler(ctx);
  } catch (err) {
    if (err instanceof OracleError) {
      const cause = err.cause === undefined ? '' : ` (${describeError(err.cause)})`;
      io.err(`error: ${err.name}: ${err.message}${cause}`);
      return EXIT.ERROR;
    }
    throw err;
  }
}
