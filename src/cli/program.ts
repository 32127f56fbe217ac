import { Command, CommanderError } from 'commander';
import { getPackageInfo } from '../lib/utils/user-agent.js';
import { handleError } from './utils/errors.js';
import { handleRequestCommand, type RequestCommandOptions } from './commands/request.js';
import { collectHeader, parseNonNegativeInt, parsePositiveNumber, parseStatusList } from './utils/options.js';

const IGNORED_TEST_EXITS = new Set(['commander.helpDisplayed', 'commander.version', 'commander.help']);

/** Build a Commander program instance for the retryhttp CLI. */
export function createCli(): Command {
  const program = new Command();
  const pkg = getPackageInfo();

  program.name('retryhttp').description('HTTP requests with retries, rate limiting and decompression').version(pkg.version);

  // In test mode override default exit (help, errors) to throw instead of process.exit
  if (process.env.RETRYHTTP_CLI_TEST) {
    program.exitOverride();
  }

  function exitOnError() {
    if (process.env.RETRYHTTP_CLI_TEST) return;
    process.exit(1);
  }

  program
    .command('request')
    .description('Send an HTTP request and print the response body')
    .argument('<url>', 'Absolute request URL')
    .option('-X, --method <method>', 'HTTP method (defaults to GET, or POST with --data)')
    .option('-H, --header <header>', "Request header 'Name: value' (repeatable)", collectHeader)
    .option('-d, --data <body>', 'Request body')
    .option(
      '--retries <count>',
      'Maximum number of attempts (failures only, unless --retry-on is given)',
      parseNonNegativeInt,
    )
    .option('--retry-delay <ms>', 'Delay before the first retry', parseNonNegativeInt)
    .option('--retry-delta <ms>', 'Amount added to the delay after every retry', parseNonNegativeInt)
    .option('--timeout <ms>', 'Deadline for the whole call, retries included (0 = none)', parseNonNegativeInt)
    .option('--retry-on <codes>', 'Retry only on errors or these status codes (comma-separated)', parseStatusList)
    .option('--rate <n>', 'Requests per second allowed', parsePositiveNumber)
    .option('--no-decompress', 'Leave compressed response bodies untouched')
    .option('-i, --include', 'Print the status line and response headers')
    .action(async (url: string, opts: RequestCommandOptions) => {
      try {
        await handleRequestCommand(url, {
          method: opts.method,
          header: opts.header,
          data: opts.data,
          retries: opts.retries,
          retryDelay: opts.retryDelay,
          retryDelta: opts.retryDelta,
          timeout: opts.timeout,
          retryOn: opts.retryOn,
          rate: opts.rate,
          decompress: opts.decompress,
          include: opts.include,
        });
      } catch (e) {
        handleError(e);
        exitOnError();
      }
    });

  return program;
}

/** For tests: parse arguments and return the program (no automatic exit). */
export async function runCli(argv: string[]): Promise<Command> {
  const program = createCli();
  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err: unknown) {
    const ignorable =
      process.env.RETRYHTTP_CLI_TEST && err instanceof CommanderError && IGNORED_TEST_EXITS.has(err.code);
    if (!ignorable) throw err;
  }
  return program;
}
