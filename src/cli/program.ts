/**
 * Command-line program
 *
 *   ab-sample-size --baseline 0.10 --mde 0.02
 *   ab-sample-size --metric-type mean --baseline 100 --mde 5 --std-dev 20
 *   ab-sample-size --baseline 0.2 --mde 0.03 --weights "35,15,20,18,12" --n-controls 2 \
 *     --correction bonferroni
 *   ab-sample-size mde --baseline 0.10 --sample-size 5000
 *   ab-sample-size -i
 */

import { Command, CommanderError } from 'commander';
import type { Logger } from 'pino';
import { getConfig } from '../config';
import type { RuntimeConfig } from '../config';
import { ErrorCode, wrapError } from '../core/errors';
import { createLogger } from '../core/utils/logger';
import { calculateMdeForSample, calculateSampleSize } from '../power';
import { formatMdeReport, formatReport } from '../report';
import { VERSION } from '../version';
import { parseMdeOptions, parseSizeOptions, toDesignSpecification, toMdeSpecification } from './parsers';
import { createReadlinePrompter } from './prompter';
import type { Prompter } from './prompter';
import { runWizard } from './wizard';

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface CliIO {
  stdout: OutputStream;
  stderr: OutputStream;
  /** Opens the wizard's question channel; stdin/stdout when omitted */
  prompter?: () => Prompter;
  logger?: Logger;
  config?: RuntimeConfig;
}

interface ProgramContext {
  io: CliIO;
  config: RuntimeConfig;
  logger: Logger;
}

const EXAMPLES = `
Examples:
  # Simple conversion rate test (10% -> 12%)
  $ ab-sample-size --baseline 0.10 --mde 0.02

  # Mean test with standard deviation
  $ ab-sample-size --metric-type mean --baseline 100 --mde 5 --std-dev 20

  # Multiple treatments with Bonferroni correction
  $ ab-sample-size --baseline 0.10 --mde 0.02 --n-treatments 3 --correction bonferroni

  # Smallest detectable effect with 5,000 users per group
  $ ab-sample-size mde --baseline 0.10 --sample-size 5000

  # Interactive mode
  $ ab-sample-size --interactive
`;

function addSharedOptions(command: Command): Command {
  return command
    .option('--baseline <value>', 'current metric value (e.g. 0.10 for 10% conversion)')
    .option('--metric-type <type>', 'proportion or mean (default: proportion)')
    .option('--power <value>', 'statistical power (default: 0.8)')
    .option('--alpha <value>', 'significance level (default: 0.05)')
    .option('--sides <n>', '1 for one-sided, 2 for two-sided (default: 2)')
    .option('--test-type <type>', 'z, t or chi2 (default: z)')
    .option('--std-dev <value>', 'standard deviation, required for means')
    .option('--std-dev-2 <value>', "treatment standard deviation (Welch's test)")
    .option('--ratio <value>', 'treatment / control size ratio (default: 1)')
    .option('--n-comparisons <n>', 'comparisons for the correction (default: controls x treatments)')
    .option('--correction <method>', 'none, bonferroni or sidak (default: none)')
    .option('--pooled', 'use pooled null variance for proportions')
    .option('--json', 'print the result as JSON');
}

function write(stream: OutputStream, text: string): void {
  stream.write(`${text}\n`);
}

export function createProgram(context: ProgramContext): Command {
  const { io, config, logger } = context;

  const program = new Command('ab-sample-size')
    .description('Sample size and minimum detectable effect planning for A/B tests')
    .version(VERSION)
    .enablePositionalOptions()
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout.write(text),
      writeErr: (text) => io.stderr.write(text),
    })
    .addHelpText('after', EXAMPLES);

  addSharedOptions(program)
    .option('--mde <value>', 'minimum detectable effect')
    .option('--type <type>', 'MDE interpretation: absolute or relative (default: absolute)')
    .option('--n-controls <n>', 'number of control groups (default: 1)')
    .option('--n-treatments <n>', 'number of treatment groups (default: 1)')
    .option('--weights <list>', 'traffic weights, controls first (e.g. "50,50" or "20 40 40")')
    .option('-i, --interactive', 'run the interactive wizard')
    .action(async (raw: Record<string, unknown>) => {
      const options = parseSizeOptions(raw);
      const wizard = options.interactive || (options.baseline === undefined && options.mde === undefined);

      const spec = wizard
        ? await withPrompter(io, (prompter) => runWizard(prompter, config))
        : toDesignSpecification(options, config);

      const result = calculateSampleSize(spec, { logger });
      write(io.stdout, options.json ? JSON.stringify(result, null, 2) : formatReport(result));
    });

  addSharedOptions(program.command('mde'))
    .description('smallest effect detectable with a given sample size per group')
    .option('--sample-size <n>', 'control group size')
    .option('--direction <direction>', 'increase or decrease (default: increase)')
    .action((raw: Record<string, unknown>) => {
      const options = parseMdeOptions(raw);
      const result = calculateMdeForSample(toMdeSpecification(options, config), { logger });
      write(io.stdout, options.json ? JSON.stringify(result, null, 2) : formatMdeReport(result));
    });

  return program;
}

async function withPrompter<T>(io: CliIO, run: (prompter: Prompter) => Promise<T>): Promise<T> {
  const prompter = io.prompter
    ? io.prompter()
    : createReadlinePrompter(process.stdin, process.stdout);
  try {
    return await run(prompter);
  } finally {
    prompter.close();
  }
}

/**
 * Parse arguments (without the node and script entries), run and return the
 * exit code
 */
export async function runCli(
  args: string[],
  io: CliIO = { stdout: process.stdout, stderr: process.stderr }
): Promise<number> {
  let logger = io.logger;

  try {
    const config = io.config ?? getConfig();
    logger = logger ?? createLogger({ level: config.logLevel });

    await createProgram({ io, config, logger }).parseAsync(args, { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    const failure = wrapError(error);
    if (failure.is(ErrorCode.CANCELLED)) {
      write(io.stdout, '\n   Cancelled.');
      return 0;
    }

    logger?.error({ code: failure.code, context: failure.context }, 'command failed');
    write(io.stderr, `Error: ${failure.message}`);
    return 1;
  }
}
