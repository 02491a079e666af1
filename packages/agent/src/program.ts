import { writeFileSync } from 'node:fs';
import path from 'node:path';
import { Command } from 'commander';
import { type Logger, type Toolformer, consoleLogger, errorMessage, silentLogger } from '@pactwire/core';
import { type Env, type PactwireConfig, loadConfig } from './config.js';
import {
  type RunContext,
  createToolformer,
  loadTaskFile,
  loadToolsFile,
  readProtocolFile,
  runCheck,
  runNegotiation,
  runSynthesis,
} from './runner.js';

/** Exit code for a negative answer: not feasible, or no protocol agreed. */
export const EXIT_NEGATIVE = 2;

/** Where the program writes and what it builds backends with. */
export interface ProgramIo {
  /** Results. */
  out(line: string): void;
  /** Status lines and failures. */
  err(line: string): void;
  setExitCode(code: number): void;
  env: Env;
  createToolformer(config: PactwireConfig, logger: Logger): Toolformer;
}

export const processIo: ProgramIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  setExitCode: (code) => {
    process.exitCode = code;
  },
  env: process.env,
  createToolformer: (config, logger) => createToolformer(config, logger),
};

type GlobalOptions = {
  config?: string;
  verbose?: boolean;
};

type CommandRun<T> = (options: T, context: RunContext) => Promise<number>;

function action<T>(io: ProgramIo, name: string, run: CommandRun<T>) {
  return async (options: T, command: Command): Promise<void> => {
    try {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const logger = globals.verbose ? consoleLogger : silentLogger;
      const config = loadConfig(globals.config, io.env);
      const context: RunContext = { config, toolformer: io.createToolformer(config, logger), logger };
      io.setExitCode(await run(options, context));
    } catch (error) {
      io.err(`${name} failed: ${errorMessage(error)}`);
      io.setExitCode(1);
    }
  };
}

export function createProgram(io: ProgramIo = processIo): Command {
  const program = new Command();
  program
    .name('pactwire')
    .description('Negotiate task protocols between agents and turn them into adapters')
    .version('0.1.0')
    .option('-c, --config <path>', 'Path to config file')
    .option('-v, --verbose', 'Log negotiation rounds and backend calls to stderr')
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    });

  program
    .command('check')
    .description('Check whether the given tools are enough to implement a protocol')
    .requiredOption('-p, --protocol <file>', 'Protocol document')
    .option('-t, --tools <file>', 'JSON array of tools the implementer holds')
    .option('-i, --info <text>', 'Additional information for the checker')
    .action(
      action<{ protocol: string; tools?: string; info?: string }>(io, 'check', async (opts, context) => {
        const tools = opts.tools ? loadToolsFile(opts.tools) : [];
        const feasible = await runCheck(context, readProtocolFile(opts.protocol), tools, opts.info);
        io.out(feasible ? 'feasible' : 'not feasible');
        return feasible ? 0 : EXIT_NEGATIVE;
      }),
    );

  program
    .command('synthesize')
    .description('Write an adapter that performs a task through a protocol')
    .requiredOption('--task <file>', 'Task schema (JSON)')
    .requiredOption('-p, --protocol <file>', 'Protocol document')
    .option('-o, --out <file>', 'Write the adapter here instead of stdout')
    .action(
      action<{ task: string; protocol: string; out?: string }>(io, 'synthesize', async (opts, context) => {
        const adapter = await runSynthesis(context, loadTaskFile(opts.task), readProtocolFile(opts.protocol));
        if (opts.out) {
          const target = path.resolve(opts.out);
          writeFileSync(target, adapter);
          io.err(`Adapter written to ${target}`);
        } else {
          io.out(adapter);
        }
        return 0;
      }),
    );

  program
    .command('negotiate')
    .description('Negotiate a protocol for a task between a sender and a receiver agent')
    .requiredOption('--task <file>', 'Task schema (JSON)')
    .option('-t, --tools <file>', 'JSON array of tools the receiver holds')
    .option('-i, --info <text>', 'Additional information for the sender')
    .option('-s, --synthesize', 'Also write an adapter for the agreed protocol')
    .action(
      action<{ task: string; tools?: string; info?: string; synthesize?: boolean }>(
        io,
        'negotiate',
        async (opts, context) => {
          const report = await runNegotiation(context, {
            task: loadTaskFile(opts.task),
            tools: opts.tools ? loadToolsFile(opts.tools) : [],
            additionalInfo: opts.info,
            synthesize: opts.synthesize,
          });
          if (report.status === 'exhausted') {
            io.out('no protocol agreed');
            return EXIT_NEGATIVE;
          }
          io.err(`Agreed on ${report.protocol.name} after ${report.rounds} round(s)`);
          io.out(report.protocolPath);
          if (report.adapterPath) {
            io.out(report.adapterPath);
          }
          io.out(report.feasible ? 'feasible' : 'not feasible');
          return 0;
        },
      ),
    );

  return program;
}
