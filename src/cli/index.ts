import { Command } from 'commander';
import { SUBCOMMAND_NAMES } from '../constants.js';
import type { MatrixOptions } from './matrix.js';
import type { GlobalOptions } from './workspace.js';

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export interface SplitArgv {
  /** `node` and script path followed by the arguments commander parses. */
  head: string[];
  /** The first `--` and everything after it, handed to cargo untouched. */
  tail: string[];
}

/**
 * Separate commander's share of argv from the arguments after `--`, and drop
 * the subcommand name cargo inserts when invoked as `cargo fc`.
 */
export function splitArgv(argv: readonly string[]): SplitArgv {
  const [node = 'node', script = 'cargo-fc', ...rest] = argv;
  const args = rest.length > 0 && SUBCOMMAND_NAMES.has(rest[0]) ? rest.slice(1) : rest;
  const idx = args.indexOf('--');
  if (idx === -1) return { head: [node, script, ...args], tail: [] };
  return { head: [node, script, ...args.slice(0, idx)], tail: args.slice(idx) };
}

export function buildProgram(tail: readonly string[] = []): Command {
  const program = new Command();

  program
    .name('cargo-fc')
    .description('Run cargo commands for every combination of a crate\'s feature flags')
    .version('0.1.0')
    .usage('[options] [cargo-args...] [-- extra-args...]')
    .option('--manifest-path <path>', 'Path to the workspace or package Cargo.toml')
    .option('-p, --package <name>', 'Only run for this package (repeatable)', collect, [])
    .option('--exclude-package <name>', 'Skip this package (repeatable)', collect, [])
    .option('--silent', 'Hide cargo output and only show the summary')
    .option('--verbose', 'Print the full cargo command for every combination')
    .option('--pedantic', 'Treat warnings like errors in the summary and with --fail-fast')
    .option('--errors-only', 'Allow all warnings (sets RUSTFLAGS=-Awarnings)')
    .option('--fail-fast', 'Stop at the first failing feature combination')
    .option('--fc-config <file>', 'YAML file with configuration overrides')
    .argument('[cargo-args...]', 'Arguments passed to cargo')
    .allowUnknownOption()
    .action(async (cargoArgs: string[], options: GlobalOptions) => {
      const { runCommand } = await import('./run.js');
      await runCommand([...cargoArgs, ...tail], options);
    });

  program
    .command('matrix')
    .description('Print the feature combination matrix as JSON')
    .option('--pretty', 'Indent the JSON output')
    .option('--packages-only', 'One entry per package, without features')
    .action(async (_options: MatrixOptions, command: Command) => {
      const { matrixCommand } = await import('./matrix.js');
      await matrixCommand(command.optsWithGlobals<GlobalOptions & MatrixOptions>());
    });

  return program;
}

export async function run(argv: string[]): Promise<void> {
  const { head, tail } = splitArgv(argv);
  await buildProgram(tail).parseAsync(head);
}
