import type { Command } from './commands';
import { findCommand, getVisibleCommands } from './commands';
import { getPackageVersion } from './version';

const INDENT = '  ';
const PROGRAM_NAME = 'cli-specrows';

/**
 * Format option flags with optional argument.
 * e.g., "--out <path|->" or "--in-place"
 */
function formatOptionFlags(option: { flags: string; argument?: string }): string {
  return option.argument ? `${option.flags} ${option.argument}` : option.flags;
}

/**
 * Calculate the maximum width of option flags for alignment.
 */
function getOptionsColumnWidth(options: readonly { flags: string; argument?: string }[]): number {
  return Math.max(...options.map((opt) => formatOptionFlags(opt).length));
}

function formatCommandSummary(cmd: Command, maxUsageWidth: number): string {
  const usage = `${PROGRAM_NAME} ${cmd.usage}`;
  return `${INDENT}${usage.padEnd(maxUsageWidth + PROGRAM_NAME.length + 3)}${cmd.description}`;
}

/**
 * Print help for a specific command.
 * @internal Exported for testing
 */
export function printCommandHelp(command: Command): void {
  const lines: string[] = [];

  lines.push(`${PROGRAM_NAME} ${command.name}`);
  lines.push('');
  lines.push(`${INDENT}${command.description}`);
  lines.push('');

  lines.push('USAGE:');
  lines.push(`${INDENT}${PROGRAM_NAME} ${command.usage}`);
  lines.push('');

  if (command.options.length > 0) {
    lines.push('OPTIONS:');
    const optWidth = getOptionsColumnWidth(command.options);
    for (const opt of command.options) {
      const flags = formatOptionFlags(opt);
      const hint = opt.default ? ` (default: ${opt.default})` : '';
      lines.push(`${INDENT}${flags.padEnd(optWidth + 2)}${opt.description}${hint}`);
    }
    lines.push('');
  }

  if (command.examples && command.examples.length > 0) {
    lines.push('EXAMPLES:');
    for (const example of command.examples) {
      lines.push(`${INDENT}${example}`);
    }
  }

  console.log(lines.join('\n'));
}

/**
 * Print the main help with all commands.
 */
export function printHelp(): void {
  const visibleCommands = getVisibleCommands();
  const maxUsageWidth = Math.max(...visibleCommands.map((cmd) => cmd.usage.length));

  const lines: string[] = [];

  lines.push(`${PROGRAM_NAME} v${getPackageVersion()}`);
  lines.push('');
  lines.push('Validates and canonicalizes SpecRows command-line interface descriptions.');
  lines.push('');

  lines.push('COMMANDS:');
  for (const cmd of visibleCommands) {
    lines.push(formatCommandSummary(cmd, maxUsageWidth));
  }
  lines.push('');

  lines.push('GLOBAL OPTIONS:');
  lines.push(`${INDENT}-h, --help       Show help (use with command for command-specific help)`);
  lines.push(`${INDENT}-V, --version    Show version`);
  lines.push('');

  lines.push('HELP:');
  lines.push(`${INDENT}${PROGRAM_NAME} help <command>     Show help for a specific command`);
  lines.push(`${INDENT}${PROGRAM_NAME} <command> --help   Show help for a specific command`);
  lines.push('');

  lines.push('EXIT CODES:');
  lines.push(`${INDENT}0    No error diagnostics`);
  lines.push(`${INDENT}1    At least one error diagnostic`);
  lines.push(`${INDENT}2    Unreadable document, bad usage or invalid config`);
  lines.push('');

  lines.push('ENVIRONMENT VARIABLES:');
  lines.push(`${INDENT}SPECROWS_STRICT=1                 Treat warnings as errors`);
  lines.push(`${INDENT}NO_COLOR=1                        Disable colored --summary output`);
  lines.push('');

  lines.push('CONFIG FILES:');
  lines.push(`${INDENT}~/.cli-specrows/config.json       User-scope config`);
  lines.push(`${INDENT}.cli-specrows.json                Project-scope config`);

  console.log(lines.join('\n'));
}

export function printVersion(): void {
  console.log(getPackageVersion());
}

/**
 * Handle help for a specific command name.
 * Returns true if help was printed, false if command not found.
 */
export function showCommandHelp(commandName: string): boolean {
  const command = findCommand(commandName);
  if (!command) {
    return false;
  }
  printCommandHelp(command);
  return true;
}
