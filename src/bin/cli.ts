/**
 * Argument routing for the cli-specrows executable.
 */
import { findCommand } from './commands';
import { printHelp, printVersion, showCommandHelp } from './help';
import { EXIT_FATAL, parseRunFlags, runSpecCommand } from './run/index';
import { verifyConfig } from './verify-config';

/**
 * Check if --help or -h is present in args.
 */
function hasHelpFlag(args: readonly string[]): boolean {
  return args.includes('--help') || args.includes('-h');
}

/**
 * Route the arguments and return the exit code.
 * @internal Exported for testing
 */
export function runCli(args: readonly string[]): number {
  const [first, ...rest] = args;

  if (first === undefined) {
    printHelp();
    return 0;
  }

  // "help <command>"
  if (first === 'help') {
    const commandName = rest[0];
    if (!commandName) {
      printHelp();
      return 0;
    }
    if (showCommandHelp(commandName)) {
      return 0;
    }
    console.error(`Unknown command: ${commandName}`);
    console.error("Run 'cli-specrows --help' for available commands.");
    return EXIT_FATAL;
  }

  // "<command> --help"
  if (!first.startsWith('-') && hasHelpFlag(rest) && findCommand(first)) {
    showCommandHelp(first);
    return 0;
  }

  if (first === '--help' || first === '-h') {
    printHelp();
    return 0;
  }

  if (first === '--version' || first === '-V') {
    printVersion();
    return 0;
  }

  if (findCommand(first)?.name === 'verify-config') {
    return verifyConfig();
  }

  if (first === 'check' || first === 'fmt') {
    const flags = parseRunFlags(first, rest);
    return flags ? runSpecCommand(flags) : EXIT_FATAL;
  }

  console.error(`Unknown option: ${first}`);
  console.error("Run 'cli-specrows --help' for usage.");
  return EXIT_FATAL;
}

