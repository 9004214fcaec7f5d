/**
 * Command option definition for CLI help generation.
 */
export interface CommandOption {
  /** Flag notation, e.g., "--out" or "-h, --help" */
  flags: string;
  /** Human-readable description */
  description: string;
  /** Default value hint (optional) */
  default?: string;
  /** Argument placeholder, e.g., "<path>" */
  argument?: string;
}

/**
 * Command definition for CLI help generation and routing.
 */
export interface Command {
  /** Primary command name, e.g., "check" */
  name: string;
  /** Alternative invocations, e.g., ["-vc"] */
  aliases?: string[];
  /** One-line description shown in main help */
  description: string;
  /** Usage pattern, e.g., "check [options] <spec>" */
  usage: string;
  /** Available options for this command */
  options: CommandOption[];
  /** Example invocations (optional) */
  examples?: string[];
  /** Whether this is a hidden command (not shown in main help) */
  hidden?: boolean;
}
