import type { Command } from './types';

export const checkCommand: Command = {
  name: 'check',
  description: 'Validate a SpecRows document and report diagnostics',
  usage: 'check [options] <spec>',
  options: [
    {
      flags: '--diag-out',
      argument: '<path|->',
      description: 'Write diagnostics JSON to a file',
      default: '-',
    },
    {
      flags: '--config',
      argument: '<path>',
      description: 'Use this config file instead of user/project config',
    },
    {
      flags: '--summary',
      description: 'Print a human-readable report to stderr',
    },
    {
      flags: '-h, --help',
      description: 'Show this help',
    },
  ],
  examples: [
    'cli-specrows check cli.specrows.json',
    'cli-specrows check --diag-out diags.json cli.specrows.json',
    'cli-specrows check --summary cli.specrows.json',
  ],
};
