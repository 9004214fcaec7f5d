import type { Command } from './types';

export const fmtCommand: Command = {
  name: 'fmt',
  description: 'Validate, then write the canonical form of a SpecRows document',
  usage: 'fmt [options] <spec>',
  options: [
    {
      flags: '--out',
      argument: '<path|->',
      description: 'Write the canonical document to a file',
      default: '-',
    },
    {
      flags: '--in-place',
      description: 'Overwrite the input file with the canonical document',
    },
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
    'cli-specrows fmt --in-place cli.specrows.json',
    'cli-specrows fmt --out canon.json --diag-out diags.json cli.specrows.json',
  ],
};
