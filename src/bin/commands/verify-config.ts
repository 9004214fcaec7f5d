import type { Command } from './types';

export const verifyConfigCommand: Command = {
  name: 'verify-config',
  aliases: ['-vc', '--verify-config'],
  description: 'Validate user and project configuration files',
  usage: '-vc, --verify-config',
  options: [
    {
      flags: '-h, --help',
      description: 'Show this help',
    },
  ],
  examples: ['cli-specrows -vc', 'cli-specrows --verify-config'],
};
