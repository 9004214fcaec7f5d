import type { KnipConfig } from 'knip';

const config: KnipConfig = {
  entry: ['src/index.ts!', 'src/bin/cli-specrows.ts!', 'scripts/**/*.ts'],
  project: ['src/**/*.ts!', 'scripts/**/*.ts!', 'tests/**/*.ts'],
  // Loaded through the bin shebang, never imported
  ignoreDependencies: ['tsx'],
};

export default config;
