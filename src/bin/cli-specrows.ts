#!/usr/bin/env -S node --import tsx
import { runCli } from './cli';

try {
  process.exitCode = runCli(process.argv.slice(2));
} catch (error: unknown) {
  console.error('cli-specrows error:', error);
  process.exitCode = 1;
}
