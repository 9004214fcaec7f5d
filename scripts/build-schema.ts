#!/usr/bin/env -S node --import tsx
import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import * as z from 'zod';
import { DIAGNOSTIC_CODES } from '../src/types';

const SCHEMA_OUTPUT_PATH = 'assets/cli-specrows.schema.json';

const SeveritySchema = z.enum(['error', 'warn']);

const ConfigSchema = z
  .strictObject({
    $schema: z.string().optional().describe('JSON Schema reference for IDE support'),
    version: z.literal(1).describe('Schema version (must be 1)'),
    schema_version: z
      .string()
      .min(1)
      .optional()
      .describe("Expected schema_version of checked documents (default 'x07cli.specrows@0.1.0')"),
    severity: z
      .partialRecord(z.enum(DIAGNOSTIC_CODES), SeveritySchema)
      .optional()
      .describe('Severity override per diagnostic code'),
  })
  .describe('Configuration for cli-specrows');

function main(): void {
  console.log('Generating JSON Schema...');

  const jsonSchema = z.toJSONSchema(ConfigSchema, {
    io: 'input',
    target: 'draft-7',
  });

  const finalSchema = {
    $schema: 'http://json-schema.org/draft-07/schema#',
    title: 'cli-specrows Configuration',
    description: 'Configuration file for the cli-specrows validator',
    ...jsonSchema,
  };

  mkdirSync(dirname(SCHEMA_OUTPUT_PATH), { recursive: true });
  writeFileSync(SCHEMA_OUTPUT_PATH, `${JSON.stringify(finalSchema, null, 2)}\n`, 'utf-8');

  console.log(`✓ JSON Schema generated: ${SCHEMA_OUTPUT_PATH}`);
}

main();
