#!/usr/bin/env node
/**
 * CLI entry point.
 *   validate --input <file> [--output <file>] [--level basic|standard|thorough]
 *   serve
 */
import { readFileSync, writeFileSync } from 'fs';
import { parseArgs } from 'util';
import { z } from 'zod';
import { env } from './config.js';
import { startServer } from './server.js';
import { createServiceFromEnv } from './service.js';
import { logger } from './utils/logger.js';
import { TIERS } from './validation/types.js';

const [,, command, ...rest] = process.argv;

const InputFileSchema = z.object({
  project_id: z.string().min(1).default('unknown'),
  scenes:     z.array(z.record(z.unknown())).default([]),
});

const USAGE = 'Usage: validate --input <file> [--output <file>] [--level basic|standard|thorough] | serve';

async function runValidate(args: string[]): Promise<void> {
  const { values } = parseArgs({
    args,
    options: {
      input:  { type: 'string' },
      output: { type: 'string' },
      level:  { type: 'string' },
    },
  });

  if (!values.input) {
    logger.error(`Missing --input. ${USAGE}`);
    process.exit(1);
  }
  const level = z.enum(TIERS).optional().parse(values.level);

  const raw: unknown = JSON.parse(readFileSync(values.input, 'utf-8'));
  const { project_id, scenes } = InputFileSchema.parse(raw);

  const result = await createServiceFromEnv().validateScenes(project_id, scenes, level);
  const json = JSON.stringify(result, null, 2);

  if (values.output) {
    writeFileSync(values.output, json + '\n');
    logger.info(`Results written to ${values.output}`);
  } else {
    process.stdout.write(json + '\n');
  }
}

async function main(): Promise<void> {
  switch (command) {
    case 'validate':
      await runValidate(rest);
      break;
    case 'serve':
      startServer(createServiceFromEnv(), env.PORT, { version: env.APP_VERSION });
      break;
    default:
      logger.error(`Unknown command: ${command ?? '(none)'}. ${USAGE}`);
      process.exit(1);
  }
}

main().catch((err) => {
  logger.error('Fatal', { err });
  process.exit(1);
});
