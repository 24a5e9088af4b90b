#!/usr/bin/env node
/**
 * crawl-prime CLI
 * One synchronous ingest: crawl, map (writing documents under --output) and
 * index. Prints the report as JSON; exits 1 on failure, 2 on bad arguments.
 */

import 'reflect-metadata';
import { resolve } from 'node:path';
import { NestFactory } from '@nestjs/core';
import { errorMessage, ValidationError } from './common/errors/crawl-prime.errors';
import { OrchestratorService } from './orchestrator/orchestrator.service';
import { parseCliArgs, USAGE, type CliArgs } from './cli/cli-args';
import { CliModule } from './cli/cli.module';

async function run(args: CliArgs): Promise<number> {
  const app = await NestFactory.createApplicationContext(CliModule, {
    logger: ['error', 'warn'],
  });
  try {
    const report = await app.get(OrchestratorService).ingest(args.url, {
      crawlMode: args.mode,
      maxPages: args.maxPages,
      collection: args.collection,
      artifactDir: resolve(args.output),
    });
    process.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
    return 0;
  } catch (error) {
    process.stderr.write(`crawl-prime: ${errorMessage(error)}\n`);
    return error instanceof ValidationError ? 2 : 1;
  } finally {
    await app.close();
  }
}

async function main(): Promise<void> {
  let args: CliArgs;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    process.stderr.write(`crawl-prime: ${errorMessage(error)}\n\n${USAGE}\n`);
    process.exitCode = 2;
    return;
  }

  if (args.help) {
    process.stdout.write(`${USAGE}\n`);
    return;
  }

  process.exitCode = await run(args);
}

main().catch((error: unknown) => {
  process.stderr.write(`crawl-prime: ${errorMessage(error)}\n`);
  process.exitCode = 1;
});
