#!/usr/bin/env node
import 'reflect-metadata';
import { runCli } from './cli/program';

async function bootstrap(): Promise<void> {
  process.exitCode = await runCli(process.argv);
}

bootstrap().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
