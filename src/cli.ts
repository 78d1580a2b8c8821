#!/usr/bin/env -S node --import tsx
import { Command } from 'commander';
import pkg from '../package.json' with { type: 'json' };
import {
  registerGraphCommand,
  registerResumeCommand,
  registerRunCommand,
  registerRunsCommand,
  registerSchemaCommand,
  registerValidateCommand,
} from './commands/index.ts';

const program = new Command();

program
  .name('runbook')
  .description('Compile declarative YAML workflows into graphs and run them with checkpointed resume')
  .version(pkg.version);

registerValidateCommand(program);
registerGraphCommand(program);
registerRunCommand(program);
registerResumeCommand(program);
registerRunsCommand(program);
registerSchemaCommand(program);

await program.parseAsync(process.argv);
