/**
 * Command module exports
 */

export { registerGraphCommand } from './graph.ts';
export { registerResumeCommand } from './resume.ts';
export { registerRunCommand } from './run.ts';
export { registerRunsCommand } from './runs.ts';
export { registerSchemaCommand } from './schema.ts';
export { registerValidateCommand } from './validate.ts';
export { createRuntime, parseInputs, reportResult } from './utils.ts';
