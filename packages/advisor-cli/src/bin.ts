#!/usr/bin/env node
import { createProcessContext } from './cli/context.js';
import { runCli } from './cli/program.js';

const controller = new AbortController();
process.once('SIGINT', () => controller.abort(new Error('Interrupted')));

process.exitCode = await runCli(process.argv.slice(2), createProcessContext(controller.signal));
