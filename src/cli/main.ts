#!/usr/bin/env node

/**
 * webqa CLI entry point.
 * Thin wrapper; all logic lives in core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import {
  registerActionsCommand,
  registerReplayCommand,
  registerRunCommand,
  registerTestCommand,
} from './run.js';

const program = new Command();

program
  .name('webqa')
  .description(
    'Natural-language browser testing. An LLM plans one action at a time; webqa validates locators, tracks windows and frames, retries once and records a full transcript.',
  )
  .version('0.1.0');

registerTestCommand(program);
registerRunCommand(program);
registerReplayCommand(program);
registerActionsCommand(program);

await program.parseAsync();
