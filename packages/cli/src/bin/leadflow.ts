#!/usr/bin/env node

import { program } from 'commander';
import { config } from 'dotenv';
import { chatCommand } from '../commands/chat.js';
import { simulateCommand } from '../commands/simulate.js';
import { leadsCommand } from '../commands/leads.js';

// Load environment variables from .env.local
config({ path: '.env.local' });

const DEFAULT_SESSION_DIR = '.local-sessions';

program
  .name('leadflow')
  .description('LeadFlow CLI - run and inspect sales conversations locally')
  .version('0.1.0');

// Chat command
program
  .command('chat')
  .description('Run an interactive conversation')
  .option('--mode <mode>', 'Language model mode (cloud|local|auto)')
  .option('--model <id>', 'Bedrock model ID')
  .option('--session <id>', 'Resume a stored conversation')
  .option('--lead <id>', 'Start a new conversation for an existing lead')
  .option('--dir <path>', 'Session storage directory', DEFAULT_SESSION_DIR)
  .option('--debug', 'Show stage and extraction details')
  .action(chatCommand);

// Simulate command
program
  .command('simulate')
  .description('Play a scripted conversation')
  .requiredOption('--file <path>', 'Script file (JSON array or one message per line)')
  .option('--offline', 'Use canned replies instead of a language model')
  .option('--mode <mode>', 'Language model mode (cloud|local|auto)')
  .option('--model <id>', 'Bedrock model ID')
  .option('--dir <path>', 'Persist the conversation to this directory')
  .option('--debug', 'Show stage details')
  .action(simulateCommand);

// Leads command
program
  .command('leads')
  .description('List stored leads')
  .option('--lead <id>', 'Show one lead and its conversations')
  .option('--dir <path>', 'Session storage directory', DEFAULT_SESSION_DIR)
  .action(leadsCommand);

// Parse command line arguments
program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
