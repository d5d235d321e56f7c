import * as fs from 'fs';
import chalk from 'chalk';
import ora from 'ora';
import { z } from 'zod';
import {
  ConversationSession,
  MemoryConversationStore,
  createLanguageModel,
  describeError,
  type ConversationRecord,
  type ConversationSessionDeps,
  type LeadProfile,
  type Stage,
} from '@leadflow/runtime';
import { createCliConfig } from '../lib/cli-config.js';
import { LocalSessionStore } from '../lib/local-session-store.js';
import { OfflineGenerator } from '../lib/offline-generator.js';

export interface SimulateOptions {
  file: string;
  offline?: boolean;
  mode?: string;
  model?: string;
  /** Persist to this directory instead of memory */
  dir?: string;
  debug?: boolean;
}

export interface SimulationTurn {
  user: string;
  reply?: string;
  stage?: Stage;
  advanced?: boolean;
  forced?: boolean;
  ending?: boolean;
  degraded?: boolean;
  error?: string;
}

export interface SimulationReport {
  greeting: string;
  turns: SimulationTurn[];
  profile: Readonly<LeadProfile>;
  record: ConversationRecord;
}

const ScriptSchema = z.array(z.string());

/**
 * Read a conversation script: a JSON array of user messages, or a text file
 * with one message per line (blank lines and # comments are skipped)
 */
export function loadScript(filePath: string): string[] {
  const content = fs.readFileSync(filePath, 'utf-8');

  if (filePath.endsWith('.json')) {
    const parsed = ScriptSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      throw new Error(`Script ${filePath} must be a JSON array of strings`);
    }
    return parsed.data;
  }

  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}

/**
 * Play user messages through a fresh session until the script runs out or
 * the conversation ends
 */
export async function runSimulation(
  messages: readonly string[],
  deps: ConversationSessionDeps,
  onTurn?: (turn: SimulationTurn) => void
): Promise<SimulationReport> {
  const session = await ConversationSession.start(deps);
  const greeting = session.getRecord().messages[0]?.content ?? '';
  const turns: SimulationTurn[] = [];

  for (const user of messages) {
    const result = await session.handleMessage(user);
    const turn: SimulationTurn = result.success
      ? {
          user,
          reply: result.reply,
          stage: result.stage,
          advanced: result.advanced,
          forced: result.forced,
          ending: result.ending,
          degraded: result.degraded,
        }
      : { user, error: `${result.error.code}: ${result.error.message}` };

    turns.push(turn);
    onTurn?.(turn);

    if (turn.ending) {
      break;
    }
  }

  await session.end();

  return {
    greeting,
    turns,
    profile: session.getProfile(),
    record: session.getRecord(),
  };
}

export async function simulateCommand(options: SimulateOptions): Promise<void> {
  console.log(chalk.blue('🎭 Simulating Conversation'));
  console.log(chalk.gray(`Script: ${options.file}`));
  console.log(chalk.gray(`Model: ${options.offline ? 'offline' : options.mode ?? 'from environment'}`));
  console.log('');

  try {
    const messages = loadScript(options.file);
    const config = createCliConfig(options);
    const model = options.offline ? undefined : createLanguageModel(config);

    const deps: ConversationSessionDeps = {
      config: config.orchestrator,
      store: options.dir ? new LocalSessionStore(options.dir) : new MemoryConversationStore(),
      generator: model ?? new OfflineGenerator(),
      structuredExtractor: model,
    };

    const spinner = ora(`🔄 Playing ${messages.length} message(s)...`).start();
    const report = await runSimulation(messages, deps);
    spinner.stop();

    console.log(chalk.green('🤖 LeadFlow:'), report.greeting);
    for (const turn of report.turns) {
      console.log(chalk.cyan('You:'), turn.user);
      if (turn.error) {
        console.log(chalk.red(`❌ ${turn.error}`));
        continue;
      }
      console.log(chalk.green('🤖 LeadFlow:'), turn.reply);
      if (options.debug) {
        console.log(chalk.gray(`   stage: ${turn.stage}${turn.advanced ? (turn.forced ? ' [forced advance]' : ' [advanced]') : ''}${turn.ending ? ' [ending]' : ''}`));
      }
    }

    console.log('');
    console.log(chalk.blue('📋 Lead profile:'));
    console.log(JSON.stringify(report.profile, null, 2));

    if (report.record.summary) {
      console.log(chalk.blue('📝 Summary:'));
      console.log(report.record.summary);
    }
  } catch (error) {
    console.error(chalk.red('❌ Simulation failed:'), describeError(error));
    process.exitCode = 1;
  }
}
