import inquirer from 'inquirer';
import chalk from 'chalk';
import ora from 'ora';
import {
  ConversationSession,
  createLanguageModel,
  describeError,
  type ConversationSessionDeps,
  type SessionReply,
} from '@leadflow/runtime';
import { createCliConfig } from '../lib/cli-config.js';
import { LocalSessionStore } from '../lib/local-session-store.js';

export interface ChatOptions {
  mode?: string;
  model?: string;
  /** Conversation id to resume */
  session?: string;
  /** Existing lead to continue with */
  lead?: string;
  dir: string;
  debug?: boolean;
}

export async function chatCommand(options: ChatOptions): Promise<void> {
  console.log(chalk.blue('🤖 LeadFlow - Interactive Chat'));

  let session: ConversationSession;
  try {
    const config = createCliConfig(options);
    console.log(chalk.gray(`Mode: ${config.mode}`));
    console.log(chalk.gray(`Sessions: ${options.dir}`));

    if (options.debug) {
      console.log(chalk.yellow('Debug mode enabled'));
      console.log('Config:', JSON.stringify(config, null, 2));
    }

    const model = createLanguageModel(config);
    const deps: ConversationSessionDeps = {
      config: config.orchestrator,
      store: new LocalSessionStore(options.dir),
      generator: model,
      structuredExtractor: model,
    };

    session = options.session
      ? await ConversationSession.resume(deps, options.session)
      : await ConversationSession.start(deps, { leadId: options.lead });
  } catch (error) {
    console.error(chalk.red('❌ Failed to start conversation:'), describeError(error));
    if (options.debug && error instanceof Error) {
      console.error(chalk.red('Stack:'), error.stack);
    }
    process.exitCode = 1;
    return;
  }

  console.log(chalk.gray(`Conversation ID: ${session.id}`));
  console.log('');

  if (session.isClosed) {
    const { endedAt, summary } = session.getRecord();
    console.log(chalk.yellow(`⚠️  This conversation ended at ${endedAt ?? 'an unknown time'} and cannot take new messages.`));
    if (summary) {
      console.log(chalk.blue('📝 Summary:'));
      console.log(summary);
    }
    return;
  }

  const lastAssistant = session.getRecord().messages.filter(message => message.role === 'assistant').pop();
  if (lastAssistant) {
    console.log(chalk.green('🤖 LeadFlow:'), lastAssistant.content);
  }

  console.log(chalk.gray('\nType "exit" to quit\n'));

  // Interactive chat loop
  while (true) {
    const { message } = await inquirer.prompt<{ message: string }>([
      {
        type: 'input',
        name: 'message',
        message: chalk.cyan('You:'),
        validate: (input: string) => input.trim().length > 0 || 'Please enter a message',
      },
    ]);

    const trimmedMessage = message.trim();

    if (trimmedMessage.toLowerCase() === 'exit') {
      await session.end();
      console.log(chalk.yellow('👋 Goodbye!'));
      break;
    }

    const spinner = ora('🤔 LeadFlow is thinking...').start();
    const result = await session.handleMessage(trimmedMessage);
    spinner.stop();

    if (!result.success) {
      console.error(chalk.red(`❌ ${result.error.code}:`), result.error.message);
      if (result.error.code === 'SESSION_CLOSED') {
        break;
      }
      continue;
    }

    console.log(chalk.green('🤖 LeadFlow:'), result.reply);
    if (options.debug) {
      printTurnDebug(result);
    }
    console.log('');

    if (result.ending) {
      const summary = session.getRecord().summary;
      if (summary) {
        console.log(chalk.blue('📝 Summary:'));
        console.log(summary);
      }
      await session.end();
      break;
    }
  }
}

export function printTurnDebug(result: SessionReply): void {
  const flags = [
    result.advanced ? (result.forced ? 'forced advance' : 'advanced') : undefined,
    result.ending ? `ending (${result.endReason ?? 'unknown'})` : undefined,
    result.degraded ? 'degraded reply' : undefined,
  ].filter(Boolean);

  console.log(chalk.gray(`   stage: ${result.stage}${flags.length > 0 ? ` [${flags.join(', ')}]` : ''}`));
  if (Object.keys(result.extracted).length > 0) {
    console.log(chalk.gray(`   extracted: ${JSON.stringify(result.extracted)}`));
  }
  if (result.profile.summary) {
    console.log(chalk.gray(`   profile: ${result.profile.summary}`));
  }
}
