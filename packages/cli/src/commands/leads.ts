import chalk from 'chalk';
import { describeError } from '@leadflow/runtime';
import { LocalSessionStore } from '../lib/local-session-store.js';

export interface LeadsOptions {
  dir: string;
  lead?: string;
}

/**
 * List stored leads, or show one lead with its conversations
 */
export async function leadsCommand(options: LeadsOptions): Promise<void> {
  try {
    const store = new LocalSessionStore(options.dir);

    if (options.lead) {
      const lead = await store.getLead(options.lead);
      if (!lead) {
        console.log(chalk.yellow(`⚠️  Lead ${options.lead} not found`));
        process.exitCode = 1;
        return;
      }

      console.log(chalk.blue(`📇 Lead ${lead.id}`));
      console.log(chalk.gray(`Stage: ${lead.stage}`));
      console.log(JSON.stringify(lead.profile.fields, null, 2));
      if (lead.profile.contact.email || lead.profile.contact.phone) {
        console.log(chalk.gray(`Contact: ${[lead.profile.contact.email, lead.profile.contact.phone].filter(Boolean).join(', ')}`));
      }

      const conversations = await store.listConversations(lead.id);
      for (const conversation of conversations) {
        const status = conversation.endedAt ? chalk.gray(`ended ${conversation.endedAt}`) : chalk.green('open');
        console.log(`\n💬 ${conversation.id} (${conversation.messages.length} messages, ${status})`);
        if (conversation.summary) {
          console.log(conversation.summary);
        }
      }
      return;
    }

    const leads = await store.listLeads();
    if (leads.length === 0) {
      console.log(chalk.gray('No leads yet. Start one with `leadflow chat`.'));
      return;
    }

    console.log(chalk.blue(`📇 ${leads.length} lead(s)`));
    for (const lead of leads) {
      const who = lead.profile.summary || chalk.gray('(nothing captured)');
      console.log(`${chalk.cyan(lead.id)}  ${chalk.yellow(lead.stage.padEnd(20))} ${who}`);
    }
  } catch (error) {
    console.error(chalk.red('❌ Failed to list leads:'), describeError(error));
    process.exitCode = 1;
  }
}
