import type { TextGenerator, TurnRecord } from '@leadflow/runtime';

const EXAMPLE_PATTERN = /EXAMPLES[^\n]*\n- "([^"\n]+)"/;

/**
 * Text generator for offline runs: answers with the first example of the
 * rendered prompt, so a scripted conversation runs without any model.
 */
export class OfflineGenerator implements TextGenerator {
  async generate(prompt: string, _history: readonly TurnRecord[]): Promise<string> {
    if (prompt.startsWith('Write a structured summary')) {
      return 'Offline run: no model summary.';
    }
    const example = prompt.match(EXAMPLE_PATTERN);
    return example ? example[1] : 'Thanks, tell me more.';
  }
}
