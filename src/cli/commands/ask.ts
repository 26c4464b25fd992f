/**
 * `ontoreason ask <type> <subject> <object> --data <files...>`
 * Loads the data into in-memory storage and answers a single question.
 */

import { Command } from 'commander';
import { loadFiles, openReasoner, parseInteger, printJson, withInterrupt, type CommonOptions } from '../runtime.js';
import { addCommonOptions } from './common.js';

interface AskOptions extends CommonOptions {
  data: string[];
  maxDepth?: number;
  timeout?: number;
}

export function createAskCommand(): Command {
  const cmd = new Command('ask');

  addCommonOptions(cmd)
    .description('Answer SubclassOf, InstanceOf or HasAttribute questions')
    .argument('<type>', 'Question type: SubclassOf | InstanceOf | HasAttribute')
    .argument('<subject>', 'Entity the search starts from')
    .argument('<object>', 'Target class or attribute')
    .requiredOption('--data <files...>', 'CSV files to load before answering')
    .option('--max-depth <edges>', 'Longest path to search', parseInteger)
    .option('--timeout <ms>', 'Give up (UNKNOWN) after this many milliseconds', parseInteger)
    .action(async (type: string, subject: string, object: string, options: AskOptions) => {
      await executeAsk({ type, subject, object }, options);
    });

  return cmd;
}

async function executeAsk(
  question: { type: string; subject: string; object: string },
  options: AskOptions,
): Promise<void> {
  const reasoner = await openReasoner(options, {
    query: { maxDepth: options.maxDepth, timeoutMs: options.timeout },
  });

  const result = await withInterrupt(async signal => {
    await loadFiles(reasoner, options.data, signal);
    return reasoner.orchestrator.ask(question, { signal });
  });
  printJson(result);
}
