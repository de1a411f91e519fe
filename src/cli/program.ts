import * as fs from 'fs';
import { Command, InvalidArgumentError, Option } from 'commander';
import { LLMProviders, type PromptOptions } from '../types.js';
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_PROVIDER,
  DEFAULT_TEMPERATURE,
} from '../library/constants.js';
import { llm } from '../completers.js';
import { encode, previewPrompt } from '../encoder/encoder.js';
import { writeTable } from '../parsing/results.js';
import { getAvailableModels } from '../library/llm/llm-client.js';
import { theme } from '../library/ui.js';

interface PromptCommandOptions {
  codebook: string;
  scoringCriteria?: string;
  promptTemplate?: string;
}

interface EncodeCommandOptions extends PromptCommandOptions {
  output?: string;
  provider: LLMProviders;
  model?: string;
  apiKey?: string;
  maxTokens: number;
  temperature: number;
  progress: boolean;
  storeLogs?: boolean | string;
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parseTemperature(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 2) {
    throw new InvalidArgumentError('Must be a number between 0 and 2.');
  }
  return parsed;
}

function promptOptions(options: PromptCommandOptions): PromptOptions {
  return {
    template: options.promptTemplate
      ? fs.readFileSync(options.promptTemplate, 'utf-8')
      : undefined,
    scoringCriteria: options.scoringCriteria,
  };
}

/**
 * Build the command-line program. Kept separate from the bin entry so it can be
 * driven from tests.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('construct-encoder')
    .description('Extract psychological construct instances from interview transcripts')
    .version('0.1.0');

  program
    .command('encode')
    .description('Encode a transcript file or a directory of transcripts')
    .argument('<documents>', 'Transcript file (.txt, .csv) or directory')
    .requiredOption('-c, --codebook <file>', 'Codebook file (.json, .csv, .txt)')
    .option('-o, --output <file>', 'Write results to a .csv or .json file')
    .addOption(
      new Option('--provider <provider>', 'LLM provider')
        .choices(Object.values(LLMProviders))
        .default(DEFAULT_PROVIDER)
    )
    .option('--model <model>', 'Model id (default: the provider default)')
    .option('--api-key <key>', 'API key (default: from the provider environment variable)')
    .option('--max-tokens <n>', 'Maximum tokens in each reply', parseInteger, DEFAULT_MAX_TOKENS)
    .option('--temperature <t>', 'Sampling temperature', parseTemperature, DEFAULT_TEMPERATURE)
    .option('--scoring-criteria <text>', 'Replace the scoring instruction of the default prompt')
    .option('--prompt-template <file>', 'Custom prompt template file with {text} and {codebook}')
    .option('--no-progress', 'Hide progress output')
    .option('--store-logs [path]', 'Write rawData.json with raw replies')
    .action(async (documents: string, options: EncodeCommandOptions) => {
      const result = await encode({
        documents,
        codebook: options.codebook,
        completer: llm({
          provider: options.provider,
          apiKey: options.apiKey,
          model: options.model,
        }),
        prompt: promptOptions(options),
        maxTokens: options.maxTokens,
        temperature: options.temperature,
        showProgress: options.progress,
        storeLogs: options.storeLogs,
      });

      if (options.output) {
        writeTable(result.table, options.output);
        console.log(`  ${theme.dim('Results written to:')} ${options.output}`);
      } else {
        console.log(JSON.stringify(result.table.rows, null, 2));
      }
    });

  program
    .command('preview')
    .description('Print the prompt for a single document without calling a model')
    .argument('<document>', 'Transcript file (.txt, .csv); a directory uses its first file')
    .requiredOption('-c, --codebook <file>', 'Codebook file (.json, .csv, .txt)')
    .option('--scoring-criteria <text>', 'Replace the scoring instruction of the default prompt')
    .option('--prompt-template <file>', 'Custom prompt template file with {text} and {codebook}')
    .action(async (document: string, options: PromptCommandOptions) => {
      const prompt = await previewPrompt({
        document,
        codebook: options.codebook,
        prompt: promptOptions(options),
      });
      console.log(prompt);
    });

  program
    .command('models')
    .description('List commonly used model ids')
    .action(() => {
      for (const model of getAvailableModels()) {
        console.log(`  ${theme.bullet} ${model}`);
      }
    });

  return program;
}
