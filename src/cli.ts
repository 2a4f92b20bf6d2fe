import * as fs from 'fs/promises';
import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import type { LanguageModel } from 'ai';
import { AIAgent } from './agent.js';
import { ConfigManager } from './config.js';
import { ProviderError, describeError } from './errors.js';
import { DebugLogger, formatPreview } from './logger.js';
import { getProvider, type ModelProvider, type ProviderOptions } from './providers/index.js';
import { renderMarkdown } from './render.js';
import { formatRoutedToolCall, MissingApiKeyError, resolveRoutedModel, runRoutedAgent } from './routed-agent.js';
import { formatToolAnnouncement, toolResponseText } from './tools/index.js';

export interface RunOptions {
  verbose?: boolean;
  debug?: boolean;
  provider?: string;
  model?: string;
  dir?: string;
  maxIterations?: number;
}

export interface ChainOptions {
  model?: string;
  dir?: string;
  maxIterations?: number;
  debug?: boolean;
}

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

/**
 * Where commands get their models from. Tests swap in scripted ones.
 */
export interface CommandDeps {
  createProvider?: (name: string, options: ProviderOptions) => ModelProvider;
  resolveModel?: (spec: string) => LanguageModel;
}

const defaultIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line),
};

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export async function runAgentCommand(
  prompt: string,
  options: RunOptions,
  io: CliIO = defaultIO,
  deps: CommandDeps = {}
): Promise<void> {
  const config = await ConfigManager.load({
    provider: options.provider,
    model: options.model,
    dir: options.dir,
    maxIterations: options.maxIterations,
  });
  const workingDirectory = config.getWorkingDirectory();
  await fs.mkdir(workingDirectory, { recursive: true });

  const verbose = options.verbose ?? false;
  const debug = new DebugLogger({ enabled: options.debug ?? false });
  if (debug.file) {
    io.err(chalk.dim(`Debug mode enabled. Logging to: ${debug.file}`));
  }
  debug.log('Config', { ...config.toJSON() });

  const createProvider = deps.createProvider ?? getProvider;
  const provider = createProvider(config.get('provider'), {
    model: config.get('model'),
    baseURL: config.get('openaiBaseURL'),
  });
  const agent = new AIAgent({
    provider,
    workingDirectory,
    python: config.get('python'),
    maxIterations: config.get('maxIterations'),
  });

  if (verbose) {
    io.out(chalk.dim(`User prompt: ${prompt}`));
    io.out(chalk.dim(`Provider: ${provider.name} (${provider.model}), working directory: ${workingDirectory}`));
  }

  const result = await agent.run(prompt, {
    onIteration: iteration => debug.log('Iteration', `Requesting model turn ${iteration}`),
    onToolUse: call => {
      io.out(chalk.cyan(formatToolAnnouncement(call, verbose)));
      debug.log('Tool Start', `Tool: ${call.name}\nInput:\n${formatPreview(JSON.stringify(call.args ?? {}, null, 2), 600)}`, call);
    },
    onToolResult: (call, response) => {
      const text = toolResponseText(response);
      if (verbose) {
        io.out(chalk.dim(`   -> ${formatPreview(text, 300)}`));
      }
      debug.log('Tool Result', formatPreview(text, 800), { tool: call.name, response });
    },
  });

  if (result.reason === 'max_iterations') {
    io.out(chalk.yellow('Maximum iterations reached.'));
    return;
  }

  io.out(chalk.bold.green('Final response:'));
  io.out(renderMarkdown(result.finalText ?? ''));

  if (verbose) {
    io.out(
      chalk.dim(
        `Iterations: ${result.iterations}, tool calls: ${result.toolCalls.length}, ` +
          `prompt tokens: ${result.usage.inputTokens}, response tokens: ${result.usage.outputTokens}`
      )
    );
  }
}

export async function runChainCommand(
  prompt: string,
  options: ChainOptions,
  io: CliIO = defaultIO,
  deps: CommandDeps = {}
): Promise<void> {
  const config = await ConfigManager.load({ dir: options.dir, maxIterations: options.maxIterations });
  const workingDirectory = config.getWorkingDirectory();
  await fs.mkdir(workingDirectory, { recursive: true });

  const debug = new DebugLogger({ enabled: options.debug ?? false });
  if (debug.file) {
    io.err(chalk.dim(`Debug mode enabled. Logging to: ${debug.file}`));
  }
  const spec = options.model ?? config.get('routedModel');
  const model = (deps.resolveModel ?? resolveRoutedModel)(spec);

  const result = await runRoutedAgent(prompt, {
    model,
    workingDirectory,
    python: config.get('python'),
    maxIterations: config.get('maxIterations'),
    onToolUse: call => debug.log('Tool Start', `Tool: ${call.name}`, call),
  });

  io.out(renderMarkdown(result.text));

  if (result.toolCalls.length > 0) {
    io.out(chalk.green('\nTool calls:'));
    for (const call of result.toolCalls) {
      io.out(`  - ${formatRoutedToolCall(call)}`);
    }
  }
}

/**
 * Print a failure the way the terminal user should see it.
 */
export function reportError(error: unknown, io: CliIO = defaultIO): void {
  if (error instanceof MissingApiKeyError) {
    io.err(chalk.red('Error: Missing API key.'));
    io.err(error.message.split('\n').slice(1).join('\n'));
    return;
  }

  const { status, statusText, message } = describeError(error);
  if (error instanceof ProviderError && status) {
    io.err(chalk.red(`Error: API request failed (HTTP ${status}${statusText ? ` ${statusText}` : ''})`));
    io.err(`  → ${message}`);
    return;
  }
  io.err(chalk.red(`Error: ${message}`));
}

export function createProgram(io: CliIO = defaultIO): Command {
  const program = new Command();

  program
    .name('coding-agent')
    .description('AI coding agent that works on files and todos inside a scoped directory');

  program
    .command('run', { isDefault: true })
    .description('Send a prompt to the model and let it call the built-in tools')
    .argument('<prompt>', 'What you want the agent to do')
    .option('-v, --verbose', 'Show tool arguments, results and token usage')
    .option('--debug', 'Write a debug log and echo tool calls to stderr')
    .option('-p, --provider <name>', 'Model provider (gemini or openai)')
    .option('-m, --model <id>', 'Model id for the provider')
    .option('-d, --dir <path>', 'Scoped directory the tools may touch')
    .option('--max-iterations <n>', 'Upper bound on model turns', parsePositiveInt)
    .action(async (prompt: string, options: RunOptions) => {
      await runAgentCommand(prompt, options, io);
    });

  program
    .command('chain')
    .description('Run the prompt through the ai SDK router (provider:model)')
    .argument('<prompt>', 'What you want the agent to do')
    .option('-m, --model <spec>', 'Model as provider:model, e.g. google:gemini-2.0-flash')
    .option('-d, --dir <path>', 'Scoped directory the tools may touch')
    .option('--max-iterations <n>', 'Upper bound on model steps', parsePositiveInt)
    .option('--debug', 'Echo tool calls to stderr and a debug log')
    .action(async (prompt: string, options: ChainOptions) => {
      await runChainCommand(prompt, options, io);
    });

  return program;
}
