// Centralized configuration: CLI flags, then environment, then agent.config.{yaml,yml,json}, then defaults.

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { DEFAULT_MAX_ITERATIONS } from './agent.js';
import { ConfigError } from './errors.js';
import { normalizeProviderName, type ProviderName } from './providers/index.js';
import { DEFAULT_ROUTED_MODEL } from './routed-agent.js';

export const CONFIG_FILE_NAMES = ['agent.config.yaml', 'agent.config.yml', 'agent.config.json'];

export const DEFAULT_WORKING_DIRECTORY = 'todo';

const FileConfigSchema = z
  .object({
    provider: z.string().optional(),
    model: z.string().optional(),
    routedModel: z.string().optional(),
    workingDirectory: z.string().optional(),
    maxIterations: z.number().int().positive().optional(),
    python: z.string().optional(),
    openaiBaseURL: z.string().optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

export interface CliFlags {
  provider?: string;
  model?: string;
  dir?: string;
  maxIterations?: number;
}

export interface AgentConfig {
  provider: ProviderName;
  model?: string;
  routedModel: string;
  workingDirectory: string;
  maxIterations: number;
  python: string;
  openaiBaseURL?: string;
  configFile?: string;
}

/**
 * Find and parse the first config file present in `directory`.
 */
export async function loadConfigFile(directory: string): Promise<{ path: string; config: FileConfig } | null> {
  for (const name of CONFIG_FILE_NAMES) {
    const filePath = path.join(directory, name);
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch {
      continue;
    }

    let data: unknown;
    try {
      data = name.endsWith('.json') ? JSON.parse(content) : yaml.load(content);
    } catch (error) {
      throw new ConfigError(`Failed to parse ${name}: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error,
      });
    }

    const parsed = FileConfigSchema.safeParse(data ?? {});
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(issue => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid ${name}: ${issues}`);
    }
    return { path: filePath, config: parsed.data };
  }
  return null;
}

function parsePositiveInteger(raw: string | undefined, source: string): number | undefined {
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${source} must be a positive integer, got "${raw}"`);
  }
  return value;
}

// An exported-but-empty variable (`AGENT_WORKING_DIR=`) counts as unset.
function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value === '' ? undefined : value;
}

export function resolveConfig(
  flags: CliFlags,
  env: NodeJS.ProcessEnv,
  file: FileConfig = {},
  configFile?: string
): AgentConfig {
  const providerName = flags.provider ?? envValue(env, 'AGENT_PROVIDER') ?? file.provider ?? 'gemini';
  const provider = normalizeProviderName(providerName);
  if (!provider) {
    throw new ConfigError(`Unknown provider: "${providerName}". Supported providers: gemini, openai`);
  }

  return {
    provider,
    model: flags.model ?? envValue(env, 'AGENT_MODEL') ?? file.model,
    routedModel: envValue(env, 'AGENT_ROUTED_MODEL') ?? file.routedModel ?? DEFAULT_ROUTED_MODEL,
    workingDirectory: flags.dir ?? envValue(env, 'AGENT_WORKING_DIR') ?? file.workingDirectory ?? DEFAULT_WORKING_DIRECTORY,
    maxIterations:
      flags.maxIterations ??
      parsePositiveInteger(envValue(env, 'AGENT_MAX_ITERATIONS'), 'AGENT_MAX_ITERATIONS') ??
      file.maxIterations ??
      DEFAULT_MAX_ITERATIONS,
    python: envValue(env, 'AGENT_PYTHON') ?? file.python ?? 'python3',
    openaiBaseURL: envValue(env, 'OPENAI_BASE_URL') ?? file.openaiBaseURL,
    configFile,
  };
}

export class ConfigManager {
  private config: AgentConfig;

  constructor(config: AgentConfig) {
    this.config = config;
  }

  static async load(
    flags: CliFlags = {},
    env: NodeJS.ProcessEnv = process.env,
    cwd: string = process.cwd()
  ): Promise<ConfigManager> {
    const file = await loadConfigFile(cwd);
    return new ConfigManager(resolveConfig(flags, env, file?.config, file?.path));
  }

  get<K extends keyof AgentConfig>(key: K): AgentConfig[K] {
    return this.config[key];
  }

  /**
   * The scoped directory as an absolute path.
   */
  getWorkingDirectory(cwd: string = process.cwd()): string {
    return path.resolve(cwd, this.config.workingDirectory);
  }

  toJSON(): AgentConfig {
    return { ...this.config };
  }
}
