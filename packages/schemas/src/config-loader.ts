import { readFile } from 'node:fs/promises';
import { ConfigurationError } from '@tessera/shared/src/utils/errors.js';
import { createChildLogger } from '@tessera/shared/src/logger.js';
import { validatePipelineConfig } from './validators.js';
import type { PipelineConfig } from './pipeline-config.schema.js';

const log = createChildLogger('config:loader');

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

async function readJsonFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to read configuration file ${filePath}: ${message}`);
  }

  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Invalid JSON in ${filePath}: ${message}`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Overlays credentials and model selection from the environment onto the raw
 * file contents, so secrets never need to live in the config file.
 */
export function applyEnvOverrides(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
): unknown {
  if (!isRecord(raw)) return raw;

  const llm: Record<string, unknown> = isRecord(raw.llm) ? { ...raw.llm } : {};
  const overridden: string[] = [];

  const apiKey = env.TESSERA_API_KEY ?? env.OPENAI_API_KEY;
  if (apiKey) {
    llm.apiKey = apiKey;
    overridden.push('apiKey');
  }
  const projectId = env.TESSERA_GCP_PROJECT_ID ?? env.GCP_PROJECT_ID;
  if (projectId) {
    llm.projectId = projectId;
    overridden.push('projectId');
  }
  if (env.TESSERA_MODEL) {
    llm.model = env.TESSERA_MODEL;
    overridden.push('model');
  }
  if (env.TESSERA_MOCK_LLM === 'true') {
    llm.provider = 'mock';
    overridden.push('provider');
  }

  if (overridden.length > 0) {
    log.debug({ fields: overridden }, 'Applied environment overrides to llm settings');
  }

  return { ...raw, llm };
}

export async function loadConfig(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<PipelineConfig> {
  const raw = await readJsonFile(configPath);
  const config = validatePipelineConfig(applyEnvOverrides(raw, env));

  log.info(
    { provider: config.llm.provider, model: config.llm.model, grouper: config.consolidation.grouper },
    'Pipeline configuration loaded',
  );

  return config;
}
