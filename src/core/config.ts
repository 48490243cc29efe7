import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import YAML from 'yaml';
import type { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import { AgentConfigSchema, StoreConfigSchema } from '../types/index.js';
import type { AgentConfig, StoreConfig } from '../types/index.js';

export const LEDGER_FILENAME = '.delivery-ledger.csv';

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

async function readYaml(configPath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf8');
  } catch (err) {
    throw new ConfigError(configPath, errorMessage(err));
  }
  try {
    return YAML.parse(content);
  } catch (err) {
    throw new ConfigError(configPath, errorMessage(err));
  }
}

export async function loadAgentConfig(configPath: string): Promise<AgentConfig> {
  const parsed = AgentConfigSchema.safeParse(await readYaml(configPath));
  if (!parsed.success) throw new ConfigError(configPath, formatIssues(parsed.error));
  return parsed.data;
}

export async function loadStoreConfig(configPath: string): Promise<StoreConfig> {
  const parsed = StoreConfigSchema.safeParse(await readYaml(configPath));
  if (!parsed.success) throw new ConfigError(configPath, formatIssues(parsed.error));
  return parsed.data;
}

export function ledgerPathFor(config: AgentConfig): string {
  return config.ledger_path ?? path.join(config.watch_directory, LEDGER_FILENAME);
}

export function stagingDirFor(config: StoreConfig): string {
  return config.staging_directory ?? path.join(os.tmpdir(), 'backup-relay-staging');
}
