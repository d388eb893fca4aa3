import { z } from 'zod';
import * as fs from 'fs';
import * as path from 'path';
import type { ClassifierSettings } from '../classifier/classifier.js';

export const NetworkConfigSchema = z.object({
  inputSize: z.number().int().positive().default(64),
  hiddenSize: z.number().int().positive().default(32),
  outputSize: z.number().int().positive().default(8),
  learningRate: z.number().positive().default(0.15),
  banThreshold: z.number().gt(0).max(1).default(0.7),
  initStdDev: z.number().positive().default(0.5),
  seed: z.number().int().optional(),
});

export const TrainingConfigSchema = z.object({
  epochs: z.number().int().min(0).default(5),
  reinforceEpochs: z.number().int().min(0).default(2),
  seedOnStart: z.boolean().default(true),
  groundsFile: z.string().optional(),
});

export const RespondConfigSchema = z.object({
  minSimilarity: z.number().default(0.3),
});

export const ConfigSchema = z.object({
  version: z.number().default(1),
  classifier: NetworkConfigSchema.default({}),
  training: TrainingConfigSchema.default({}),
  respond: RespondConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type NetworkConfig = z.infer<typeof NetworkConfigSchema>;
export type TrainingConfig = z.infer<typeof TrainingConfigSchema>;
export type RespondConfig = z.infer<typeof RespondConfigSchema>;

export const BANLINE_DIR = '.banline';
export const CONFIG_FILE = 'config.json';
export const MEMORY_FILE = 'memory.json';

export function findProjectRoot(startDir: string = process.cwd()): string | null {
  let currentDir = startDir;

  while (currentDir !== path.dirname(currentDir)) {
    const dirPath = path.join(currentDir, BANLINE_DIR);
    if (fs.existsSync(dirPath) && fs.statSync(dirPath).isDirectory()) {
      return currentDir;
    }
    currentDir = path.dirname(currentDir);
  }

  return null;
}

export function getBanlinePath(projectRoot?: string): string {
  const root = projectRoot ?? findProjectRoot();
  if (!root) {
    throw new Error('Not in a Banline project. Run `banline init` first.');
  }
  return path.join(root, BANLINE_DIR);
}

export function getConfigPath(projectRoot?: string): string {
  return path.join(getBanlinePath(projectRoot), CONFIG_FILE);
}

export function getMemoryPath(projectRoot?: string): string {
  return path.join(getBanlinePath(projectRoot), MEMORY_FILE);
}

export function loadConfig(projectRoot?: string): Config {
  const configPath = getConfigPath(projectRoot);

  if (!fs.existsSync(configPath)) {
    return ConfigSchema.parse({});
  }

  try {
    const rawConfig = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    return ConfigSchema.parse(rawConfig);
  } catch {
    // Corrupt or invalid config - fall back to defaults
    return ConfigSchema.parse({});
  }
}

export function saveConfig(config: Config, projectRoot?: string): void {
  const configPath = getConfigPath(projectRoot);
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2), { mode: 0o600 });
}

export function initProject(targetDir: string = process.cwd(), force: boolean = false): void {
  const dirPath = path.join(targetDir, BANLINE_DIR);

  if (fs.existsSync(dirPath) && !force) {
    throw new Error('Banline already initialized. Use --force to reinitialize.');
  }

  fs.mkdirSync(dirPath, { recursive: true, mode: 0o700 });

  const defaultConfig = ConfigSchema.parse({});
  fs.writeFileSync(
    path.join(dirPath, CONFIG_FILE),
    JSON.stringify(defaultConfig, null, 2),
    { mode: 0o600 }
  );

  fs.writeFileSync(path.join(dirPath, '.gitignore'), `# Banline local files
${MEMORY_FILE}
`);
}

/**
 * Flatten the config into the settings a Classifier is built from.
 */
export function toClassifierSettings(config: Config): ClassifierSettings {
  return {
    ...config.classifier,
    epochs: config.training.epochs,
    reinforceEpochs: config.training.reinforceEpochs,
    minSimilarity: config.respond.minSimilarity,
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function setConfigValue(key: string, value: string, projectRoot?: string): void {
  const config = loadConfig(projectRoot);
  const keys = key.split('.');

  let current: Record<string, unknown> = config;
  for (let i = 0; i < keys.length - 1; i++) {
    const next = current[keys[i]];
    if (!isRecord(next)) {
      throw new Error(`Invalid config key: ${key}`);
    }
    current = next;
  }

  const lastKey = keys[keys.length - 1];

  const existingValue = current[lastKey];
  if (typeof existingValue === 'number') {
    current[lastKey] = parseFloat(value);
  } else if (typeof existingValue === 'boolean') {
    current[lastKey] = value === 'true';
  } else if (existingValue === undefined && value.trim() !== '' && !Number.isNaN(Number(value))) {
    // Unset optional numbers (e.g. classifier.seed)
    current[lastKey] = Number(value);
  } else {
    current[lastKey] = value;
  }

  const validated = ConfigSchema.parse(config);
  saveConfig(validated, projectRoot);
}

export function getConfigValue(key: string, projectRoot?: string): unknown {
  const config = loadConfig(projectRoot);
  const keys = key.split('.');

  let current: unknown = config;
  for (const k of keys) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[k];
  }

  return current;
}
