import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import Ajv from 'ajv';
import type { ParseOptions } from 'jsonc-parser';
import { describeError, errnoCode, SettingsError } from './errors';
import { analyzeJsonText, formatDecodeFailure } from './jsonAnalysis';
import { toPlain } from './jsonValue';
import type { LogLevel } from './outputChannel';
import settingsSchema from './settings.schema.json';

export interface Settings {
  truncateLimit: number;
  expandDepth: number;
  logLevel: LogLevel;
  logFile?: string;
  color: boolean;
}

export type SettingsOverrides = { [K in keyof Settings]?: unknown };

export interface LoadSettingsOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  overrides?: SettingsOverrides;
}

export interface LoadedSettings {
  settings: Settings;
  /** Settings file that contributed values, if one was read. */
  source?: string;
}

export const DEFAULT_SETTINGS: Settings = {
  truncateLimit: 500,
  expandDepth: 1,
  logLevel: 'info',
  color: true
};

const settingsParseOptions: ParseOptions = {
  allowTrailingComma: true,
  disallowComments: false,
  allowEmptyContent: false
};

const ajv = new Ajv({ allErrors: true, strict: false });
const validateSettings = ajv.compile<Settings>(settingsSchema);

export function defaultSettingsPath(env: NodeJS.ProcessEnv, homeDir = os.homedir()): string {
  const configHome = env.XDG_CONFIG_HOME || path.join(homeDir, '.config');
  return path.join(configHome, 'jsonl-tree', 'settings.json');
}

/**
 * Resolves settings from defaults, the settings file, the environment and
 * explicit overrides, in increasing precedence, then validates the result.
 */
export async function loadSettings(options: LoadSettingsOptions = {}): Promise<LoadedSettings> {
  const env = options.env ?? process.env;
  const explicitPath = options.configPath || env.JSONL_TREE_CONFIG || undefined;
  const filePath = explicitPath ?? defaultSettingsPath(env, options.homeDir);
  const fromFile = await readSettingsFile(filePath, explicitPath !== undefined);

  const merged: Record<string, unknown> = {
    ...DEFAULT_SETTINGS,
    ...fromFile,
    ...definedOnly(environmentOverrides(env)),
    ...definedOnly(options.overrides ?? {})
  };

  if (!validateSettings(merged)) {
    throw new SettingsError(`Invalid settings: ${ajv.errorsText(validateSettings.errors, { dataVar: 'settings' })}`);
  }

  return { settings: merged, source: fromFile ? filePath : undefined };
}

async function readSettingsFile(filePath: string, required: boolean): Promise<Record<string, unknown> | undefined> {
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, 'utf8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      if (!required) {
        return undefined;
      }
      throw new SettingsError(`Settings file '${filePath}' does not exist.`);
    }
    throw new SettingsError(`Error reading settings file '${filePath}': ${describeError(error)}`);
  }

  const result = analyzeJsonText(text, settingsParseOptions);
  if (!result.ok) {
    throw new SettingsError(`Invalid settings file '${filePath}': ${formatDecodeFailure(result.failure)}`);
  }
  if (result.value.kind !== 'object') {
    throw new SettingsError(`Invalid settings file '${filePath}': expected a JSON object.`);
  }

  return Object.fromEntries(result.value.entries.map((entry) => [entry.key, toPlain(entry.value)]));
}

function environmentOverrides(env: NodeJS.ProcessEnv): SettingsOverrides {
  return {
    logFile: env.JSONL_TREE_LOG_FILE || undefined,
    logLevel: env.JSONL_TREE_LOG_LEVEL || undefined,
    color: env.NO_COLOR ? false : undefined
  };
}

function definedOnly(values: SettingsOverrides): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}
