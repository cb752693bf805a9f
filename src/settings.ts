import * as fs from 'fs-extra';
import * as yaml from 'js-yaml';
import { DEFAULT_COMMANDS, DEFAULT_TOOL_TIMEOUT_MS, ENV_PREFIX, parseBooleanFlag, parsePositiveInt } from './constants';
import { SettingsError } from './errors';
import { SymbolLanguage, SYMBOL_LANGUAGES, TOOL_NAMES, ToolCommands } from './types';

export interface Settings {
  language: SymbolLanguage;
  commands: ToolCommands;
  toolTimeoutMs: number;
  strictTools: boolean; // a failing tool aborts the load instead of degrading it
  verbose: boolean;
  selectionPattern?: string;
  exclusionPattern?: string;
  manglingFile?: string;
}

export type SettingsOverrides = Partial<Omit<Settings, 'commands'>> & { commands?: Partial<ToolCommands> };

export interface LoadSettingsOptions {
  file?: string; // YAML settings file
  overrides?: SettingsOverrides;
  env?: NodeJS.ProcessEnv;
}

export function defaultSettings(): Settings {
  return {
    language: 'cpp',
    commands: { ...DEFAULT_COMMANDS },
    toolTimeoutMs: DEFAULT_TOOL_TIMEOUT_MS,
    strictTools: false,
    verbose: false
  };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isLanguage(v: unknown): v is SymbolLanguage {
  return typeof v === 'string' && SYMBOL_LANGUAGES.some(l => l === v);
}

function expectString(source: string, key: string, v: unknown): string {
  if (typeof v !== 'string' || !v.length) throw new SettingsError(`${source}: '${key}' must be a non-empty string`);
  return v;
}

// Validate the parsed document field by field; unknown keys are ignored.
export function parseSettingsDocument(doc: unknown, source = 'settings'): SettingsOverrides {
  if (doc === undefined || doc === null) return {};
  if (!isRecord(doc)) throw new SettingsError(`${source}: expected a mapping at top level`);
  const out: SettingsOverrides = {};
  if (doc.language !== undefined) {
    if (!isLanguage(doc.language)) {
      throw new SettingsError(`${source}: 'language' must be one of ${SYMBOL_LANGUAGES.join(', ')}`);
    }
    out.language = doc.language;
  }
  if (doc.commands !== undefined) {
    if (!isRecord(doc.commands)) throw new SettingsError(`${source}: 'commands' must be a mapping`);
    const commands: Partial<ToolCommands> = {};
    for (const tool of TOOL_NAMES) {
      const v = doc.commands[tool];
      if (v !== undefined) commands[tool] = expectString(source, `commands.${tool}`, v);
    }
    out.commands = commands;
  }
  if (doc.toolTimeoutMs !== undefined) {
    if (typeof doc.toolTimeoutMs !== 'number' || !(doc.toolTimeoutMs >= 0)) {
      throw new SettingsError(`${source}: 'toolTimeoutMs' must be a non-negative number (0 disables the limit)`);
    }
    out.toolTimeoutMs = doc.toolTimeoutMs;
  }
  for (const key of ['strictTools', 'verbose'] as const) {
    const v = doc[key];
    if (v === undefined) continue;
    if (typeof v !== 'boolean') throw new SettingsError(`${source}: '${key}' must be a boolean`);
    out[key] = v;
  }
  for (const key of ['selectionPattern', 'exclusionPattern', 'manglingFile'] as const) {
    const v = doc[key];
    if (v !== undefined) out[key] = expectString(source, key, v);
  }
  return out;
}

export function settingsFromEnv(env: NodeJS.ProcessEnv): SettingsOverrides {
  const out: SettingsOverrides = {};
  const language = env[`${ENV_PREFIX}LANGUAGE`];
  if (language) {
    if (!isLanguage(language)) throw new SettingsError(`${ENV_PREFIX}LANGUAGE must be one of ${SYMBOL_LANGUAGES.join(', ')}`);
    out.language = language;
  }
  const commands: Partial<ToolCommands> = {};
  for (const tool of TOOL_NAMES) {
    const v = env[`${ENV_PREFIX}${tool.toUpperCase()}`];
    if (v) commands[tool] = v;
  }
  if (Object.keys(commands).length) out.commands = commands;
  const timeout = parsePositiveInt(env[`${ENV_PREFIX}TOOL_TIMEOUT_MS`]);
  if (timeout !== undefined) out.toolTimeoutMs = timeout;
  const strict = parseBooleanFlag(env[`${ENV_PREFIX}STRICT_TOOLS`]);
  if (strict !== undefined) out.strictTools = strict;
  return out;
}

function definedOnly<T extends object>(obj: T): Partial<T> {
  const out: Partial<T> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (value !== undefined) Object.assign(out, { [key]: value });
  }
  return out;
}

export function mergeSettings(base: Settings, ...layers: SettingsOverrides[]): Settings {
  let merged: Settings = { ...base, commands: { ...base.commands } };
  for (const layer of layers) {
    const { commands, ...rest } = layer;
    merged = { ...merged, ...definedOnly(rest), commands: { ...merged.commands, ...definedOnly(commands ?? {}) } };
  }
  return merged;
}

// Layering: defaults < YAML file < environment < explicit overrides
export async function loadSettings(options: LoadSettingsOptions = {}): Promise<Settings> {
  const layers: SettingsOverrides[] = [];
  if (options.file) {
    if (!(await fs.pathExists(options.file))) throw new SettingsError(`Settings file not found: ${options.file}`);
    const raw = await fs.readFile(options.file, 'utf8');
    let doc: unknown;
    try {
      doc = yaml.load(raw);
    } catch (e: unknown) {
      throw new SettingsError(`${options.file}: ${e instanceof Error ? e.message : String(e)}`);
    }
    layers.push(parseSettingsDocument(doc, options.file));
  }
  layers.push(settingsFromEnv(options.env ?? process.env));
  if (options.overrides) layers.push(options.overrides);
  return mergeSettings(defaultSettings(), ...layers);
}
