import fs from 'fs';
import path from 'path';
import { logger } from './logger';

const log = logger('config');

export interface TableFiles {
  functionTree: string;
  macros: string;
  globalVars: string;
  classes: string;
}

export interface TelemetryConfig {
  enabled: boolean;
  logDir: string;
}

export interface AppConfig {
  tables: TableFiles;
  archive: string;
  telemetry: TelemetryConfig;
}

const defaultConfig: AppConfig = {
  tables: {
    functionTree: 'FunctionTree.csv',
    macros: 'Macros.csv',
    globalVars: 'GlobalVars.csv',
    classes: 'Classes.csv',
  },
  archive: 'src.zip',
  telemetry: {
    enabled: true,
    logDir: 'logs',
  },
};

export function defaults(): AppConfig {
  return {
    tables: { ...defaultConfig.tables },
    archive: defaultConfig.archive,
    telemetry: { ...defaultConfig.telemetry },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function text(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim() ? value : fallback;
}

function pickTables(base: TableFiles, source: unknown): TableFiles {
  if (!isRecord(source)) return { ...base };
  return {
    functionTree: text(source.functionTree, base.functionTree),
    macros: text(source.macros, base.macros),
    globalVars: text(source.globalVars, base.globalVars),
    classes: text(source.classes, base.classes),
  };
}

function resolveConfigPath(custom?: string): string | undefined {
  if (custom && fs.existsSync(custom)) return custom;
  const envPath = process.env.LOOKUP_CONFIG_PATH;
  if (envPath && fs.existsSync(envPath)) return envPath;
  const defaultPath = path.join(process.cwd(), 'config', 'lookup_config.json');
  if (fs.existsSync(defaultPath)) return defaultPath;
  const moduleRelative = path.resolve(__dirname, '..', '..', '..', 'config', 'lookup_config.json');
  if (fs.existsSync(moduleRelative)) return moduleRelative;
  return undefined;
}

export function loadConfig(customPath?: string): AppConfig {
  const cfgPath = resolveConfigPath(customPath);
  if (!cfgPath) return defaults();
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(cfgPath, 'utf8'));
  } catch (err) {
    log('ignoring unreadable config %s: %O', cfgPath, err);
    return defaults();
  }
  if (!isRecord(parsed)) return defaults();

  const base = defaults();
  const telemetry: Record<string, unknown> = isRecord(parsed.telemetry) ? parsed.telemetry : {};
  return {
    tables: pickTables(base.tables, parsed.tables),
    archive: text(parsed.archive, base.archive),
    telemetry: {
      enabled: typeof telemetry.enabled === 'boolean' ? telemetry.enabled : base.telemetry.enabled,
      logDir: text(telemetry.logDir, base.telemetry.logDir),
    },
  };
}
