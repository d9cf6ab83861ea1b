import fs from 'fs';
import path from 'path';
import { logger } from './logger';

const log = logger('telemetry');

type Attributes = Record<string, string | number | boolean | undefined>;

type MetricPayload = Attributes & {
  name: string;
  duration_ms: number;
  ts: string;
};

interface Aggregate {
  count: number;
  total: number;
  max: number;
  min: number;
}

export interface TelemetryOptions {
  enabled?: boolean;
  logDir?: string;
}

let enabled = true;
let logDir = path.join(process.cwd(), 'logs');
const aggregates = new Map<string, Aggregate>();

export function configureTelemetry(options: TelemetryOptions = {}): void {
  if (typeof options.enabled === 'boolean') enabled = options.enabled;
  if (options.logDir) logDir = path.resolve(process.cwd(), options.logDir);
}

export function resetTelemetry(): void {
  aggregates.clear();
}

export function telemetryFiles() {
  return {
    log: path.join(logDir, 'telemetry.log'),
    prom: path.join(logDir, 'telemetry.prom'),
    snapshot: path.join(logDir, 'telemetry_latest.json'),
  };
}

/**
 * Starts a timer for one tool call. The returned function records the
 * duration together with the attributes given at start and stop.
 */
export function startTimer(name: string, attributes: Attributes = {}) {
  const start = Date.now();
  return (extra: Attributes = {}) => {
    if (!enabled) return;
    writeMetric({
      name,
      duration_ms: Date.now() - start,
      ts: new Date().toISOString(),
      ...attributes,
      ...extra,
    });
  };
}

function writeMetric(m: MetricPayload) {
  const files = telemetryFiles();
  updateAggregate(m);
  try {
    fs.mkdirSync(logDir, { recursive: true });
    fs.appendFileSync(files.log, JSON.stringify(m) + '\n', 'utf8');
    fs.writeFileSync(files.prom, renderPrometheus(), 'utf8');
    fs.writeFileSync(files.snapshot, JSON.stringify(snapshot(), null, 2), 'utf8');
  } catch (err) {
    log('failed to write telemetry to %s: %O', logDir, err);
  }
}

function updateAggregate(m: MetricPayload) {
  const entry = aggregates.get(m.name) ?? { count: 0, total: 0, max: Number.MIN_SAFE_INTEGER, min: Number.MAX_SAFE_INTEGER };
  entry.count += 1;
  entry.total += m.duration_ms;
  entry.max = Math.max(entry.max, m.duration_ms);
  entry.min = Math.min(entry.min, m.duration_ms);
  aggregates.set(m.name, entry);
}

export function snapshot() {
  return Array.from(aggregates.entries()).map(([name, stats]) => ({
    name,
    count: stats.count,
    total: stats.total,
    avg: stats.count ? stats.total / stats.count : 0,
    max: stats.max,
    min: stats.min,
  }));
}

function renderPrometheus(): string {
  const lines = [
    '# HELP lookup_tool_duration_ms Lookup tool call durations in milliseconds.',
    '# TYPE lookup_tool_duration_ms summary',
  ];
  for (const s of snapshot()) {
    lines.push(`lookup_tool_duration_ms_count{tool="${s.name}"} ${s.count}`);
    lines.push(`lookup_tool_duration_ms_sum{tool="${s.name}"} ${s.total}`);
    lines.push(`lookup_tool_duration_ms_max{tool="${s.name}"} ${s.max}`);
    lines.push(`lookup_tool_duration_ms_min{tool="${s.name}"} ${s.min}`);
  }
  return lines.join('\n') + '\n';
}
