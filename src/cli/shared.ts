import { readFile } from 'node:fs/promises';
import chalk from 'chalk';
import type { ChalkInstance } from 'chalk';
import type { Command } from 'commander';
import { AnomalyDetectionSchema } from '../types/index.js';
import type { AnomalyDetection, Severity } from '../types/index.js';
import { createRuntime } from '../runtime.js';
import type { Runtime } from '../runtime.js';
import { ValidationError, errorMessage } from '../errors.js';

/**
 * Run a command body against a freshly wired runtime. Errors are printed in
 * red and set a failing exit code.
 */
export async function withRuntime(fn: (rt: Runtime) => Promise<void>): Promise<void> {
  try {
    const rt = await createRuntime();
    await fn(rt);
  } catch (err) {
    if (err instanceof ValidationError && err.issues.length > 0) {
      console.error(chalk.red(err.message.split(':')[0]));
      for (const issue of err.issues) console.error(chalk.red(`  ${issue}`));
    } else {
      console.error(chalk.red(`Error: ${errorMessage(err)}`));
    }
    process.exitCode = 1;
  }
}

export function severityChalk(s: Severity): ChalkInstance {
  switch (s) {
    case 'CRITICAL':
      return chalk.red.bold;
    case 'HIGH':
      return chalk.red;
    case 'MEDIUM':
      return chalk.yellow;
    case 'LOW':
      return chalk.green;
    case 'INFO':
      return chalk.blue;
  }
}

/** Column-aligned table; `colored` cells may carry ANSI codes, widths come from `plain`. */
export function formatTable(header: string[], plain: string[][], colored: string[][] = plain): string {
  const all = [header, ...plain];
  const widths = header.map((_, i) => Math.max(...all.map((r) => r[i].length)));
  const fmtPlain = (row: string[]) => row.map((c, i) => c.padEnd(widths[i])).join('  ');
  const fmtColored = (row: string[], p: string[]) =>
    row.map((c, i) => c + ' '.repeat(Math.max(0, widths[i] - p[i].length))).join('  ');
  const sep = widths.map((w) => '-'.repeat(w)).join('  ');
  return [fmtPlain(header), sep, ...colored.map((r, i) => fmtColored(r, plain[i]))].join('\n');
}

export function splitList(raw: string | undefined): string[] {
  return raw ? raw.split(',').map((s) => s.trim()).filter(Boolean) : [];
}

export function parseNumber(raw: string, what: string): number {
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new ValidationError(`${what} must be a number, got "${raw}"`);
  return n;
}

export interface AnomalyOptions {
  file?: string;
  logId?: string;
  confidence?: string;
  score?: string;
  service?: string;
  level?: string;
  message?: string;
  notAnomaly?: boolean;
}

/** An anomaly from `--file <json>` or from individual flags. */
export async function readAnomaly(opts: AnomalyOptions): Promise<AnomalyDetection> {
  let raw: unknown;
  if (opts.file) {
    try {
      raw = JSON.parse(await readFile(opts.file, 'utf-8'));
    } catch (err) {
      throw new ValidationError(`Could not read anomaly from ${opts.file}`, [errorMessage(err)]);
    }
  } else {
    raw = {
      logId: opts.logId ?? `cli-${Date.now()}`,
      isAnomaly: !opts.notAnomaly,
      confidence: opts.confidence !== undefined ? parseNumber(opts.confidence, 'confidence') : undefined,
      anomalyScore: opts.score !== undefined ? parseNumber(opts.score, 'score') : undefined,
      service: opts.service,
      level: opts.level,
      message: opts.message,
      detectedAt: new Date().toISOString(),
    };
  }
  const parsed = AnomalyDetectionSchema.safeParse(raw);
  if (!parsed.success) throw ValidationError.fromZod('anomaly', parsed.error);
  return parsed.data;
}

export function withAnomalyOptions(cmd: Command): Command {
  return cmd
    .option('--file <path>', 'Read the anomaly from a JSON file')
    .option('--log-id <id>', 'Anomaly log ID')
    .option('--confidence <n>', 'Confidence between 0 and 1')
    .option('--score <n>', 'Anomaly score')
    .option('--service <name>', 'Service name')
    .option('--level <level>', 'Log level')
    .option('--message <text>', 'Log message')
    .option('--not-anomaly', 'Mark the record as not anomalous');
}
