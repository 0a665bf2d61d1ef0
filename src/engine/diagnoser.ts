/**
 * portmemo — Diagnoser
 *
 * 外部診断ツール（既定: `witr --port <port>`）を時間制限付きで実行し、
 * 結果を diagnosed イベントとしてタイムラインに記録する。
 * 定期サイクルからは呼ばれない（リクエスト経路専用）。
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type Database from 'better-sqlite3';
import type { PortKey, TimelineEvent } from '../types/entities.js';
import type { DiagnosticResult } from '../types/engine.js';
import { recordDiagnosis, requireFact } from './timeline.js';

export interface ToolRunResult {
  stdout: string;
  stderr: string;
  /** Set when the tool could not run, exited non-zero, or was killed. */
  error?: Error;
  timedOut: boolean;
}

/** Runs the tool with a time limit. Must resolve, never reject. */
export type ToolRunner = (
  command: string,
  args: readonly string[],
  timeoutMs: number,
) => Promise<ToolRunResult>;

export interface DiagnoseOptions {
  command: string;
  timeoutMs: number;
  run?: ToolRunner;
}

const execFileAsync = promisify(execFile);

/** Fields Node attaches to the rejection of a promisified execFile. */
interface ExecFailure extends Error {
  stdout?: string;
  stderr?: string;
  killed?: boolean;
  signal?: NodeJS.Signals | null;
  code?: string | number | null;
}

function isExecFailure(err: unknown): err is ExecFailure {
  return err instanceof Error;
}

/**
 * Convert an execFile rejection into a run result. Only a kill by the timeout
 * counts as timedOut; an output overflow also kills the child but is an error.
 */
export function toRunFailure(err: unknown): ToolRunResult {
  if (!isExecFailure(err)) {
    return { stdout: '', stderr: '', error: new Error(String(err)), timedOut: false };
  }
  const timedOut =
    err.killed === true &&
    err.signal === 'SIGKILL' &&
    err.code !== 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER';
  return {
    stdout: typeof err.stdout === 'string' ? err.stdout : '',
    stderr: typeof err.stderr === 'string' ? err.stderr : '',
    error: err,
    timedOut,
  };
}

const runTool: ToolRunner = async (command, args, timeoutMs) => {
  try {
    const { stdout, stderr } = await execFileAsync(command, [...args], {
      encoding: 'utf-8',
      timeout: timeoutMs,
      killSignal: 'SIGKILL',
      maxBuffer: 1024 * 1024,
    });
    return { stdout, stderr, timedOut: false };
  } catch (err) {
    return toRunFailure(err);
  }
};

/**
 * 診断ツールを実行する。タイムアウトや起動失敗は failed として返す（例外にしない）。
 */
export async function runDiagnosticTool(
  port: number,
  options: DiagnoseOptions,
): Promise<DiagnosticResult> {
  const run = options.run ?? runTool;
  const result = await run(options.command, ['--port', String(port)], options.timeoutMs);
  const output = result.stdout || result.stderr;

  if (result.timedOut) {
    return {
      output: `${output}\n${options.command} timed out after ${options.timeoutMs}ms`.trimStart(),
      failed: true,
      timedOut: true,
    };
  }
  if (result.error) {
    return {
      output: `${output}\nError: ${result.error.message}`.trimStart(),
      failed: true,
      timedOut: false,
    };
  }
  return { output, failed: false, timedOut: false };
}

/**
 * 診断ツールを実行し、その出力を tuple の fact に diagnosed イベントとして追記する。
 * protocol を必須にすることで tcp/udp で同じ port 番号を使う場合の曖昧さをなくす。
 *
 * fact が存在しない場合は NotFoundError（ツールは実行しない）。
 */
export async function diagnose(
  db: Database.Database,
  key: PortKey,
  options: DiagnoseOptions,
): Promise<{ result: DiagnosticResult; event: TimelineEvent }> {
  requireFact(db, key);
  const result = await runDiagnosticTool(key.port, options);
  const event = recordDiagnosis(db, key, result.output);
  return { result, event };
}
