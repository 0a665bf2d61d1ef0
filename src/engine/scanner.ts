/**
 * portmemo — Socket Scanner
 *
 * `ss -lntupH` の出力から listening TCP / bound UDP ソケットを列挙し、
 * ps-list のプロセス一覧からプロセス名とコマンドラインを補完する。
 * parseSsOutput() はコアロジック（OS 非依存・テスト可能）。
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import psList from 'ps-list';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { ObservationMap, SocketScanner } from '../types/engine.js';
import type { Protocol } from '../types/port.js';
import { MAX_PORT, MIN_PORT, keyString } from '../types/port.js';
import { ScanError } from './errors.js';

// ============================================================
// 型
// ============================================================

/** ss の 1 行から取り出したソケット情報。 */
export interface ParsedSocket {
  protocol: Protocol;
  port: number;
  pid: number;
  /** ss が報告したプロセス名（users:(("name",...)) の先頭） */
  processName: string;
}

export interface ProcessInfo {
  processName: string;
  commandLine: string;
}

/** Runs a command and resolves with its stdout. Rejects if it cannot run or exits non-zero. */
export type CommandRunner = (command: string, args: readonly string[]) => Promise<string>;

/** Lists running processes keyed by pid. Called once per scan. */
export type ProcessTable = () => Promise<Map<number, ProcessInfo>>;

export interface SsScannerOptions {
  command?: string;
  run?: CommandRunner;
  listProcesses?: ProcessTable;
  logger?: Logger;
}

// ============================================================
// パーサー
// ============================================================

const USERS_PATTERN = /users:\(\("([^"]*)",pid=(\d+)/;

function parsePort(localAddress: string): number | undefined {
  const idx = localAddress.lastIndexOf(':');
  if (idx === -1) return undefined;
  const raw = localAddress.slice(idx + 1);
  if (!/^\d+$/.test(raw)) return undefined;
  const port = Number(raw);
  return port >= MIN_PORT && port <= MAX_PORT ? port : undefined;
}

/**
 * `ss -lntupH` の出力をパースする。
 *
 * - tcp は LISTEN のみ、udp は状態に関係なく（UNCONN = bound）採用する
 * - pid が取れない行（権限不足・カーネル内部）と pid=0 は除外する
 * - ローカルアドレスは IPv4 (`0.0.0.0:22`)、IPv6 (`[::]:22`)、
 *   インタフェース付き (`127.0.0.53%lo:53`)、ワイルドカード (`*:80`) に対応
 */
export function parseSsOutput(output: string): ParsedSocket[] {
  const sockets: ParsedSocket[] = [];

  for (const line of output.split('\n')) {
    const parts = line.trim().split(/\s+/);
    if (parts.length < 5) continue;

    const [netid, state, , , localAddress] = parts;
    let protocol: Protocol;
    if (netid.startsWith('tcp')) {
      if (state !== 'LISTEN') continue;
      protocol = 'tcp';
    } else if (netid.startsWith('udp')) {
      protocol = 'udp';
    } else {
      continue;
    }

    const port = parsePort(localAddress);
    if (port === undefined) continue;

    const users = USERS_PATTERN.exec(line);
    if (!users) continue;
    const pid = Number(users[2]);
    if (pid === 0) continue;

    sockets.push({ protocol, port, pid, processName: users[1] });
  }

  return sockets;
}

// ============================================================
// OS アクセス
// ============================================================

const execFileAsync = promisify(execFile);

const runCommand: CommandRunner = async (command, args) => {
  const { stdout } = await execFileAsync(command, [...args], {
    encoding: 'utf-8',
    maxBuffer: 16 * 1024 * 1024,
  });
  return stdout;
};

/** Process table from ps-list, keyed by pid. */
export const listProcesses: ProcessTable = async () => {
  const processes = await psList();
  return new Map(
    processes.map((p): [number, ProcessInfo] => [
      p.pid,
      { processName: p.name, commandLine: p.cmd ?? '' },
    ]),
  );
};

// ============================================================
// スキャナ
// ============================================================

/**
 * SocketScanner backed by iproute2's `ss`.
 *
 * A failure to run `ss` is a ScanError, never an empty result: an empty map
 * would mark every known port as disappeared.
 */
export class SsSocketScanner implements SocketScanner {
  private readonly command: string;
  private readonly run: CommandRunner;
  private readonly processTable: ProcessTable;
  private readonly logger: Logger;

  constructor(options: SsScannerOptions = {}) {
    this.command = options.command ?? 'ss';
    this.run = options.run ?? runCommand;
    this.processTable = options.listProcesses ?? listProcesses;
    this.logger = options.logger ?? silentLogger();
  }

  async scan(hostId: string): Promise<ObservationMap> {
    let output: string;
    try {
      output = await this.run(this.command, ['-lntupH']);
    } catch (err) {
      throw new ScanError(`Failed to query socket table with '${this.command}'`, { cause: err });
    }

    const sockets = parseSsOutput(output);
    const processes =
      sockets.length > 0 ? await this.readProcessTable() : new Map<number, ProcessInfo>();
    const observations: ObservationMap = new Map();

    for (const socket of sockets) {
      const key = keyString({ hostId, protocol: socket.protocol, port: socket.port });
      // IPv4 / IPv6 の重複は最初の行を採用
      if (observations.has(key)) continue;

      // プロセスが取れなければ ss のプロセス名で補う
      const info = processes.get(socket.pid) ?? {
        processName: socket.processName,
        commandLine: '',
      };

      observations.set(key, {
        hostId,
        protocol: socket.protocol,
        port: socket.port,
        pid: socket.pid,
        processName: info.processName,
        commandLine: info.commandLine,
      });
    }

    return observations;
  }

  private async readProcessTable(): Promise<Map<number, ProcessInfo>> {
    try {
      return await this.processTable();
    } catch (err) {
      this.logger.debug({ err }, 'process table lookup failed');
      return new Map();
    }
  }
}
