/**
 * OS-level checks: process liveness, port availability, HTTP health.
 */

import fs from 'fs';
import net from 'net';
import { setTimeout as sleep } from 'timers/promises';

import { isNodeSystemError } from '../errors.js';

export { sleep };

export function isProcessAlive(pid: number | undefined): boolean {
  if (!pid || pid <= 0) {
    return false;
  }

  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return isNodeSystemError(err) && err.code === 'EPERM';
  }
}

/**
 * Fields of /proc/<pid>/stat from field 3 (state) on. Undefined where
 * /proc is unavailable or the process is gone.
 */
function readStat(pid: number): string[] | undefined {
  let stat: string;
  try {
    stat = fs.readFileSync(`/proc/${pid}/stat`, 'utf-8');
  } catch (err) {
    if (isNodeSystemError(err) && (err.code === 'ENOENT' || err.code === 'ESRCH')) return undefined;
    throw err;
  }
  // comm (field 2) may contain spaces and parentheses
  return stat.slice(stat.lastIndexOf(')') + 2).split(' ');
}

/** Kernel start time of a process in clock ticks since boot. */
export function processStartTime(pid: number): string | undefined {
  return readStat(pid)?.[19];
}

/**
 * Whether the group has a member that is not a zombie. Zombies count as
 * members for kill(), and orphans linger as zombies under a PID 1 that
 * does not reap. Undefined without /proc.
 */
function hasLiveMember(pgid: number): boolean | undefined {
  if (!fs.existsSync('/proc/self/stat')) return undefined;
  const target = String(pgid);
  for (const entry of fs.readdirSync('/proc')) {
    if (!/^\d+$/.test(entry)) continue;
    const fields = readStat(Number(entry));
    if (fields && fields[2] === target && fields[0] !== 'Z') return true;
  }
  return false;
}

/**
 * Whether any member of the process group led by `pid` is still alive.
 * Services run under a shell, so the leader can be gone while its
 * children keep running.
 */
export function isGroupAlive(pid: number | undefined): boolean {
  if (!pid || pid <= 0) {
    return false;
  }

  try {
    process.kill(-pid, 0);
    return hasLiveMember(pid) ?? true;
  } catch (err) {
    if (isNodeSystemError(err) && err.code === 'EPERM') return true;
  }
  // not a group leader: fall back to the process itself
  return isProcessAlive(pid);
}

/** Send a signal to the process group led by `pid`, falling back to the process itself. */
export function signalGroup(pid: number, signal: NodeJS.Signals): boolean {
  for (const target of [-pid, pid]) {
    try {
      process.kill(target, signal);
      return true;
    } catch (err) {
      if (!isNodeSystemError(err) || err.code !== 'ESRCH') throw err;
    }
  }
  return false;
}

/** Resolves false only when something is already bound to the port. */
export function isPortFree(port: number, host: string): Promise<boolean> {
  return new Promise((resolve, reject) => {
    const server = net.createServer();
    server.once('error', (err) => {
      if (isNodeSystemError(err) && err.code === 'EADDRINUSE') resolve(false);
      else reject(err);
    });
    server.once('listening', () => {
      server.close(() => resolve(true));
    });
    server.listen(port, host);
  });
}

/** True when the endpoint answers 2xx within the timeout. */
export async function probeHttp(url: string, timeoutMs: number): Promise<boolean> {
  try {
    const res = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
    await res.body?.cancel();
    return res.ok;
  } catch {
    return false;
  }
}

/** Poll `check` until it holds or the timeout passes. */
export async function waitFor(check: () => boolean, timeoutMs: number, intervalMs = 50): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() >= deadline) return false;
    await sleep(intervalMs);
  }
  return true;
}

/** Last `count` lines of a file, reading backwards in chunks. */
export function tailLines(file: string, count: number, chunkSize = 64 * 1024): string[] {
  if (count <= 0 || !fs.existsSync(file)) return [];

  const fd = fs.openSync(file, 'r');
  try {
    let position = fs.fstatSync(fd).size;
    const chunks: Buffer[] = [];
    let newlines = 0;

    // one extra newline covers the trailing one
    while (position > 0 && newlines <= count) {
      const length = Math.min(chunkSize, position);
      position -= length;
      const chunk = Buffer.alloc(length);
      fs.readSync(fd, chunk, 0, length, position);
      chunks.unshift(chunk);
      for (const byte of chunk) if (byte === 0x0a) newlines++;
    }

    const lines = Buffer.concat(chunks).toString('utf-8').split('\n');
    if (lines[lines.length - 1] === '') lines.pop();
    return lines.slice(-count);
  } finally {
    fs.closeSync(fd);
  }
}
