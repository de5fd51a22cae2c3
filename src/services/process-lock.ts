import fs from "fs";
import os from "os";
import path from "path";

export interface RuntimeLock {
  acquired: boolean;
  lockPath: string;
  existingPid?: number;
  reason?: string;
  release: () => void;
}

interface LockMeta {
  pid: number;
  createdAt: string;
  host: string;
  streamId: string;
}

const releaseNoop = () => {};

/**
 * 같은 데이터 디렉토리에서 봇이 두 번 뜨지 않도록 lock 파일 생성.
 * 기존 lock의 프로세스가 죽어 있으면 stale로 보고 교체한다.
 */
export function acquireRuntimeLock(lockPath: string, streamId: string = ""): RuntimeLock {
  try {
    fs.mkdirSync(path.dirname(lockPath), { recursive: true });
  } catch (error) {
    return {
      acquired: false,
      lockPath,
      reason: `[LOCK] 디렉토리 생성 실패: ${String(error)}`,
      release: releaseNoop,
    };
  }

  const firstTry = tryAcquire(lockPath, streamId);
  if (firstTry.acquired || firstTry.reason !== "exists") {
    return firstTry;
  }

  const existing = readLockMeta(lockPath);
  if (existing && isProcessAlive(existing.pid)) {
    return {
      acquired: false,
      lockPath,
      existingPid: existing.pid,
      reason: existing.streamId
        ? `[LOCK] 이미 실행 중인 봇이 있음 (stream=${existing.streamId})`
        : "[LOCK] 이미 실행 중인 봇이 있음",
      release: releaseNoop,
    };
  }

  try {
    fs.unlinkSync(lockPath);
  } catch {
    return {
      acquired: false,
      lockPath,
      existingPid: existing?.pid,
      reason: "[LOCK] 기존 lock 파일 제거 실패",
      release: releaseNoop,
    };
  }

  return tryAcquire(lockPath, streamId);
}

function tryAcquire(lockPath: string, streamId: string): RuntimeLock {
  let fd: number;
  try {
    fd = fs.openSync(lockPath, "wx");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "EEXIST") {
      return { acquired: false, lockPath, reason: "exists", release: releaseNoop };
    }
    return {
      acquired: false,
      lockPath,
      reason: `[LOCK] lock 생성 실패: ${String(error)}`,
      release: releaseNoop,
    };
  }

  const payload: LockMeta = {
    pid: process.pid,
    createdAt: new Date().toISOString(),
    host: os.hostname(),
    streamId,
  };
  try {
    fs.writeFileSync(fd, JSON.stringify(payload, null, 2), { encoding: "utf-8" });
  } finally {
    fs.closeSync(fd);
  }

  let released = false;
  const release = () => {
    if (released) return;
    released = true;
    const owner = readLockMeta(lockPath);
    if (owner && owner.pid !== process.pid) return;
    try {
      fs.unlinkSync(lockPath);
    } catch (error) {
      console.log(`[LOCK] lock 해제 실패: ${(error as Error).message}`);
    }
  };
  process.once("exit", release);

  return { acquired: true, lockPath, release };
}

function readLockMeta(lockPath: string): LockMeta | null {
  try {
    const parsed = JSON.parse(fs.readFileSync(lockPath, "utf-8")) as Partial<LockMeta>;
    if (typeof parsed.pid !== "number" || !Number.isFinite(parsed.pid) || parsed.pid <= 0) {
      return null;
    }
    return {
      pid: Math.floor(parsed.pid),
      createdAt: typeof parsed.createdAt === "string" ? parsed.createdAt : "",
      host: typeof parsed.host === "string" ? parsed.host : "",
      streamId: typeof parsed.streamId === "string" ? parsed.streamId : "",
    };
  } catch {
    return null;
  }
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return (error as NodeJS.ErrnoException).code === "EPERM";
  }
}
