import fs from "fs";
import path from "path";
import { BotMode } from "../types/runtime.js";

const DEFAULT_DATA_PATH = path.join(process.cwd(), "data", "quota-usage.json");

export interface QuotaState {
  date: string;
  usage: number;
  dailyBudget: number;
  reserve: number;
  economyMode: boolean;
}

interface PersistedQuotaUsage {
  date: string;
  usage: number;
  updatedAt: string;
}

export interface QuotaTrackerOptions {
  dailyBudget: number;
  reserve: number;
  economyMode?: boolean;
  resetEconomyOnNewDay?: boolean;
  timezone?: string;
  dataPath?: string;
  now?: () => Date;
  // 실행 인자로 강제한 이코노미 모드는 날짜가 바뀌어도 해제하지 않음
  economyPinned?: boolean;
  onEconomyActivated?: (state: QuotaState) => void;
  onEconomyCleared?: (state: QuotaState) => void;
}

/**
 * YouTube API 일일 쿼터 추적
 *
 * 날짜(설정 타임존 기준)별 사용량을 호출마다 파일에 기록한다.
 * 사용량이 `dailyBudget - reserve`를 넘으면 이코노미 모드로 전환.
 * 이코노미 모드는 날짜가 바뀌어도 유지됨 (`resetEconomyOnNewDay`로 변경 가능,
 * 해제 시 `onEconomyCleared`로 설정 파일에도 반영)
 */
export class QuotaTracker {
  private readonly dataPath: string;
  private readonly now: () => Date;
  private readonly timezone: string;
  private readonly dailyBudget: number;
  private readonly reserve: number;
  private readonly resetEconomyOnNewDay: boolean;
  private readonly economyPinned: boolean;
  private readonly onEconomyActivated?: (state: QuotaState) => void;
  private readonly onEconomyCleared?: (state: QuotaState) => void;
  private date: string;
  private usage = 0;
  private economyMode: boolean;

  constructor(options: QuotaTrackerOptions) {
    this.dataPath = options.dataPath ? path.resolve(options.dataPath) : DEFAULT_DATA_PATH;
    this.now = typeof options.now === "function" ? options.now : () => new Date();
    this.timezone = normalizeTimezone(options.timezone);
    this.dailyBudget = clampInt(options.dailyBudget, 1, 100_000_000, 10_000);
    this.reserve = clampInt(options.reserve, 0, this.dailyBudget, 0);
    this.economyMode = options.economyMode === true;
    this.resetEconomyOnNewDay = options.resetEconomyOnNewDay === true;
    this.economyPinned = options.economyPinned === true;
    this.onEconomyActivated = options.onEconomyActivated;
    this.onEconomyCleared = options.onEconomyCleared;
    this.date = this.today();
    this.load();
  }

  load(): QuotaState {
    this.date = this.today();
    this.usage = 0;

    let raw: string;
    try {
      if (!fs.existsSync(this.dataPath)) {
        console.log("[QUOTA] 사용량 파일 없음, 새로 추적 시작");
        return this.snapshot();
      }
      raw = fs.readFileSync(this.dataPath, "utf-8");
    } catch (error) {
      console.error(`[QUOTA] 사용량 파일 읽기 실패: ${(error as Error).message}`);
      return this.snapshot();
    }

    const stored = parseStoredUsage(raw);
    if (!stored) {
      console.error(`[QUOTA] 사용량 파일 형식 오류: ${this.dataPath}`);
      return this.snapshot();
    }

    if (stored.date === this.date) {
      this.usage = stored.usage;
      console.log(`[QUOTA] 오늘 사용량: ${this.usage}/${this.dailyBudget} units`);
    } else {
      console.log(`[QUOTA] 새로운 날 (${stored.date} → ${this.date}), 사용량 초기화`);
      this.clearEconomyForNewDay();
    }
    return this.snapshot();
  }

  recordUsage(units: number): QuotaState {
    this.rollover();
    this.usage += clampInt(units, 0, 1_000_000, 0);
    this.save();

    if (this.usage > this.dailyBudget - this.reserve && !this.economyMode) {
      console.warn(`[QUOTA] 쿼터 경고: ${this.usage}/${this.dailyBudget} units 사용됨`);
      console.warn("[QUOTA] 이코노미 모드 전환");
      this.economyMode = true;
      this.notifyEconomyChange(this.onEconomyActivated);
    }

    return this.snapshot();
  }

  /**
   * 날짜가 바뀌었으면 카운터 초기화. 초기화했으면 true
   */
  rollover(): boolean {
    const today = this.today();
    if (today === this.date) return false;

    console.log(`[QUOTA] ${this.date} 최종 사용량: ${this.usage} units → ${today} 초기화`);
    this.date = today;
    this.usage = 0;
    this.clearEconomyForNewDay();
    return true;
  }

  currentMode(): BotMode {
    return this.economyMode ? "economy" : "normal";
  }

  snapshot(): QuotaState {
    return {
      date: this.date,
      usage: this.usage,
      dailyBudget: this.dailyBudget,
      reserve: this.reserve,
      economyMode: this.economyMode,
    };
  }

  private save(): void {
    const payload: PersistedQuotaUsage = {
      date: this.date,
      usage: this.usage,
      updatedAt: this.now().toISOString(),
    };
    try {
      fs.mkdirSync(path.dirname(this.dataPath), { recursive: true });
      fs.writeFileSync(this.dataPath, JSON.stringify(payload, null, 2));
    } catch (error) {
      console.error(`[QUOTA] 사용량 저장 실패: ${(error as Error).message}`);
    }
  }

  private clearEconomyForNewDay(): void {
    if (!this.resetEconomyOnNewDay || !this.economyMode || this.economyPinned) return;
    this.economyMode = false;
    console.log("[QUOTA] 이코노미 모드 해제 (새로운 날)");
    this.notifyEconomyChange(this.onEconomyCleared);
  }

  private notifyEconomyChange(hook: ((state: QuotaState) => void) | undefined): void {
    if (!hook) return;
    try {
      hook(this.snapshot());
    } catch (error) {
      console.error(`[QUOTA] 이코노미 모드 저장 실패: ${(error as Error).message}`);
    }
  }

  private today(): string {
    return this.now().toLocaleDateString("en-CA", { timeZone: this.timezone });
  }
}

function parseStoredUsage(raw: string): PersistedQuotaUsage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!parsed || typeof parsed !== "object") return null;
  const row = parsed as Partial<Record<keyof PersistedQuotaUsage, unknown>>;
  if (typeof row.date !== "string" || !row.date) return null;
  return {
    date: row.date,
    usage: clampInt(row.usage, 0, 100_000_000, 0),
    updatedAt: typeof row.updatedAt === "string" ? row.updatedAt : "",
  };
}

export function normalizeTimezone(raw: string | undefined): string {
  const value = String(raw || "").trim();
  if (value) {
    try {
      new Date().toLocaleDateString("en-CA", { timeZone: value });
      return value;
    } catch {
      console.warn(`[QUOTA] 알 수 없는 타임존 "${value}", 시스템 타임존 사용`);
    }
  }
  return Intl.DateTimeFormat().resolvedOptions().timeZone || "UTC";
}

function clampInt(value: unknown, min: number, max: number, fallback: number): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.floor(Math.min(max, Math.max(min, value)));
}
