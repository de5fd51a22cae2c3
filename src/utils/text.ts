export const DEFAULT_MAX_MESSAGE_LENGTH = 200;
const ELLIPSIS = "...";

// 채팅 길이 제한 (코드 포인트 기준): 넘으면 정확히 limit 글자로 자르고 끝 3자를 "..."로
export function truncateForChat(text: string, limit: number = DEFAULT_MAX_MESSAGE_LENGTH): string {
  const max = Math.max(ELLIPSIS.length + 1, Math.floor(limit));
  const chars = Array.from(text);
  if (chars.length <= max) return text;
  return chars.slice(0, max - ELLIPSIS.length).join("") + ELLIPSIS;
}

// 이모지 같은 서로게이트 쌍도 한 글자로 센다
export function countChars(text: string): number {
  return Array.from(text).length;
}

/**
 * AbortSignal이 오면 즉시 깨어나는 sleep
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;
