import { google, youtube_v3 } from "googleapis";
import { AuthError, ConfigError, PlatformError, describeError } from "../errors.js";
import { ChatMessage, ChatPage, LiveChatApi, LiveChatLookup } from "../types/chat.js";
import { DEFAULT_MAX_MESSAGE_LENGTH, truncateForChat } from "../utils/text.js";
import { QuotaTracker } from "./quota-tracker.js";
import { StatsCollector } from "./session-stats.js";

// YouTube Data API v3 쿼터 비용 (units)
export const QUOTA_COST = {
  videosList: 1,
  liveChatList: 5,
  liveChatInsert: 50,
} as const;

const QUOTA_REASONS = ["quotaexceeded", "dailylimitexceeded"];
const CHAT_ENDED_REASONS = ["livechatended", "livechatnotfound", "livechatdisabled"];

export interface YouTubeCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

// YouTube 클라이언트 초기화 (refresh token 기반 OAuth2)
export function initYouTubeClient(credentials: YouTubeCredentials): youtube_v3.Youtube {
  const auth = new google.auth.OAuth2(credentials.clientId, credentials.clientSecret);
  auth.setCredentials({ refresh_token: credentials.refreshToken });
  return google.youtube({ version: "v3", auth });
}

/**
 * googleapis 클라이언트를 LiveChatApi로 감싼다.
 */
export function createYouTubeLiveChatApi(youtube: youtube_v3.Youtube): LiveChatApi {
  return {
    async findLiveChat(videoId: string): Promise<LiveChatLookup | null> {
      const response = await youtube.videos.list({
        part: ["liveStreamingDetails", "snippet"],
        id: [videoId],
      });
      const video = response.data.items?.[0];
      if (!video) return null;
      return {
        liveChatId: video.liveStreamingDetails?.activeLiveChatId || null,
        title: video.snippet?.title || "(untitled)",
        isLive: Boolean(video.liveStreamingDetails),
      };
    },

    async listMessages(liveChatId: string, pageToken?: string): Promise<ChatPage> {
      const response = await youtube.liveChatMessages.list({
        liveChatId,
        part: ["snippet", "authorDetails"],
        pageToken,
      });
      const messages: ChatMessage[] = [];
      for (const item of response.data.items || []) {
        if (!item.id) continue;
        messages.push({
          id: item.id,
          authorName: item.authorDetails?.displayName || "",
          text: item.snippet?.displayMessage || "",
        });
      }
      return {
        messages,
        nextPageToken: response.data.nextPageToken || undefined,
        pollingIntervalMs: response.data.pollingIntervalMillis ?? undefined,
        chatEnded: false,
      };
    },

    async insertMessage(liveChatId: string, text: string): Promise<string | null> {
      const response = await youtube.liveChatMessages.insert({
        part: ["snippet"],
        requestBody: {
          snippet: {
            liveChatId,
            type: "textMessageEvent",
            textMessageDetails: { messageText: text },
          },
        },
      });
      return response.data.id || null;
    },
  };
}

function readReasons(rows: unknown): string[] {
  if (!Array.isArray(rows)) return [];
  return rows
    .map((row: unknown) =>
      row && typeof row === "object" && "reason" in row ? String(row.reason || "").toLowerCase() : ""
    )
    .filter(Boolean);
}

// GaxiosError는 errors[]와 response.data.error.errors[] 양쪽에 reason을 담는다
function collectErrorReasons(error: unknown): string[] {
  if (!error || typeof error !== "object") return [];
  const direct = "errors" in error ? readReasons(error.errors) : [];
  const response = "response" in error ? error.response : undefined;
  const data = response && typeof response === "object" && "data" in response ? response.data : undefined;
  const body = data && typeof data === "object" && "error" in data ? data.error : undefined;
  const nested = body && typeof body === "object" && "errors" in body ? readReasons(body.errors) : [];
  return [...direct, ...nested];
}

export function isQuotaExceededError(error: unknown): boolean {
  const reasons = collectErrorReasons(error);
  if (reasons.some((reason) => QUOTA_REASONS.includes(reason))) return true;
  return describeError(error).toLowerCase().includes("quota");
}

export function isChatEndedError(error: unknown): boolean {
  return collectErrorReasons(error).some((reason) => CHAT_ENDED_REASONS.includes(reason));
}

/**
 * 영상 ID로 활성 라이브 채팅 ID 조회 (1 unit)
 */
export async function resolveLiveChatId(
  api: LiveChatApi,
  videoId: string,
  quota: QuotaTracker
): Promise<string> {
  console.log(`[YOUTUBE] 영상 조회 중: ${videoId}`);
  quota.recordUsage(QUOTA_COST.videosList);

  let lookup: LiveChatLookup | null;
  try {
    lookup = await api.findLiveChat(videoId);
  } catch (error) {
    if (isQuotaExceededError(error)) {
      throw new PlatformError("YouTube API 쿼터 초과로 채팅 ID 조회 실패", { cause: error });
    }
    throw new AuthError(`채팅 ID 조회 실패: ${describeError(error)}`, { cause: error });
  }

  if (!lookup) {
    throw new ConfigError(`영상을 찾을 수 없음: ${videoId}`);
  }
  console.log(`[YOUTUBE] 영상 확인: ${lookup.title}`);
  if (!lookup.isLive) {
    throw new ConfigError("라이브 방송이 아닌 영상입니다");
  }
  if (!lookup.liveChatId) {
    throw new ConfigError("이 영상은 라이브 채팅을 사용할 수 없습니다");
  }
  console.log(`[YOUTUBE] 라이브 채팅 ID: ${lookup.liveChatId}`);
  return lookup.liveChatId;
}

export class ChatPoller {
  private readonly api: LiveChatApi;
  private readonly quota: QuotaTracker;
  private readonly stats: StatsCollector;
  private pageToken: string | undefined;

  constructor(api: LiveChatApi, quota: QuotaTracker, stats: StatsCollector) {
    this.api = api;
    this.quota = quota;
    this.stats = stats;
  }

  get cursor(): string | undefined {
    return this.pageToken;
  }

  /**
   * 저장된 커서로 다음 페이지를 가져온다.
   * 토큰이 없는 응답은 커서를 유지 (처음부터 다시 읽지 않음)
   */
  async poll(liveChatId: string): Promise<ChatPage> {
    const page = await this.fetchPage(liveChatId, this.pageToken);
    if (page.nextPageToken) {
      this.pageToken = page.nextPageToken;
    }
    return page;
  }

  async fetchPage(liveChatId: string, pageToken?: string): Promise<ChatPage> {
    this.quota.recordUsage(QUOTA_COST.liveChatList);
    this.stats.recordApiCall();

    try {
      return await this.api.listMessages(liveChatId, pageToken);
    } catch (error) {
      if (isChatEndedError(error)) {
        console.error("[CHAT] 라이브 채팅 종료됨");
        return { messages: [], chatEnded: true };
      }
      if (isQuotaExceededError(error)) {
        console.error("[CHAT] 쿼터 오류: YouTube API 일일 쿼터 초과!");
        console.log("[CHAT] 내일까지 기다리거나 console.cloud.google.com에서 쿼터 증가 요청");
        return { messages: [], chatEnded: false };
      }
      console.error(`[CHAT] 메시지 조회 실패: ${describeError(error)}`);
      return { messages: [], chatEnded: false };
    }
  }
}

export interface ChatPublisherOptions {
  maxMessageLength?: number;
  dryRun?: boolean;
}

export class ChatPublisher {
  private readonly api: LiveChatApi;
  private readonly liveChatId: string;
  private readonly quota: QuotaTracker;
  private readonly stats: StatsCollector;
  private readonly maxMessageLength: number;
  private readonly dryRun: boolean;
  private dryRunCount = 0;

  constructor(
    api: LiveChatApi,
    liveChatId: string,
    quota: QuotaTracker,
    stats: StatsCollector,
    options: ChatPublisherOptions = {}
  ) {
    this.api = api;
    this.liveChatId = liveChatId;
    this.quota = quota;
    this.stats = stats;
    this.maxMessageLength = options.maxMessageLength ?? DEFAULT_MAX_MESSAGE_LENGTH;
    this.dryRun = options.dryRun === true;
  }

  async publish(text: string): Promise<string | null> {
    const message = truncateForChat(text, this.maxMessageLength);

    if (this.dryRun) {
      this.dryRunCount += 1;
      console.log(`🧪 [테스트] 채팅 전송 시뮬레이션: ${message}`);
      return `dry-run-${this.dryRunCount}`;
    }

    this.quota.recordUsage(QUOTA_COST.liveChatInsert);
    this.stats.recordApiCall();

    try {
      const messageId = await this.api.insertMessage(this.liveChatId, message);
      if (!messageId) {
        console.error("[CHAT] 전송 응답에 메시지 ID 없음");
        this.stats.recordError();
        return null;
      }
      return messageId;
    } catch (error) {
      if (isQuotaExceededError(error)) {
        console.error("[CHAT] 쿼터 오류: 메시지 전송 불가 (YouTube API 일일 쿼터 초과)");
      } else {
        console.error(`[CHAT] 메시지 전송 실패: ${describeError(error)}`);
      }
      this.stats.recordError();
      return null;
    }
  }
}
