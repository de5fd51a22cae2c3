export interface ChatMessage {
  readonly id: string;
  readonly authorName: string;
  readonly text: string;
}

export interface ChatPage {
  messages: ChatMessage[];
  nextPageToken?: string;
  // 플랫폼 권장 간격 (참고용)
  pollingIntervalMs?: number;
  chatEnded: boolean;
}

export interface LiveChatLookup {
  liveChatId: string | null;
  title: string;
  isLive: boolean;
}

/**
 * 플랫폼 클라이언트 경계. 테스트에서는 fake 구현을 넣는다.
 */
export interface LiveChatApi {
  findLiveChat(videoId: string): Promise<LiveChatLookup | null>;
  listMessages(liveChatId: string, pageToken?: string): Promise<ChatPage>;
  insertMessage(liveChatId: string, text: string): Promise<string | null>;
}

export type MessageClassification =
  | { kind: "self-echo" }
  | { kind: "reply-to-bot" }
  | { kind: "trigger"; query: string; via: "command" | "mention" }
  | { kind: "ignored" };

export interface SessionStats {
  messagesReceived: number;
  messagesResponded: number;
  apiCalls: number;
  errors: number;
  startedAt: Date | null;
  endedAt: Date | null;
}
