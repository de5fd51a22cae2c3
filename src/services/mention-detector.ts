import { ChatMessage, MessageClassification } from "../types/chat.js";
import { countChars } from "../utils/text.js";

export const COMMAND_PREFIX = "!";
const REPLY_PREFIX = "@";
const LONG_NAME_THRESHOLD = 20;

export interface MentionRules {
  botName: string;
  botChannelName: string;
}

/**
 * 채팅 메시지 분류
 * 1. 봇 자신의 메시지 → self-echo (루프 방지)
 * 2. "@"로 시작 → 누군가에게 단 답글, 무시
 * 3. 봇 이름 포함 or "!" 명령 → 응답 대상
 */
export function classifyMessage(
  message: Pick<ChatMessage, "authorName" | "text">,
  rules: MentionRules
): MessageClassification {
  const channelName = rules.botChannelName.trim();
  if (channelName && message.authorName === channelName) {
    return { kind: "self-echo" };
  }

  const text = message.text;
  if (text.startsWith(REPLY_PREFIX)) {
    return { kind: "reply-to-bot" };
  }

  if (text.startsWith(COMMAND_PREFIX)) {
    return { kind: "trigger", query: text.slice(COMMAND_PREFIX.length).trim(), via: "command" };
  }

  const botName = rules.botName.trim().toLowerCase();
  if (botName && text.toLowerCase().includes(botName)) {
    return { kind: "trigger", query: text, via: "mention" };
  }

  return { kind: "ignored" };
}

// 답글용 짧은 이름: "Alice | Streamer" → "Alice", 20자 넘는 이름은 앞 두 단어
export function shortenDisplayName(displayName: string): string {
  if (displayName.includes("|")) {
    return displayName.split("|")[0].trim();
  }

  if (countChars(displayName) > LONG_NAME_THRESHOLD) {
    const parts = displayName.split(/\s+/).filter(Boolean);
    if (parts.length > 1) {
      return parts.slice(0, 2).join(" ");
    }
  }

  return displayName;
}

export function formatReply(authorName: string, answer: string): string {
  return `@${shortenDisplayName(authorName)} ${answer}`;
}
