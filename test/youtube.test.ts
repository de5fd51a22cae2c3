import test from "node:test";
import assert from "node:assert/strict";
import fs from "fs";
import os from "os";
import path from "path";
import { AuthError, ConfigError, PlatformError } from "../src/errors.js";
import { QuotaTracker } from "../src/services/quota-tracker.js";
import { StatsCollector } from "../src/services/session-stats.js";
import {
  ChatPoller,
  ChatPublisher,
  isChatEndedError,
  isQuotaExceededError,
  resolveLiveChatId,
} from "../src/services/youtube.js";
import { ChatPage, LiveChatApi, LiveChatLookup } from "../src/types/chat.js";

interface FakeApi extends LiveChatApi {
  requestedTokens: Array<string | undefined>;
  inserted: string[];
}

function createFakeApi(options: {
  pages?: Array<ChatPage | Error>;
  lookup?: LiveChatLookup | null | Error;
  insert?: () => Promise<string | null>;
}): FakeApi {
  const pages = [...(options.pages || [])];
  const api: FakeApi = {
    requestedTokens: [],
    inserted: [],
    async findLiveChat() {
      if (options.lookup instanceof Error) throw options.lookup;
      return options.lookup ?? null;
    },
    async listMessages(_liveChatId: string, pageToken?: string) {
      api.requestedTokens.push(pageToken);
      const next = pages.shift();
      if (next instanceof Error) throw next;
      return next ?? { messages: [], chatEnded: false };
    },
    async insertMessage(_liveChatId: string, text: string) {
      api.inserted.push(text);
      return options.insert ? options.insert() : `msg-${api.inserted.length}`;
    },
  };
  return api;
}

function apiError(message: string, reason: string): Error {
  return Object.assign(new Error(message), { errors: [{ reason }] });
}

function createHarness(): { quota: QuotaTracker; stats: StatsCollector; cleanup: () => void } {
  const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "livechat-youtube-"));
  const quota = new QuotaTracker({
    dailyBudget: 10_000,
    reserve: 1000,
    timezone: "UTC",
    dataPath: path.join(tempDir, "quota-usage.json"),
  });
  return {
    quota,
    stats: new StatsCollector(),
    cleanup: () => fs.rmSync(tempDir, { recursive: true, force: true }),
  };
}

test("chat poller threads the page token and keeps it when none is returned", async () => {
  const ctx = createHarness();
  try {
    const api = createFakeApi({
      pages: [
        { messages: [{ id: "m1", authorName: "Alice", text: "hi" }], nextPageToken: "p2", chatEnded: false },
        { messages: [], chatEnded: false },
        { messages: [], nextPageToken: "p3", chatEnded: false },
      ],
    });
    const poller = new ChatPoller(api, ctx.quota, ctx.stats);

    const first = await poller.poll("chat-1");
    assert.equal(first.messages.length, 1);
    await poller.poll("chat-1");
    await poller.poll("chat-1");

    assert.deepEqual(api.requestedTokens, [undefined, "p2", "p2"]);
    assert.equal(poller.cursor, "p3");
    assert.equal(ctx.quota.snapshot().usage, 15);
    assert.equal(ctx.stats.snapshot().apiCalls, 3);
  } finally {
    ctx.cleanup();
  }
});

test("chat poller returns an empty page on quota and transport errors", async () => {
  const ctx = createHarness();
  try {
    const api = createFakeApi({
      pages: [
        { messages: [], nextPageToken: "p2", chatEnded: false },
        apiError("The request cannot be completed because you have exceeded your quota.", "quotaExceeded"),
        new Error("socket hang up"),
      ],
    });
    const poller = new ChatPoller(api, ctx.quota, ctx.stats);

    await poller.poll("chat-1");
    assert.deepEqual(await poller.poll("chat-1"), { messages: [], chatEnded: false });
    assert.deepEqual(await poller.poll("chat-1"), { messages: [], chatEnded: false });
    assert.equal(poller.cursor, "p2");
    assert.equal(ctx.stats.snapshot().errors, 0);
  } finally {
    ctx.cleanup();
  }
});

test("chat poller reports an ended chat", async () => {
  const ctx = createHarness();
  try {
    const api = createFakeApi({ pages: [apiError("The live chat is no longer live.", "liveChatEnded")] });
    const poller = new ChatPoller(api, ctx.quota, ctx.stats);
    assert.deepEqual(await poller.poll("chat-1"), { messages: [], chatEnded: true });
  } finally {
    ctx.cleanup();
  }
});

test("youtube error helpers read reasons from both error shapes", () => {
  assert.equal(isQuotaExceededError(apiError("limit", "quotaExceeded")), true);
  assert.equal(
    isQuotaExceededError({ response: { data: { error: { errors: [{ reason: "dailyLimitExceeded" }] } } } }),
    true
  );
  assert.equal(isQuotaExceededError(new Error("Daily quota exhausted")), true);
  assert.equal(isQuotaExceededError(new Error("socket hang up")), false);
  assert.equal(isChatEndedError(apiError("gone", "liveChatNotFound")), true);
  assert.equal(isChatEndedError(new Error("socket hang up")), false);
});

test("chat publisher truncates to the chat limit and charges the insert cost", async () => {
  const ctx = createHarness();
  try {
    const api = createFakeApi({});
    const publisher = new ChatPublisher(api, "chat-1", ctx.quota, ctx.stats);

    const messageId = await publisher.publish(`@Alice ${"x".repeat(250)}`);
    assert.equal(messageId, "msg-1");
    assert.equal(api.inserted[0].length, 200);
    assert.equal(api.inserted[0], `@Alice ${"x".repeat(190)}...`);
    assert.equal(ctx.quota.snapshot().usage, 50);
    assert.equal(ctx.stats.snapshot().apiCalls, 1);
  } finally {
    ctx.cleanup();
  }
});

test("chat publisher in dry-run mode sends nothing and spends no quota", async () => {
  const ctx = createHarness();
  try {
    const api = createFakeApi({});
    const publisher = new ChatPublisher(api, "chat-1", ctx.quota, ctx.stats, { dryRun: true });

    assert.equal(await publisher.publish("hello"), "dry-run-1");
    assert.equal(await publisher.publish("again"), "dry-run-2");
    assert.deepEqual(api.inserted, []);
    assert.equal(ctx.quota.snapshot().usage, 0);
    assert.equal(ctx.stats.snapshot().apiCalls, 0);
  } finally {
    ctx.cleanup();
  }
});

test("chat publisher counts failed and id-less sends as errors", async () => {
  const ctx = createHarness();
  try {
    const outcomes: Array<() => Promise<string | null>> = [
      async () => {
        throw apiError("quota", "quotaExceeded");
      },
      async () => null,
    ];
    const api = createFakeApi({
      insert: () => {
        const next = outcomes.shift();
        return next ? next() : Promise.resolve("msg-ok");
      },
    });
    const publisher = new ChatPublisher(api, "chat-1", ctx.quota, ctx.stats);

    assert.equal(await publisher.publish("one"), null);
    assert.equal(await publisher.publish("two"), null);
    assert.equal(await publisher.publish("three"), "msg-ok");
    assert.equal(ctx.stats.snapshot().errors, 2);
    assert.equal(ctx.quota.snapshot().usage, 150);
  } finally {
    ctx.cleanup();
  }
});

test("resolveLiveChatId returns the active chat id and charges one unit", async () => {
  const ctx = createHarness();
  try {
    const api = createFakeApi({ lookup: { liveChatId: "chat-1", title: "Launch stream", isLive: true } });
    assert.equal(await resolveLiveChatId(api, "video-1", ctx.quota), "chat-1");
    assert.equal(ctx.quota.snapshot().usage, 1);
  } finally {
    ctx.cleanup();
  }
});

test("resolveLiveChatId classifies lookup failures", async () => {
  const ctx = createHarness();
  try {
    await assert.rejects(resolveLiveChatId(createFakeApi({ lookup: null }), "video-1", ctx.quota), ConfigError);
    await assert.rejects(
      resolveLiveChatId(
        createFakeApi({ lookup: { liveChatId: null, title: "VOD", isLive: false } }),
        "video-1",
        ctx.quota
      ),
      ConfigError
    );
    await assert.rejects(
      resolveLiveChatId(
        createFakeApi({ lookup: { liveChatId: null, title: "Chat off", isLive: true } }),
        "video-1",
        ctx.quota
      ),
      ConfigError
    );
    await assert.rejects(
      resolveLiveChatId(createFakeApi({ lookup: apiError("limit", "quotaExceeded") }), "video-1", ctx.quota),
      PlatformError
    );
    await assert.rejects(
      resolveLiveChatId(createFakeApi({ lookup: new Error("invalid_grant") }), "video-1", ctx.quota),
      AuthError
    );
  } finally {
    ctx.cleanup();
  }
});
