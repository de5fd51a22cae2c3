import { randomUUID } from "crypto";
import Anthropic from "@anthropic-ai/sdk";
import OpenAI from "openai";
import { AssistantRuntimeSettings } from "../types/runtime.js";
import { AssistantBackend, AssistantRun, AssistantTurn, RunStatus } from "./assistant.js";

export const CLAUDE_MODEL = "claude-sonnet-4-5-20250929";
const CLAUDE_MAX_TOKENS = 300;
const CLAUDE_MAX_THREADS = 50;

type OpenAIRun = Awaited<ReturnType<OpenAI["beta"]["threads"]["runs"]["retrieve"]>>;

// OpenAI Assistants API (beta.threads)
export class OpenAIAssistantBackend implements AssistantBackend {
  readonly provider = "openai" as const;
  private readonly client: OpenAI;
  private readonly assistantId: string;

  constructor(client: OpenAI, assistantId: string) {
    this.client = client;
    this.assistantId = assistantId;
  }

  async describe(): Promise<string> {
    const assistant = await this.client.beta.assistants.retrieve(this.assistantId);
    return assistant.name || assistant.id;
  }

  async createThread(): Promise<string> {
    const thread = await this.client.beta.threads.create();
    return thread.id;
  }

  async addUserMessage(threadId: string, text: string): Promise<void> {
    await this.client.beta.threads.messages.create(threadId, { role: "user", content: text });
  }

  async createRun(threadId: string): Promise<AssistantRun> {
    const run = await this.client.beta.threads.runs.create(threadId, { assistant_id: this.assistantId });
    return toAssistantRun(run);
  }

  async retrieveRun(threadId: string, runId: string): Promise<AssistantRun> {
    const run = await this.client.beta.threads.runs.retrieve(threadId, runId);
    return toAssistantRun(run);
  }

  async listMessages(threadId: string): Promise<AssistantTurn[]> {
    const page = await this.client.beta.threads.messages.list(threadId, { order: "desc" });
    return page.data.map((message) => ({
      role: message.role,
      text: extractOpenAIText(message.content),
    }));
  }

  async cancelRun(threadId: string, runId: string): Promise<void> {
    await this.client.beta.threads.runs.cancel(threadId, runId);
  }
}

function toAssistantRun(run: OpenAIRun): AssistantRun {
  return {
    id: run.id,
    status: normalizeRunStatus(run.status),
    lastError: run.last_error ? `${run.last_error.code}: ${run.last_error.message}` : null,
  };
}

/**
 * 공급자 상태값을 5가지로 축약. 취소/미완료/도구 호출 대기는 실패로 본다.
 */
export function normalizeRunStatus(raw: string): RunStatus {
  switch (raw) {
    case "queued":
    case "in_progress":
    case "completed":
    case "failed":
    case "expired":
      return raw;
    default:
      return "failed";
  }
}

export interface OpenAITextLikeBlock {
  type: string;
  text?: { value: string };
}

export function extractOpenAIText(content: OpenAITextLikeBlock[]): string {
  return content
    .map((block) => (block.type === "text" && block.text ? block.text.value : ""))
    .join("");
}

export interface ClaudeTextLikeBlock {
  type: string;
  text?: string;
}

export interface ClaudeMessageRequest {
  system?: string;
  messages: Array<{ role: "user" | "assistant"; content: string }>;
}

export type ClaudeCompletionFn = (
  request: ClaudeMessageRequest,
  signal: AbortSignal
) => Promise<ClaudeTextLikeBlock[]>;

export function extractTextFromClaude(content: ClaudeTextLikeBlock[]): string {
  const textBlock = content.find((block) => block.type === "text");
  if (!textBlock || typeof textBlock.text !== "string") {
    return "";
  }
  return textBlock.text;
}

interface ClaudeRunState {
  status: RunStatus;
  lastError: string | null;
  controller: AbortController;
  settled: Promise<void>;
}

interface ClaudeThread {
  turns: AssistantTurn[];
  runs: Map<string, ClaudeRunState>;
}

/**
 * Claude messages API를 run 방식으로 감싼 백엔드
 *
 * thread는 메모리 내 대화 목록, run은 진행 중인 messages.create 요청.
 * 요청이 끝나기 전까지 in_progress로 보고된다.
 */
export class ClaudeRunBackend implements AssistantBackend {
  readonly provider = "claude" as const;
  private readonly complete: ClaudeCompletionFn;
  private readonly model: string;
  private readonly instructions: string;
  private readonly threads = new Map<string, ClaudeThread>();

  constructor(complete: ClaudeCompletionFn, options: { model?: string; instructions?: string } = {}) {
    this.complete = complete;
    this.model = options.model || CLAUDE_MODEL;
    this.instructions = options.instructions || "";
  }

  async describe(): Promise<string> {
    return `Claude (${this.model})`;
  }

  async createThread(): Promise<string> {
    const threadId = `thread_${randomUUID()}`;
    this.threads.set(threadId, { turns: [], runs: new Map() });
    this.compactThreads();
    return threadId;
  }

  async addUserMessage(threadId: string, text: string): Promise<void> {
    this.getThread(threadId).turns.push({ role: "user", text });
  }

  async createRun(threadId: string): Promise<AssistantRun> {
    const thread = this.getThread(threadId);
    const runId = `run_${randomUUID()}`;
    const controller = new AbortController();
    const request: ClaudeMessageRequest = {
      ...(this.instructions ? { system: this.instructions } : {}),
      messages: thread.turns.map((turn) => ({ role: turn.role, content: turn.text })),
    };

    const state: ClaudeRunState = {
      status: "in_progress",
      lastError: null,
      controller,
      settled: Promise.resolve(),
    };
    state.settled = this.complete(request, controller.signal).then(
      (content) => {
        if (state.status !== "in_progress") return;
        const text = extractTextFromClaude(content).trim();
        if (text) {
          thread.turns.push({ role: "assistant", text });
        }
        state.status = "completed";
      },
      (error: unknown) => {
        if (state.status !== "in_progress") return;
        state.status = "failed";
        state.lastError = error instanceof Error ? error.message : String(error);
      }
    );
    thread.runs.set(runId, state);

    return { id: runId, status: state.status, lastError: null };
  }

  async retrieveRun(threadId: string, runId: string): Promise<AssistantRun> {
    const state = this.getThread(threadId).runs.get(runId);
    if (!state) {
      throw new Error(`unknown run ${runId}`);
    }
    return { id: runId, status: state.status, lastError: state.lastError };
  }

  async listMessages(threadId: string): Promise<AssistantTurn[]> {
    return [...this.getThread(threadId).turns].reverse();
  }

  async cancelRun(threadId: string, runId: string): Promise<void> {
    const state = this.getThread(threadId).runs.get(runId);
    if (!state || state.status !== "in_progress") return;
    state.status = "failed";
    state.lastError = "cancelled";
    state.controller.abort();
    await state.settled;
  }

  private getThread(threadId: string): ClaudeThread {
    const thread = this.threads.get(threadId);
    if (!thread) {
      throw new Error(`unknown thread ${threadId}`);
    }
    return thread;
  }

  private compactThreads(): void {
    for (const threadId of this.threads.keys()) {
      if (this.threads.size <= CLAUDE_MAX_THREADS) break;
      this.threads.delete(threadId);
    }
  }
}

export function createAssistantBackend(
  settings: AssistantRuntimeSettings,
  credentials: { assistantId: string; openaiApiKey?: string; anthropicApiKey?: string }
): AssistantBackend {
  if (settings.provider === "claude") {
    const claude = new Anthropic({ apiKey: credentials.anthropicApiKey });
    const model = settings.claudeModel || CLAUDE_MODEL;
    return new ClaudeRunBackend(
      async (request, signal) => {
        const message = await claude.messages.create(
          {
            model,
            max_tokens: CLAUDE_MAX_TOKENS,
            system: request.system,
            messages: request.messages,
          },
          { signal }
        );
        return message.content;
      },
      { model, instructions: settings.instructions }
    );
  }

  const openai = new OpenAI({ apiKey: credentials.openaiApiKey });
  return new OpenAIAssistantBackend(openai, credentials.assistantId);
}
