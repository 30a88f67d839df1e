import type { ConversationTurn, RetrievalService } from "./retrieval-service.js";

export interface ConversationOptions {
  service: RetrievalService;
  model: string;
  maxResults: number;
  indexIds: string[];
}

/**
 * Single-turn question against one or more indexes.
 */
export async function askOnce(options: ConversationOptions, question: string): Promise<string> {
  return options.service.answer({
    model: options.model,
    conversation: [{ role: "user", content: question }],
    indexIds: options.indexIds,
    maxResults: options.maxResults,
  });
}

/**
 * Interactive session. History lives in memory only and is gone when the
 * process exits.
 */
export class ChatSession {
  private history: ConversationTurn[] = [];

  constructor(private readonly options: ConversationOptions) {}

  get turns(): readonly ConversationTurn[] {
    return this.history;
  }

  /**
   * Sends the accumulated history plus the new message. History only grows
   * once the answer arrives, so a failed turn leaves it unchanged.
   */
  async send(message: string): Promise<string> {
    const userTurn: ConversationTurn = { role: "user", content: message };
    const answer = await this.options.service.answer({
      model: this.options.model,
      conversation: [...this.history, userTurn],
      indexIds: this.options.indexIds,
      maxResults: this.options.maxResults,
    });
    this.history.push(userTurn, { role: "assistant", content: answer });
    return answer;
  }

  clear(): void {
    this.history = [];
  }
}

export type ChatInput =
  | { kind: "empty" }
  | { kind: "exit" }
  | { kind: "clear" }
  | { kind: "message"; text: string };

const EXIT_COMMANDS = ["/exit", "/quit"];

export function parseChatInput(line: string): ChatInput {
  const text = line.trim();
  if (!text) return { kind: "empty" };
  const lower = text.toLowerCase();
  if (EXIT_COMMANDS.includes(lower)) return { kind: "exit" };
  if (lower === "/clear") return { kind: "clear" };
  return { kind: "message", text };
}
