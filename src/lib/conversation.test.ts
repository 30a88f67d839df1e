import { describe, it, expect, beforeEach } from "vitest";
import { ChatSession, askOnce, parseChatInput } from "./conversation.js";
import { RequestRejectedError } from "./errors.js";
import type { AnswerRequest, RetrievalService } from "./retrieval-service.js";

class ScriptedService implements RetrievalService {
  requests: AnswerRequest[] = [];
  answers: Array<string | Error> = [];

  async createIndex(): Promise<string> {
    return "vs_unused";
  }

  async uploadFile(): Promise<{ fileId: string }> {
    return { fileId: "file_unused" };
  }

  async answer(request: AnswerRequest): Promise<string> {
    this.requests.push({ ...request, conversation: [...request.conversation] });
    const next = this.answers.shift() ?? "ok";
    if (next instanceof Error) throw next;
    return next;
  }
}

describe("askOnce", () => {
  it("sends a single user turn with the index ids", async () => {
    const service = new ScriptedService();
    service.answers.push("It is blue.");

    const answer = await askOnce(
      { service, model: "gpt-4.1-mini", maxResults: 8, indexIds: ["vs_1", "vs_2"] },
      "What colour is the sky?"
    );

    expect(answer).toBe("It is blue.");
    expect(service.requests).toEqual([
      {
        model: "gpt-4.1-mini",
        conversation: [{ role: "user", content: "What colour is the sky?" }],
        indexIds: ["vs_1", "vs_2"],
        maxResults: 8,
      },
    ]);
  });
});

describe("ChatSession", () => {
  let service: ScriptedService;
  let session: ChatSession;

  beforeEach(() => {
    service = new ScriptedService();
    session = new ChatSession({ service, model: "gpt-4.1-mini", maxResults: 4, indexIds: ["vs_1"] });
  });

  it("carries earlier turns into later requests", async () => {
    service.answers.push("first answer", "second answer");

    await session.send("first question");
    await session.send("second question");

    expect(service.requests[1].conversation).toEqual([
      { role: "user", content: "first question" },
      { role: "assistant", content: "first answer" },
      { role: "user", content: "second question" },
    ]);
    expect(session.turns).toHaveLength(4);
  });

  it("leaves history unchanged when a turn fails", async () => {
    service.answers.push("first answer", new RequestRejectedError("answer", "bad request", 400), "third");

    await session.send("first question");
    await expect(session.send("broken question")).rejects.toBeInstanceOf(RequestRejectedError);
    expect(session.turns).toHaveLength(2);

    await session.send("retry");
    expect(service.requests[2].conversation).toEqual([
      { role: "user", content: "first question" },
      { role: "assistant", content: "first answer" },
      { role: "user", content: "retry" },
    ]);
  });

  it("clears history", async () => {
    await session.send("hello");
    session.clear();

    expect(session.turns).toEqual([]);
  });
});

describe("parseChatInput", () => {
  it("classifies input lines", () => {
    expect(parseChatInput("   ")).toEqual({ kind: "empty" });
    expect(parseChatInput("/exit")).toEqual({ kind: "exit" });
    expect(parseChatInput("/QUIT ")).toEqual({ kind: "exit" });
    expect(parseChatInput("/clear")).toEqual({ kind: "clear" });
    expect(parseChatInput("  what changed?  ")).toEqual({ kind: "message", text: "what changed?" });
  });
});
