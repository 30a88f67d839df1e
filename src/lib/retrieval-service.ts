/**
 * Boundary to the remote retrieval service (OpenAI vector stores plus the
 * Responses API with the file_search tool).
 */

import { createReadStream } from "node:fs";
import OpenAI from "openai";
import { RequestRejectedError } from "./errors.js";

export type ConversationRole = "user" | "assistant";

export interface ConversationTurn {
  role: ConversationRole;
  content: string;
}

export interface AnswerRequest {
  model: string;
  conversation: ConversationTurn[];
  indexIds: string[];
  maxResults: number;
}

export interface RetrievalService {
  /** Creates an empty remote index and returns its id. */
  createIndex(displayName: string): Promise<string>;
  /** Uploads one file into an index; returns the remote file id. */
  uploadFile(indexId: string, path: string): Promise<{ fileId: string }>;
  answer(request: AnswerRequest): Promise<string>;
}

/**
 * Client errors (4xx) are the service saying no; everything else is
 * passed through untouched.
 */
export function toServiceError(operation: string, error: unknown): unknown {
  if (error instanceof OpenAI.APIError && typeof error.status === "number" && error.status >= 400 && error.status < 500) {
    return new RequestRejectedError(operation, error.message, error.status);
  }
  return error;
}

export class OpenAIRetrievalService implements RetrievalService {
  private client: OpenAI;

  constructor(apiKey: string) {
    this.client = new OpenAI({ apiKey });
  }

  async createIndex(displayName: string): Promise<string> {
    try {
      const store = await this.client.vectorStores.create({ name: displayName });
      return store.id;
    } catch (error) {
      throw toServiceError("index creation", error);
    }
  }

  async uploadFile(indexId: string, path: string): Promise<{ fileId: string }> {
    const file = await this.client.vectorStores.files
      .uploadAndPoll(indexId, createReadStream(path))
      .catch((error: unknown) => {
        throw toServiceError("upload", error);
      });
    if (file.status === "failed") {
      throw new RequestRejectedError("upload", file.last_error?.message ?? "file processing failed");
    }
    return { fileId: file.id };
  }

  async answer(request: AnswerRequest): Promise<string> {
    const [first] = request.conversation;
    // A single user turn goes as plain text
    const input =
      request.conversation.length === 1 && first.role === "user"
        ? first.content
        : request.conversation.map((turn) => ({ role: turn.role, content: turn.content }));

    try {
      const response = await this.client.responses.create({
        model: request.model,
        input,
        tools: [
          {
            type: "file_search",
            vector_store_ids: request.indexIds,
            max_num_results: request.maxResults,
          },
        ],
      });
      return response.output_text;
    } catch (error) {
      throw toServiceError("answer", error);
    }
  }
}
