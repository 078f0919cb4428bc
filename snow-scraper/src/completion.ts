import axios from "axios";

export const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";

export type CompletionRequest = {
  system: string;
  user: string;
};

export interface CompletionClient {
  /** Resolves with the model's JSON text; rejects when the backend cannot be reached or refuses. */
  complete(request: CompletionRequest): Promise<string>;
}

export type OpenAiClientOptions = {
  apiKey: string;
  model: string;
  baseUrl?: string;
  timeoutMs?: number;
};

type ChatCompletionResponse = {
  choices?: { message?: { content?: string | null } }[];
};

export function createOpenAiClient({
  apiKey,
  model,
  baseUrl = DEFAULT_OPENAI_BASE_URL,
  timeoutMs = 60000,
}: OpenAiClientOptions): CompletionClient {
  const http = axios.create({
    baseURL: baseUrl.replace(/\/$/, ""),
    headers: {
      Authorization: `Bearer ${apiKey}`,
      "Content-Type": "application/json",
    },
    timeout: timeoutMs,
  });

  return {
    async complete({ system, user }) {
      const res = await http.post<ChatCompletionResponse>("/chat/completions", {
        model,
        messages: [
          { role: "system", content: system },
          { role: "user", content: user },
        ],
        response_format: { type: "json_object" },
      });
      return res.data.choices?.[0]?.message?.content ?? "";
    },
  };
}
