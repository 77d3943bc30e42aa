import OpenAI from "openai";
import type { Backend, BackendRequest, BackendResponse, ToolCallRequest } from "./backend.js";
import { BackendUnavailable, MalformedOutput, RunCancelled } from "./errors.js";
import { imageDataUri } from "./image.js";

type ChatMessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ChatTool = OpenAI.Chat.Completions.ChatCompletionTool;

/** The subset of a chat completion this backend reads. */
export type CompletionLike = {
  model: string;
  choices: Array<{
    message: {
      content: string | null;
      tool_calls?: Array<{ id: string; type: string; function?: { name: string; arguments: string } }>;
    };
  }>;
  usage?: { prompt_tokens: number; completion_tokens: number } | null;
};

export function toChatMessages(request: BackendRequest): ChatMessageParam[] {
  const messages: ChatMessageParam[] = [{ role: "system", content: request.instructions }];

  if (request.image) {
    messages.push({
      role: "user",
      content: [
        { type: "image_url", image_url: { url: imageDataUri(request.image) } },
        { type: "text", text: request.prompt }
      ]
    });
  } else {
    messages.push({ role: "user", content: request.prompt });
  }

  for (const round of request.toolRounds ?? []) {
    messages.push({
      role: "assistant",
      content: round.assistantText.length > 0 ? round.assistantText : null,
      tool_calls: round.calls.map((call) => ({
        id: call.id,
        type: "function" as const,
        function: { name: call.name, arguments: call.arguments }
      }))
    });
    for (const result of round.results) {
      messages.push({ role: "tool", tool_call_id: result.callId, content: result.output });
    }
  }

  return messages;
}

export function toChatTools(request: BackendRequest): ChatTool[] | undefined {
  if (!request.tools || request.tools.length === 0) return undefined;
  return request.tools.map((tool) => ({
    type: "function" as const,
    function: { name: tool.name, description: tool.description, parameters: tool.parameters }
  }));
}

export function fromChatCompletion(completion: CompletionLike): BackendResponse {
  const choice = completion.choices[0];
  if (!choice) throw new MalformedOutput("Backend returned no choices");

  const toolCalls: ToolCallRequest[] = [];
  for (const call of choice.message.tool_calls ?? []) {
    if (call.type !== "function" || !call.function) continue;
    toolCalls.push({ id: call.id, name: call.function.name, arguments: call.function.arguments });
  }

  return {
    text: choice.message.content ?? "",
    toolCalls,
    model: completion.model,
    usage: completion.usage
      ? { inputTokens: completion.usage.prompt_tokens, outputTokens: completion.usage.completion_tokens }
      : undefined
  };
}

export class OpenAIBackend implements Backend {
  readonly name = "openai";
  private readonly client: OpenAI;

  constructor(
    clientOrKey: OpenAI | string,
    private readonly model: string,
    private readonly temperature: number
  ) {
    // Retries belong to the caller, never to the backend client.
    this.client = typeof clientOrKey === "string" ? new OpenAI({ apiKey: clientOrKey, maxRetries: 0 }) : clientOrKey;
  }

  async generate(request: BackendRequest): Promise<BackendResponse> {
    const tools = toChatTools(request);
    const body: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: toChatMessages(request),
      temperature: this.temperature
    };
    if (tools) body.tools = tools;

    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(body, { signal: request.signal });
    } catch (err) {
      if (request.signal.aborted) throw new RunCancelled();
      const status = err instanceof OpenAI.APIError && err.status !== undefined ? ` (${err.status})` : "";
      const msg = err instanceof Error ? err.message : String(err);
      throw new BackendUnavailable(`OpenAI request failed${status}: ${msg}`, { cause: err });
    }

    return fromChatCompletion(completion);
  }
}
