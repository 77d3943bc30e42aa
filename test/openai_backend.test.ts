import { describe, expect, it } from "vitest";
import type { BackendRequest } from "../src/pipeline/backend.js";
import { MalformedOutput } from "../src/pipeline/errors.js";
import { imageDataUri } from "../src/pipeline/image.js";
import { fromChatCompletion, toChatMessages, toChatTools } from "../src/pipeline/openai_backend.js";
import { WEB_SEARCH_DECLARATION } from "../src/pipeline/search_tool.js";
import { testImage } from "./fixtures.js";

function request(overrides: Partial<BackendRequest> = {}): BackendRequest {
  return {
    role: "investigator",
    instructions: "You are a test.",
    prompt: "Find things.",
    signal: new AbortController().signal,
    ...overrides
  };
}

describe("OpenAI request mapping", () => {
  it("sends instructions as the system message and the prompt as the user message", () => {
    expect(toChatMessages(request())).toEqual([
      { role: "system", content: "You are a test." },
      { role: "user", content: "Find things." }
    ]);
  });

  it("puts the image before the prompt text", () => {
    const image = testImage();
    const [, user] = toChatMessages(request({ role: "visionary", image }));
    expect(user).toEqual({
      role: "user",
      content: [
        { type: "image_url", image_url: { url: imageDataUri(image) } },
        { type: "text", text: "Find things." }
      ]
    });
  });

  it("replays tool rounds as assistant tool calls followed by tool results", () => {
    const messages = toChatMessages(
      request({
        toolRounds: [
          {
            assistantText: "",
            calls: [{ id: "c1", name: "web_search", arguments: '{"query":"Old Mill"}' }],
            results: [{ callId: "c1", name: "web_search", output: "No results." }]
          }
        ]
      })
    );

    expect(messages.slice(2)).toEqual([
      {
        role: "assistant",
        content: null,
        tool_calls: [{ id: "c1", type: "function", function: { name: "web_search", arguments: '{"query":"Old Mill"}' } }]
      },
      { role: "tool", tool_call_id: "c1", content: "No results." }
    ]);
  });

  it("declares tools only when the request carries some", () => {
    expect(toChatTools(request())).toBeUndefined();
    expect(toChatTools(request({ tools: [] }))).toBeUndefined();
    expect(toChatTools(request({ tools: [WEB_SEARCH_DECLARATION] }))).toEqual([
      {
        type: "function",
        function: {
          name: "web_search",
          description: WEB_SEARCH_DECLARATION.description,
          parameters: WEB_SEARCH_DECLARATION.parameters
        }
      }
    ]);
  });
});

describe("OpenAI response mapping", () => {
  it("reads text, function tool calls and usage", () => {
    const response = fromChatCompletion({
      model: "gpt-4o",
      choices: [
        {
          message: {
            content: null,
            tool_calls: [
              { id: "c1", type: "function", function: { name: "web_search", arguments: '{"query":"x y"}' } },
              { id: "c2", type: "custom" }
            ]
          }
        }
      ],
      usage: { prompt_tokens: 12, completion_tokens: 3 }
    });

    expect(response).toEqual({
      text: "",
      toolCalls: [{ id: "c1", name: "web_search", arguments: '{"query":"x y"}' }],
      model: "gpt-4o",
      usage: { inputTokens: 12, outputTokens: 3 }
    });
  });

  it("fails on an empty choice list", () => {
    expect(() => fromChatCompletion({ model: "gpt-4o", choices: [], usage: null })).toThrow(
      new MalformedOutput("Backend returned no choices")
    );
  });
});
