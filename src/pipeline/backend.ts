import type { DecodedImage } from "./image.js";
import type { RoleName } from "./roles.js";
import type { TraceUsage } from "./trace.js";

/** JSON-schema described function the backend may ask the caller to run. */
export type ToolDeclaration = {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
};

export type ToolCallRequest = {
  id: string;
  name: string;
  arguments: string;
};

export type ToolResult = {
  callId: string;
  name: string;
  output: string;
};

/** One completed tool round-trip: what the backend said and asked for, and what came back. */
export type ToolRound = {
  assistantText: string;
  calls: ToolCallRequest[];
  results: ToolResult[];
};

export type BackendRequest = {
  role: RoleName;
  instructions: string;
  prompt: string;
  image?: DecodedImage;
  tools?: ToolDeclaration[];
  toolRounds?: readonly ToolRound[];
  signal: AbortSignal;
};

export type BackendResponse = {
  text: string;
  toolCalls: ToolCallRequest[];
  usage?: TraceUsage;
  model?: string;
};

/** Single point of contact with the generative-model provider. */
export interface Backend {
  readonly name: string;
  generate(request: BackendRequest): Promise<BackendResponse>;
}
