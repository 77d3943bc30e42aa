import type { MythConfig } from "../config.js";
import type { Backend, BackendResponse, ToolCallRequest, ToolResult, ToolRound } from "./backend.js";
import {
  BackendUnavailable,
  ConfigurationError,
  MalformedOutput,
  MythError,
  RunCancelled,
  ToolLoopExceeded,
  toErrorMessage
} from "./errors.js";
import { roleSpec, type RoleInputs, type RoleName, type RoleOutputs, type RoleSpec } from "./roles.js";
import { formatSearchHits, WebSearchArgsSchema, type SearchTool } from "./search_tool.js";
import type { TraceRecord, TraceRecorder, TraceToolCall, TraceUsage } from "./trace.js";

export type InvokeOptions = {
  signal: AbortSignal;
  /** Defaults to the role's own setting: on for the Investigator only. */
  toolsEnabled?: boolean;
  iteration?: number;
};

export type Invocation<O> = {
  output: O;
  record: TraceRecord;
};

export type AgentInvokerDeps = {
  backend: Backend;
  trace: TraceRecorder;
  config: Pick<MythConfig, "toolRoundTripCap" | "perCallTimeoutMs">;
  search?: SearchTool;
};

type Deadline = { kind: "Backend" | "Search"; signal: AbortSignal };

function addUsage(total: TraceUsage | undefined, next: TraceUsage | undefined): TraceUsage | undefined {
  if (!next) return total;
  if (!total) return { ...next };
  return { inputTokens: total.inputTokens + next.inputTokens, outputTokens: total.outputTokens + next.outputTokens };
}

/**
 * Runs one role-specific backend call, including the tool round-trips the
 * backend asks for, and records exactly one trace entry for it.
 */
export class AgentInvoker {
  constructor(private readonly deps: AgentInvokerDeps) {}

  async invoke<K extends RoleName>(role: K, input: RoleInputs[K], options: InvokeOptions): Promise<Invocation<RoleOutputs[K]>> {
    const spec: RoleSpec<RoleInputs[K], RoleOutputs[K]> = roleSpec(role);
    const toolsEnabled = options.toolsEnabled ?? spec.toolsByDefault;
    const { search, backend, trace, config } = this.deps;

    const prompt = spec.buildPrompt(input);
    const image = spec.image?.(input);
    const span = trace.begin(role, spec.summarize(input), options.iteration);

    const rounds: ToolRound[] = [];
    const toolCalls: TraceToolCall[] = [];
    const deadlines: Deadline[] = [];
    let usage: TraceUsage | undefined;
    let lastText = "";

    // Each backend call and each search gets its own timeout, joined with the run signal.
    const withDeadline = (kind: Deadline["kind"]): AbortSignal => {
      const timeout = AbortSignal.timeout(config.perCallTimeoutMs);
      deadlines.push({ kind, signal: timeout });
      return AbortSignal.any([options.signal, timeout]);
    };

    const call = async (): Promise<BackendResponse> => {
      if (options.signal.aborted) throw new RunCancelled();
      const response = await backend.generate({
        role,
        instructions: spec.instructions,
        prompt,
        image,
        tools: toolsEnabled && search ? [search.declaration] : undefined,
        toolRounds: rounds.length > 0 ? [...rounds] : undefined,
        signal: withDeadline("Backend")
      });
      usage = addUsage(usage, response.usage);
      lastText = response.text;
      return response;
    };

    try {
      if (toolsEnabled && !search) {
        throw new ConfigurationError(`Search tool access requested for ${role} but no search tool is configured`);
      }
      let response = await call();
      while (response.toolCalls.length > 0) {
        if (!toolsEnabled || !search) {
          throw new MalformedOutput(`${spec.title} requested a tool call without tool access`, response.text);
        }
        if (rounds.length >= config.toolRoundTripCap) {
          throw new ToolLoopExceeded(
            `${spec.title} still requested tools after ${rounds.length} round-trip(s) (cap ${config.toolRoundTripCap})`,
            rounds.length
          );
        }
        const results: ToolResult[] = [];
        for (const request of response.toolCalls) {
          const result = await this.runTool(search, request, () => withDeadline("Search"));
          results.push(result.result);
          toolCalls.push(result.traced);
        }
        rounds.push({ assistantText: response.text, calls: response.toolCalls, results });
        response = await call();
      }

      const output = spec.parse(response.text, [...toolCalls]);
      const record = span.finish({ status: "ok", rawOutput: response.text, toolCalls, usage });
      return { output, record };
    } catch (err) {
      const failure = this.classify(err, options.signal, deadlines.at(-1));
      span.finish({
        status: failure instanceof RunCancelled ? "cancelled" : "error",
        rawOutput: lastText,
        toolCalls,
        usage,
        error: failure.message,
        errorCode: failure.code
      });
      throw failure;
    }
  }

  private async runTool(
    search: SearchTool,
    request: ToolCallRequest,
    nextSignal: () => AbortSignal
  ): Promise<{ result: ToolResult; traced: TraceToolCall }> {
    const reply = (output: string, ok: boolean) => ({
      result: { callId: request.id, name: request.name, output },
      traced: { id: request.id, name: request.name, arguments: request.arguments, output, ok }
    });

    if (request.name !== search.declaration.name) {
      return reply(`Error: unknown tool "${request.name}". Available: ${search.declaration.name}.`, false);
    }

    let args: unknown;
    try {
      args = JSON.parse(request.arguments);
    } catch {
      return reply("Error: tool arguments must be a JSON object.", false);
    }
    const parsed = WebSearchArgsSchema.safeParse(args);
    if (!parsed.success) {
      return reply(`Error: invalid arguments (${parsed.error.issues[0]?.message ?? "invalid"}).`, false);
    }

    const hits = await search.search(parsed.data.query, nextSignal());
    return reply(formatSearchHits(parsed.data.query, hits), true);
  }

  /** Only the latest deadline matters: backend calls and searches run one at a time. */
  private classify(err: unknown, runSignal: AbortSignal, deadline: Deadline | undefined): MythError {
    if (runSignal.aborted) return err instanceof RunCancelled ? err : new RunCancelled();
    if (deadline?.signal.aborted) {
      return new BackendUnavailable(`${deadline.kind} call timed out after ${this.deps.config.perCallTimeoutMs}ms`, { cause: err });
    }
    if (err instanceof MythError) return err;
    return new BackendUnavailable(toErrorMessage(err), { cause: err });
  }
}
