import type { Backend, BackendRequest, BackendResponse } from "./backend.js";
import type { RoleName } from "./roles.js";
import { WEB_SEARCH_DECLARATION, type SearchHit, type SearchTool } from "./search_tool.js";
import { wait } from "./utils.js";

export type ScriptStep =
  | BackendResponse
  | Error
  | ((request: BackendRequest) => BackendResponse | Promise<BackendResponse>);

export type BackendScript = Partial<Record<RoleName, ScriptStep[]>>;

/** Shorthand for a plain-text backend reply. */
export function reply(text: string): BackendResponse {
  return { text, toolCalls: [] };
}

export function toolCall(id: string, query: string): BackendResponse {
  return { text: "", toolCalls: [{ id, name: WEB_SEARCH_DECLARATION.name, arguments: JSON.stringify({ query }) }] };
}

export function criticReply(score: number, feedback: string[] = []): BackendResponse {
  return reply(JSON.stringify({ score, feedback }));
}

/**
 * Backend that replays a per-role script. Each call consumes the next step for
 * its role; once a script runs out, its last step repeats.
 */
export class ScriptedBackend implements Backend {
  readonly name = "scripted";
  readonly calls: BackendRequest[] = [];
  private readonly cursor = new Map<RoleName, number>();

  constructor(
    private readonly script: BackendScript,
    private readonly delayMs = 0
  ) {}

  callsFor(role: RoleName): BackendRequest[] {
    return this.calls.filter((c) => c.role === role);
  }

  async generate(request: BackendRequest): Promise<BackendResponse> {
    this.calls.push(request);
    const steps = this.script[request.role] ?? [];
    if (steps.length === 0) throw new Error(`No scripted response for ${request.role}`);

    const at = this.cursor.get(request.role) ?? 0;
    this.cursor.set(request.role, at + 1);
    const step = steps[Math.min(at, steps.length - 1)];

    await wait(this.delayMs, request.signal);
    if (step instanceof Error) throw step;
    if (typeof step === "function") return await step(request);
    return step;
  }
}

export class StaticSearchTool implements SearchTool {
  readonly declaration = WEB_SEARCH_DECLARATION;
  readonly queries: string[] = [];

  constructor(private readonly hits: SearchHit[] | Error) {}

  async search(query: string, signal: AbortSignal): Promise<SearchHit[]> {
    this.queries.push(query);
    await wait(0, signal);
    if (this.hits instanceof Error) throw this.hits;
    return this.hits.map((h) => ({ ...h }));
  }
}

/** Deterministic offline run for `MYTH_PIPELINE_MODE=fake`: one search, one rejected draft, then an accepted rewrite. */
export function createDemoBackend(location: string, delayMs: number): { backend: ScriptedBackend; search: StaticSearchTool } {
  const search = new StaticSearchTool([
    {
      title: `${location}: a short history`,
      url: "https://example.org/history",
      snippet: `Records describe ${location} as the site of a disappearance in 1803 that was never solved.`
    },
    {
      title: `Legends of ${location}`,
      url: "https://example.org/legends",
      snippet: `Night watchmen at ${location} reported a lantern moving where no one walked.`
    }
  ]);

  const backend = new ScriptedBackend(
    {
      visionary: [
        reply(
          [
            "ATMOSPHERE: Cold light falls across worn stone, and the shadows sit deeper than they should.",
            "DETAILS:",
            "- A doorway half-swallowed by darkness",
            "- Stains on the wall shaped like a reaching hand",
            "- A window with a single lit pane"
          ].join("\n")
        )
      ],
      investigator: [
        toolCall("call_demo_1", `${location} dark history`),
        reply(
          JSON.stringify({
            facts: [
              {
                claim: `A disappearance at ${location} in 1803 was never solved.`,
                source: "Records describe a disappearance in 1803 (https://example.org/history)"
              },
              {
                claim: `Watchmen reported a moving lantern at ${location}.`,
                source: "Night watchmen reported a lantern (https://example.org/legends)"
              }
            ]
          })
        )
      ],
      bard: [
        reply(`I walked into ${location} at dusk, and the stones remembered 1803 before I did.`),
        reply(
          `I stood at ${location} where, in 1803, someone vanished without a trace. The lit pane watched me. ` +
            "Then a lantern drifted past the doorway, carried by no one, exactly as the watchmen swore."
        )
      ],
      critic: [
        criticReply(6, ["Use the watchmen's lantern.", "Tie the lit window to the 1803 disappearance."]),
        criticReply(9, ["Chilling and grounded."])
      ]
    },
    delayMs
  );

  return { backend, search };
}
