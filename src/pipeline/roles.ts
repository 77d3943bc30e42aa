import { MalformedOutput } from "./errors.js";
import { describeImage, type DecodedImage } from "./image.js";
import {
  CriticOutputSchema,
  InvestigatorOutputSchema,
  type ContextPackage,
  type CriticReport,
  type Critique,
  type Draft,
  type HistoricalFacts,
  type VisualCues
} from "./schemas.js";
import type { TraceToolCall } from "./trace.js";
import { extractJsonObject, wordCount } from "./utils.js";

export const ROLE_NAMES = ["visionary", "investigator", "bard", "critic"] as const;
export type RoleName = (typeof ROLE_NAMES)[number];

export const MYTH_MAX_WORDS = 120;

export type RoleInputs = {
  visionary: { image: DecodedImage; location: string };
  investigator: { location: string };
  bard: { context: ContextPackage; feedbackHistory: readonly Critique[]; iteration: number };
  critic: { draft: Draft; location: string };
};

export type RoleOutputs = {
  visionary: VisualCues;
  investigator: HistoricalFacts;
  bard: string;
  critic: CriticReport;
};

export type RoleSpec<I, O> = {
  title: string;
  instructions: string;
  /** Whether the role gets the search tool unless the caller says otherwise. */
  toolsByDefault: boolean;
  buildPrompt: (input: I) => string;
  summarize: (input: I) => string;
  image?: (input: I) => DecodedImage;
  parse: (text: string, toolCalls: readonly TraceToolCall[]) => O;
};

export type RoleSpecs = { [K in RoleName]: RoleSpec<RoleInputs[K], RoleOutputs[K]> };

function parseJson(role: string, text: string): unknown {
  try {
    return JSON.parse(extractJsonObject(text));
  } catch (err) {
    throw new MalformedOutput(`${role} did not return valid JSON`, text, { cause: err });
  }
}

const HEADING_RE = /^[#*\s]*(ATMOSPHERE|DETAILS)[*\s]*:[*\s]*(.*)$/i;
const BULLET_RE = /^(?:[-*•]|\d+[.)])\s+(.*)$/;

export function parseVisualCues(text: string): VisualCues {
  const prose: string[] = [];
  const details: string[] = [];

  for (const raw of text.replace(/\r\n/g, "\n").split("\n")) {
    const line = raw.trim();
    if (!line) continue;

    const heading = HEADING_RE.exec(line);
    if (heading) {
      const rest = heading[2].trim();
      if (!rest) continue;
      if (heading[1].toUpperCase() === "ATMOSPHERE") prose.push(rest);
      else details.push(rest);
      continue;
    }

    const bullet = BULLET_RE.exec(line);
    if (bullet) {
      const detail = bullet[1].replace(/\*\*/g, "").trim();
      if (detail) details.push(detail);
      continue;
    }

    prose.push(line);
  }

  const atmosphere = prose.join(" ").trim();
  if (!atmosphere && details.length === 0) throw new MalformedOutput("Visionary returned no visual cues", text);
  return Object.freeze({ atmosphere, details: Object.freeze(details) });
}

export function parseHistoricalFacts(text: string, toolCalls: readonly TraceToolCall[]): HistoricalFacts {
  const parsed = InvestigatorOutputSchema.safeParse(parseJson("Investigator", text));
  if (!parsed.success) {
    throw new MalformedOutput(`Investigator output failed schema: ${parsed.error.issues[0]?.message ?? "invalid"}`, text);
  }
  return Object.freeze({
    facts: Object.freeze(parsed.data.facts.map((f) => Object.freeze({ ...f }))),
    ...(parsed.data.note ? { note: parsed.data.note } : {}),
    searchTrace: toolCalls
  });
}

export function parseDraftText(text: string): string {
  const draft = text.trim();
  if (!draft) throw new MalformedOutput("Bard returned an empty draft", text);
  return draft;
}

export function parseCriticReport(text: string): CriticReport {
  const parsed = CriticOutputSchema.safeParse(parseJson("Critic", text));
  if (!parsed.success) {
    throw new MalformedOutput(`Critic output failed schema: ${parsed.error.issues[0]?.message ?? "invalid"}`, text);
  }
  const items = typeof parsed.data.feedback === "string" ? [parsed.data.feedback] : parsed.data.feedback;
  return Object.freeze({
    score: parsed.data.score,
    feedback: Object.freeze(items.map((f) => f.trim()).filter((f) => f.length > 0))
  });
}

export function renderFeedbackHistory(history: readonly Critique[]): string {
  return history
    .map((c) => {
      const score = c.score === null ? "unscored" : `score ${c.score}/10`;
      if (c.feedback.length === 0) return `Attempt ${c.iteration + 1} (${score}): rejected`;
      return [`Attempt ${c.iteration + 1} (${score}):`, ...c.feedback.map((f) => `- ${f}`)].join("\n");
    })
    .join("\n\n");
}

export const ROLE_SPECS: RoleSpecs = {
  visionary: {
    title: "The Visionary",
    toolsByDefault: false,
    instructions: `You are The Visionary.

Analyze the uploaded image of a place and describe what makes it feel spooky or mysterious.

Rules:
- Describe only what is visible; do not invent history.
- Write one short paragraph of atmosphere after the heading "ATMOSPHERE:".
- Then, under the heading "DETAILS:", list exactly 3 specific, vivid visual details as "- " bullets.
- No other sections.`,
    buildPrompt: ({ location }) => `LOCATION: ${location}\n\nDescribe the atmosphere.`,
    summarize: ({ image, location }) => `atmosphere of ${location} from image (${describeImage(image)})`,
    image: ({ image }) => image,
    parse: (text) => parseVisualCues(text)
  },
  investigator: {
    title: "The Investigator",
    toolsByDefault: true,
    instructions: `You are The Investigator.

You MUST use the web_search tool to find verified historical facts about the location.
Focus on: dark history, crimes, local legends, and specific dates.

Rules:
- Do NOT make up facts. Every claim needs a short source snippet quoted or closely paraphrased from a search result, with its URL.
- If you can't find information, return an empty facts list and say so in "note".
- Return ONLY a JSON object, no markdown:
  {"facts": [{"claim": "...", "source": "snippet (url)"}], "note": "optional"}`,
    buildPrompt: ({ location }) => `Find specific dark history and ghost stories for: ${location}`,
    summarize: ({ location }) => `history search for "${location}"`,
    parse: (text, toolCalls) => parseHistoricalFacts(text, toolCalls)
  },
  bard: {
    title: "The Bard",
    toolsByDefault: false,
    instructions: `You are The Local Mythmaker.

Write a short "Micro-Myth" (max ${MYTH_MAX_WORDS} words) weaving the verified history into a spooky narrative,
told in the first person to the reader.

Rules:
- Use at least one verified fact from the context and keep it accurate.
- Let the visual details set the scene.
- Return only the myth text.`,
    buildPrompt: ({ context, feedbackHistory }) => {
      const ask =
        feedbackHistory.length > 0
          ? `Rewrite the myth. Address every point of criticism from all earlier attempts:\n\n${renderFeedbackHistory(feedbackHistory)}`
          : "Write the myth.";
      return `${ask}\n\nCONTEXT:\n${context.text}`;
    },
    summarize: ({ context, feedbackHistory, iteration }) =>
      `draft #${iteration + 1} from ${context.tokenCount}-token context with ${feedbackHistory.length} prior critique(s)`,
    parse: (text) => parseDraftText(text)
  },
  critic: {
    title: "The Critic",
    toolsByDefault: false,
    instructions: `You are the Editor.

Evaluate the myth for spookiness and for how well it integrates accurate history.

Rules:
- Score it from 1 to 10 (integer). 8 or more means it is ready to publish.
- Give specific, actionable feedback items.
- Return ONLY a JSON object, no markdown: {"score": 7, "feedback": ["...", "..."]}`,
    buildPrompt: ({ draft, location }) => `LOCATION: ${location}\n\nEvaluate:\n${draft.text}`,
    summarize: ({ draft }) => `critique of draft #${draft.iteration + 1} (${wordCount(draft.text)} words)`,
    parse: (text) => parseCriticReport(text)
  }
};

export function roleSpec<K extends RoleName>(role: K): RoleSpecs[K] {
  return ROLE_SPECS[role];
}
