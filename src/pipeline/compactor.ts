import { ConfigurationError } from "./errors.js";
import type { AtmosphereInclusion, ContextPackage, HistoricalFact, HistoricalFacts, VisualCues } from "./schemas.js";
import { countTokens, truncateToTokenBudget } from "./tokens.js";

export type CompactOptions = {
  location: string;
  budgetTokens: number;
};

type Selection = {
  facts: readonly HistoricalFact[];
  details: readonly string[];
  atmosphere: string | null;
};

// Below this, a cut-down atmosphere paragraph carries no usable flavour.
const MIN_ATMOSPHERE_TOKENS = 6;

export function renderContext(location: string, sel: Selection): string {
  const sections = [`LOCATION: ${location}`];
  if (sel.facts.length > 0) {
    sections.push(["VERIFIED HISTORY:", ...sel.facts.map((f) => `- ${f.claim} (source: ${f.source})`)].join("\n"));
  }
  if (sel.details.length > 0) {
    sections.push(["VISUAL DETAILS:", ...sel.details.map((d) => `- ${d}`)].join("\n"));
  }
  if (sel.atmosphere !== null) {
    sections.push(`ATMOSPHERE:\n${sel.atmosphere}`);
  }
  return sections.join("\n\n");
}

/**
 * Merges visual cues and historical facts into one prompt payload within
 * `budgetTokens`. When something has to go, facts are kept first (in order),
 * then visual details, and the atmosphere paragraph is cut or dropped last.
 */
export function compactContext(cues: VisualCues, history: HistoricalFacts, options: CompactOptions): ContextPackage {
  const { location, budgetTokens } = options;
  if (!Number.isInteger(budgetTokens) || budgetTokens <= 0) {
    throw new ConfigurationError(`Context size budget must be a positive integer (got ${budgetTokens})`);
  }

  const atmosphere = cues.atmosphere.trim();
  if (history.facts.length === 0 && cues.details.length === 0 && !atmosphere) {
    throw new ConfigurationError("Nothing to compact: no facts and no visual cues");
  }

  const fits = (sel: Selection) => countTokens(renderContext(location, sel)) <= budgetTokens;
  let sel: Selection = { facts: [], details: [], atmosphere: null };

  for (const fact of history.facts) {
    const next = { ...sel, facts: [...sel.facts, fact] };
    if (fits(next)) sel = next;
  }
  if (history.facts.length > 0 && sel.facts.length === 0) {
    throw new ConfigurationError(`Context size budget of ${budgetTokens} tokens cannot hold a single fact`);
  }

  for (const detail of cues.details) {
    const next = { ...sel, details: [...sel.details, detail] };
    if (fits(next)) sel = next;
  }

  let atmosphereMode: AtmosphereInclusion = "omitted";
  if (atmosphere) {
    if (fits({ ...sel, atmosphere })) {
      sel = { ...sel, atmosphere };
      atmosphereMode = "full";
    } else {
      const room = budgetTokens - countTokens(renderContext(location, { ...sel, atmosphere: "" }));
      if (room >= MIN_ATMOSPHERE_TOKENS) {
        const cut = truncateToTokenBudget(atmosphere, room);
        if (fits({ ...sel, atmosphere: cut })) {
          sel = { ...sel, atmosphere: cut };
          atmosphereMode = "truncated";
        }
      }
    }
  }

  if (sel.facts.length === 0 && sel.details.length === 0 && atmosphereMode === "omitted") {
    throw new ConfigurationError(`Context size budget of ${budgetTokens} tokens cannot hold a single visual cue`);
  }

  const text = renderContext(location, sel);
  const truncated =
    sel.facts.length < history.facts.length ||
    sel.details.length < cues.details.length ||
    (atmosphere.length > 0 && atmosphereMode !== "full");

  return Object.freeze({
    location,
    text,
    tokenCount: countTokens(text),
    budgetTokens,
    facts: { included: sel.facts.length, total: history.facts.length },
    details: { included: sel.details.length, total: cues.details.length },
    atmosphere: atmosphereMode,
    truncated
  });
}
