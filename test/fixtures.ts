import { ingestImage, type DecodedImage } from "../src/pipeline/image.js";
import { DEFAULT_MYTH_CONFIG, type MythConfig } from "../src/config.js";
import type { ContextPackage, HistoricalFacts, VisualCues } from "../src/pipeline/schemas.js";

export const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

export function pngBytes(extra = 8): Uint8Array {
  return Uint8Array.from([...PNG_SIGNATURE, ...new Array<number>(extra).fill(0)]);
}

export function pngBase64(extra = 8): string {
  return Buffer.from(pngBytes(extra)).toString("base64");
}

export function testImage(): DecodedImage {
  return ingestImage(pngBytes(), "image/png");
}

export function testConfig(overrides: Partial<MythConfig> = {}): MythConfig {
  return { ...DEFAULT_MYTH_CONFIG, perCallTimeoutMs: 5_000, ...overrides };
}

export const VISIONARY_TEXT = [
  "ATMOSPHERE: Fog hangs over the empty square.",
  "DETAILS:",
  "- A broken clock face",
  "- Ivy over a bricked-up door",
  "- One lit window"
].join("\n");

export const INVESTIGATOR_JSON = JSON.stringify({
  facts: [
    { claim: "The mill burned in 1891.", source: "Mill fire of 1891 (https://example.org/mill)" },
    { claim: "A miller vanished the same night.", source: "Missing miller (https://example.org/miller)" }
  ]
});

export function cues(details: string[] = ["a broken clock face"], atmosphere = "Fog hangs over the square."): VisualCues {
  return { atmosphere, details };
}

export function facts(claims: Array<[string, string]>): HistoricalFacts {
  return { facts: claims.map(([claim, source]) => ({ claim, source })), searchTrace: [] };
}

export function contextPackage(text = "LOCATION: Old Mill\n\nVERIFIED HISTORY:\n- The mill burned in 1891. (source: s)"): ContextPackage {
  return {
    location: "Old Mill",
    text,
    tokenCount: Math.ceil(text.length / 4),
    budgetTokens: 1200,
    facts: { included: 1, total: 1 },
    details: { included: 0, total: 0 },
    atmosphere: "omitted",
    truncated: false
  };
}

export async function waitFor(fn: () => boolean, timeoutMs = 1500): Promise<void> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    if (fn()) return;
    await new Promise((r) => setTimeout(r, 10));
  }
  throw new Error("timeout");
}
