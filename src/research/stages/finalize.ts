import { buildAnalystPrompt } from "../prompts";
import { defineStage } from "../stage";
import { NewsDigestSchema, StageName, type TopicContent } from "../types";

export const MAX_ENTITIES_PER_LABEL = 15;

/**
 * Collect every entity found across all sources into one block for the
 * writer prompt: labels sorted, values sorted and unique, at most 15 each.
 */
export function buildEntitySummary(rawContent: TopicContent[]): string {
  const byLabel = new Map<string, Set<string>>();
  for (const entry of rawContent) {
    for (const source of entry.sources) {
      for (const [label, values] of Object.entries(source.entities)) {
        const bucket = byLabel.get(label) ?? new Set<string>();
        values.forEach((value) => bucket.add(value));
        byLabel.set(label, bucket);
      }
    }
  }
  if (byLabel.size === 0) return "";

  const lines = ["KEY ENTITIES EXTRACTED:"];
  for (const label of [...byLabel.keys()].sort()) {
    const values = [...(byLabel.get(label) ?? [])].sort().slice(0, MAX_ENTITIES_PER_LABEL);
    lines.push(`  ${label}: ${values.join(", ")}`);
  }
  return lines.join("\n");
}

/**
 * Finalize Stage - write the digest from everything collected
 */
export const finalizeStage = defineStage({
  name: StageName.FINALIZE,
  reads: ["rawContent", "visualAnalysis", "objective", "context"],
  writes: ["digest"],
  async run(view, { services, signal }) {
    const prompt = buildAnalystPrompt({
      objective: view.objective,
      context: view.context,
      rawContent: view.rawContent,
      visualAnalysis: view.visualAnalysis,
      entitySummary: buildEntitySummary(view.rawContent),
    });

    const digest = await services.writerModel.generate(NewsDigestSchema, prompt, { signal });
    console.log(`📰 Digest ready: ${digest.sections.length} section(s)`);
    return { digest };
  },
});
