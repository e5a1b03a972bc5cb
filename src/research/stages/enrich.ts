import { isAbortError } from "../../shared/utils/abort";
import { describeError } from "../errors";
import { ENTITY_LABELS, groupEntities, sanitizeText } from "../sanitize";
import type { EntityExtractor } from "../services";
import { defineStage } from "../stage";
import { replaceAll } from "../states";
import { StageName, type EntityMap, type SourceRecord, type TopicContent } from "../types";

export const MIN_ENRICH_CONTENT = 20;

async function entitiesFor(
  source: SourceRecord,
  extractor: EntityExtractor,
  signal?: AbortSignal
): Promise<EntityMap> {
  if (source.content.length < MIN_ENRICH_CONTENT) return {};

  try {
    const mentions = await extractor.extract(sanitizeText(source.content), ENTITY_LABELS, { signal });
    return groupEntities(mentions);
  } catch (error) {
    if (isAbortError(error, signal)) throw error;
    console.log(`   ⚠️ No entities for ${source.url}: ${describeError(error)}`);
    return {};
  }
}

/**
 * Enrich Stage - attach named entities to every collected source
 *
 * A source whose extraction fails keeps an empty entity map; the run goes on.
 */
export const enrichStage = defineStage({
  name: StageName.ENRICH,
  reads: ["rawContent"],
  writes: ["rawContent"],
  async run(view, { services, signal }) {
    const total = view.rawContent.reduce((sum, entry) => sum + entry.sources.length, 0);
    console.log(`🏷️  Extracting entities from ${total} source(s)`);

    const rawContent: TopicContent[] = [];
    for (const entry of view.rawContent) {
      const sources: SourceRecord[] = [];
      for (const source of entry.sources) {
        const entities = await entitiesFor(source, services.entities, signal);
        sources.push({ ...source, entities });
      }
      rawContent.push({ topic: entry.topic, sources });
    }

    return { rawContent: replaceAll(rawContent) };
  },
});
