import { buildEvaluatorPrompt, type CoverageSummary } from "../prompts";
import { defineStage } from "../stage";
import { EvaluationSchema, StageName, type TopicContent } from "../types";

const PLAIN_DAY = /^\d{4}-\d{2}-\d{2}$/;
const ZONE_SUFFIX = /(?:([+-])(\d{2}):?(\d{2})|Z|GMT|UTC)$/i;

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Calendar day of a provider date as written, in its own UTC offset when it
 * carries one. Null when the text does not parse.
 */
export function publishedDay(text: string): string | null {
  const trimmed = text.trim();
  if (PLAIN_DAY.test(trimmed)) return trimmed;

  const parsed = new Date(trimmed);
  if (Number.isNaN(parsed.getTime())) return null;

  const zone = ZONE_SUFFIX.exec(trimmed);
  if (!zone) {
    return `${parsed.getFullYear()}-${pad(parsed.getMonth() + 1)}-${pad(parsed.getDate())}`;
  }

  const [, sign, hours, minutes] = zone;
  const offsetMinutes = sign ? (sign === "-" ? -1 : 1) * (Number(hours) * 60 + Number(minutes)) : 0;
  return new Date(parsed.getTime() + offsetMinutes * 60_000).toISOString().slice(0, 10);
}

/**
 * True when a provider date falls inside [startDate, endDate]. Missing or
 * unparseable dates count as inside.
 */
export function isWithinRange(publishedDate: string, startDate: string, endDate: string): boolean {
  if (!publishedDate) return true;
  const day = publishedDay(publishedDate);
  if (day === null) return true;
  return startDate <= day && day <= endDate;
}

export function summarizeCoverage(rawContent: TopicContent[], startDate: string, endDate: string): CoverageSummary {
  let totalSources = 0;
  let outOfRange = 0;
  for (const entry of rawContent) {
    for (const source of entry.sources) {
      totalSources++;
      if (!isWithinRange(source.publishedDate, startDate, endDate)) outOfRange++;
    }
  }
  return { totalSources, outOfRange };
}

/**
 * Evaluate Stage - judge whether the collected material is enough
 *
 * Once the iteration bound is reached an insufficient verdict is turned into
 * a sufficient one; running out of iterations is not an error.
 */
export const evaluateStage = defineStage({
  name: StageName.EVALUATE,
  reads: ["rawContent", "visualAnalysis", "objective", "context", "startDate", "endDate", "searchIterations"],
  writes: ["evaluation"],
  async run(view, { services, settings, signal }) {
    const coverage = summarizeCoverage(view.rawContent, view.startDate, view.endDate);
    if (coverage.outOfRange) {
      console.log(`   Sources out of range: ${coverage.outOfRange}/${coverage.totalSources}`);
    }

    const prompt = buildEvaluatorPrompt({
      objective: view.objective,
      context: view.context,
      startDate: view.startDate,
      endDate: view.endDate,
      searchIterations: view.searchIterations,
      maxSearchIterations: settings.maxSearchIterations,
      rawContent: view.rawContent,
      visualAnalysis: view.visualAnalysis,
      coverage,
    });

    const verdict = await services.reasoningModel.generate(EvaluationSchema, prompt, { signal });
    const exhausted = !verdict.isSufficient && view.searchIterations >= settings.maxSearchIterations;
    const evaluation = exhausted ? { ...verdict, isSufficient: true } : verdict;

    console.log(`⚖️  Evaluation: ${evaluation.isSufficient ? "SUFFICIENT" : "NEEDS MORE"}${exhausted ? " (iteration limit reached)" : ""}`);
    if (!evaluation.isSufficient && evaluation.missingTopics.length) {
      console.log(`   Missing topics: ${evaluation.missingTopics.join(", ")}`);
    }
    return { evaluation };
  },
});
