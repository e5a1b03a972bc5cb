import { z } from "zod";

/**
 * Type Definitions for the News Research Pipeline
 *
 * Records that flow through the shared research state, plus the Zod schemas
 * that the language model must satisfy for its structured outputs.
 */

/**
 * Stage names as they appear in the graph and in progress events.
 */
export enum StageName {
  EXPLORE = "explore",
  PLAN = "plan",
  SEARCH = "search",
  EXTRACT = "extract",
  ENRICH = "enrich",
  VIDEO_SEARCH = "video_search",
  VIDEO_ANALYZE = "video_analyze",
  EVALUATE = "evaluate",
  RETRY_UPDATE = "retry_update",
  FINALIZE = "finalize",
}

/**
 * Headline found by the broad exploration query.
 */
export interface ExplorationResult {
  title: string;
  url: string;
  snippet: string;                       // capped to keep planner prompts short
}

/**
 * Named entities grouped by label, e.g. { ORGANIZATION: ["Acme"] }.
 */
export type EntityMap = Record<string, string[]>;

export interface EntityMention {
  label: string;
  text: string;
}

/**
 * One news article found for a topic.
 */
export interface SourceRecord {
  url: string;
  title: string;
  content: string;                       // search snippet, then full text after extraction
  publishedDate: string;                 // as reported by the provider, may be empty
  entities: EntityMap;                   // empty until the enrich stage runs
}

/**
 * Everything one search pass found for one topic.
 */
export interface TopicContent {
  topic: string;
  sources: SourceRecord[];
}

export type VideoOrigin = "youtube" | "embedded";

export interface VideoSource {
  url: string;                           // canonical https://www.youtube.com/watch?v=<id>
  title: string;
  snippet: string;
  source: VideoOrigin;
}

/**
 * Structured output schemas
 *
 * These are handed to the language model through withStructuredOutput and
 * parsed again on the way back, so a malformed answer fails the stage.
 */

export const SearchPlanSchema = z.object({
  topics: z.array(z.string()).describe("3-5 short search queries, 60 characters at most, no explanations"),
  reasoning: z.string().describe("Why these topics were chosen"),
});

export const EvaluationSchema = z.object({
  isSufficient: z.boolean().describe("True when the collected coverage is good enough for the report"),
  missingTopics: z.array(z.string()).describe("1-2 additional search queries when coverage is insufficient"),
  reasoning: z.string().describe("Explanation of the decision"),
});

export const VisualInsightSchema = z.object({
  videoUrl: z.string(),
  videoTitle: z.string(),
  analysis: z.string(),
  sourceTopic: z.string(),
});

export const TopicSectionSchema = z.object({
  title: z.string().describe("Descriptive title of the section"),
  article: z.string().describe("100-150 word article with concrete figures, companies and places"),
  sources: z.array(z.string()).describe("URLs of the external sources used, news and video"),
  visualInsights: z.array(VisualInsightSchema).describe("Insights taken from analyzed videos, empty when none apply"),
});

export const NewsDigestSchema = z.object({
  sections: z.array(TopicSectionSchema),
});

export type SearchPlan = z.infer<typeof SearchPlanSchema>;
export type Evaluation = z.infer<typeof EvaluationSchema>;
export type VisualInsight = z.infer<typeof VisualInsightSchema>;
export type TopicSection = z.infer<typeof TopicSectionSchema>;
export type NewsDigest = z.infer<typeof NewsDigestSchema>;

function isCalendarDate(value: string): boolean {
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

const IsoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "expected a YYYY-MM-DD date")
  .refine(isCalendarDate, "expected a real calendar date");

/**
 * What a caller supplies to start a run.
 */
export const ResearchRequestSchema = z
  .object({
    objective: z.string().trim().min(1, "objective is required"),
    startDate: IsoDate,
    endDate: IsoDate,
    context: z.string().trim().default(""),
  })
  .refine((request) => request.startDate <= request.endDate, {
    message: "startDate must not be after endDate",
    path: ["startDate"],
  });

export type ResearchRequestInput = z.input<typeof ResearchRequestSchema>;
export type ResearchRequest = z.output<typeof ResearchRequestSchema>;
