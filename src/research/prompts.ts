import type { ExplorationResult, TopicContent, VisualInsight } from "./types";

/**
 * Prompt builders. Pure string functions so the same state always yields the
 * same prompt; nothing here reads the clock.
 */

function contextLine(label: string, context: string): string {
  return context ? `\n${label}: ${context}\n` : "";
}

export function buildPlannerPrompt(input: {
  objective: string;
  context: string;
  explorationResults: ExplorationResult[];
}): string {
  const headlines = input.explorationResults
    .map((item) => `- ${item.title}: ${item.snippet.slice(0, 200)}...`)
    .join("\n");

  return `You are a professional news research analyst.

REPORT OBJECTIVE: ${input.objective}
${contextLine("Context/focus", input.context)}
HEADLINES AND NEWS FOUND:
${headlines}

TASK:
Based on the REAL headlines above, generate 3-5 specific search queries to investigate further.

CRITICAL RULES FOR TOPICS:
- Each topic must be A SHORT SEARCH QUERY (max 50-60 characters)
- Do NOT include explanations or reasoning in the topics
- Reasoning goes ONLY in the "reasoning" field, NOT in the topics
- Topics are ONLY the search phrases

CORRECT topic examples:
- "Port expansion financing 2026"
- "Battery plant construction permits"

INCORRECT topic examples (DO NOT do this):
- "1) Port expansion as a driver... Reasoning: the headline indicates..." (TOO LONG)

Prioritize news with concrete data (figures, companies, specific locations).
`;
}

export interface CoverageSummary {
  totalSources: number;
  outOfRange: number;
}

export function buildEvaluatorPrompt(input: {
  objective: string;
  context: string;
  startDate: string;
  endDate: string;
  searchIterations: number;
  maxSearchIterations: number;
  rawContent: TopicContent[];
  visualAnalysis: VisualInsight[];
  coverage: CoverageSummary;
}): string {
  const content = input.rawContent
    .map((item) => {
      const sources = item.sources
        .slice(0, 3)
        .map((source) => `  - [${source.publishedDate || "no date"}] ${source.title.slice(0, 100)}`)
        .join("\n");
      return `Topic: ${item.topic}\nSources:\n${sources}`;
    })
    .join("\n\n");

  const videos = input.visualAnalysis.length
    ? `\nANALYZED VIDEOS: ${input.visualAnalysis.length}\n${input.visualAnalysis
        .map((insight) => `  - ${insight.videoTitle.slice(0, 100)}`)
        .join("\n")}\n`
    : "";

  return `You are a senior news editor evaluating the coverage gathered for a report.

REPORT OBJECTIVE: ${input.objective}
${contextLine("Context/focus", input.context)}
REQUIRED PERIOD: ${input.startDate} to ${input.endDate}
SEARCH ITERATIONS: ${input.searchIterations} of ${input.maxSearchIterations} maximum

COLLECTED CONTENT:
${content}
${videos}
TOTAL: ${input.rawContent.length} topics, ${input.coverage.totalSources} sources
SOURCES OUTSIDE THE DATE RANGE: ${input.coverage.outOfRange} of ${input.coverage.totalSources}

EVALUATE RIGOROUSLY:
1. TOPIC COVERAGE: do the topics cover the sub-themes of the objective?
2. DATA QUALITY: are there concrete figures (amounts, percentages, rates)? A topic without hard data is weak.
3. SOURCE DIVERSITY: are there at least 2 distinct sources per topic?
4. RECENCY: sources outside the date range reduce quality; penalize proportionally.

SUFFICIENCY CRITERIA:
- SUFFICIENT: >= 3 solid topics (concrete data and >= 2 sources each) covering the objective's sub-themes
- INSUFFICIENT: < 3 solid topics, OR a sub-theme without coverage, OR most sources out of range

If coverage is insufficient and iterations remain, suggest 1-2 additional searches focused on what is missing.
If the maximum number of iterations has been reached, set isSufficient to true.
`;
}

export function buildAnalystPrompt(input: {
  objective: string;
  context: string;
  rawContent: TopicContent[];
  visualAnalysis: VisualInsight[];
  entitySummary: string;
}): string {
  const videoBlock = input.visualAnalysis.length
    ? "\n\nANALYZED VIDEO CONTENT:\n" +
      input.visualAnalysis
        .map((insight) => `\nVideo: ${insight.videoTitle}\nURL: ${insight.videoUrl}\nAnalysis: ${insight.analysis}\n`)
        .join("")
    : "";

  const entityBlock = input.entitySummary ? `\n\n${input.entitySummary}\n` : "";

  const collected = input.rawContent.map((item) => ({
    topic: item.topic,
    sources: item.sources.map((source) => ({
      url: source.url,
      title: source.title,
      publishedDate: source.publishedDate,
      content: source.content,
    })),
  }));

  return `You are a professional news analyst.

Report objective: ${input.objective}
${contextLine("Research context", input.context)}
Your task is to generate a structured news summary.
For each relevant topic, write:
1. A descriptive title
2. An article of 100 to 150 words summarizing the key points with concrete data (figures, companies, locations)
3. List the URLs of the external sources used (field "sources"); include video URLs where relevant
${entityBlock}
Use the entity data above (if present) to reference specific people, organisations, monetary amounts and locations by name.

If video analysis is provided below, integrate its insights into the relevant sections ("visualInsights") and include the video URLs in "sources".

Collected news data:
${JSON.stringify(collected, null, 2)}${videoBlock}
`;
}

export function buildVideoQuestion(topic: string, objective: string): string {
  return (
    `Context: this video covers news related to: ${topic}.\n` +
    `Research objective: ${objective}.\n\n` +
    "Analyze the video and provide:\n" +
    "1. Summary of the main content\n" +
    "2. Key data: figures, companies, locations, dates\n" +
    "3. People who appear and what they say\n" +
    "4. Relevant conclusions or trends\n\n" +
    "Answer concisely and in a structured way."
  );
}
