import * as fs from "fs/promises";
import * as path from "path";
import { z } from "zod";
import { NewsDigestSchema, type NewsDigest, type ResearchRequest } from "../research/types";

/**
 * Report Output
 *
 * The digest wrapped with what produced it, so a saved file describes itself.
 */
export const ReportOutputSchema = z.object({
  generatedAt: z.string(),
  objective: z.string(),
  periodStart: z.string(),
  periodEnd: z.string(),
  digest: NewsDigestSchema,
});

export type ReportOutput = z.infer<typeof ReportOutputSchema>;

export type ReportFormat = "md" | "txt" | "json";

export function createReport(
  digest: NewsDigest,
  request: Pick<ResearchRequest, "objective" | "startDate" | "endDate">,
  generatedAt: Date = new Date()
): ReportOutput {
  return {
    generatedAt: generatedAt.toISOString(),
    objective: request.objective,
    periodStart: request.startDate,
    periodEnd: request.endDate,
    digest,
  };
}

export function toMarkdown(report: ReportOutput): string {
  const lines: string[] = [
    "# News Research Report\n",
    `*Generated: ${report.generatedAt}*\n`,
    `**Objective:** ${report.objective}\n`,
    `**Period:** ${report.periodStart} to ${report.periodEnd}\n`,
    "---\n",
  ];

  for (const section of report.digest.sections) {
    lines.push(`## ${section.title}\n`);
    lines.push(`${section.article}\n`);
    if (section.visualInsights.length) {
      lines.push("**Video insights:**\n");
      for (const insight of section.visualInsights) {
        lines.push(`- [${insight.videoTitle}](${insight.videoUrl}): ${insight.analysis}`);
      }
      lines.push("");
    }
    lines.push("**Sources:**\n");
    for (const source of section.sources) {
      lines.push(`- ${source}`);
    }
    lines.push("\n---\n");
  }

  return lines.join("\n");
}

export function toPlainText(report: ReportOutput): string {
  const sep = "=".repeat(60);
  const lines: string[] = [
    sep,
    "NEWS RESEARCH REPORT",
    sep,
    `Generated: ${report.generatedAt}`,
    `Objective: ${report.objective}`,
    `Period:    ${report.periodStart} to ${report.periodEnd}`,
    sep,
    "",
  ];

  report.digest.sections.forEach((section, i) => {
    lines.push(`${i + 1}. ${section.title}`);
    lines.push(`   ${section.article}`);
    lines.push("   Sources:");
    for (const source of section.sources) {
      lines.push(`     - ${source}`);
    }
    lines.push("");
  });

  return lines.join("\n");
}

/**
 * File name without extension, e.g. reporte_2026-02-07_2026-02-14.
 */
export function reportBasename(report: ReportOutput): string {
  return `reporte_${report.periodStart}_${report.periodEnd}`;
}

const RENDERERS: Record<ReportFormat, (report: ReportOutput) => string> = {
  md: toMarkdown,
  txt: toPlainText,
  json: (report) => JSON.stringify(report, null, 2),
};

/**
 * Write the report in each requested format into outputDir and return the
 * written paths in the same order.
 */
export async function saveReport(
  report: ReportOutput,
  outputDir: string,
  formats: ReportFormat[] = ["json", "md"]
): Promise<string[]> {
  await fs.mkdir(outputDir, { recursive: true });
  const base = path.join(outputDir, reportBasename(report));

  const written: string[] = [];
  for (const format of formats) {
    const file = `${base}.${format}`;
    await fs.writeFile(file, RENDERERS[format](report), "utf-8");
    written.push(file);
  }
  return written;
}

/**
 * Read a saved JSON report back, validating its shape.
 */
export async function loadReport(file: string): Promise<ReportOutput> {
  const text = await fs.readFile(file, "utf-8");
  return ReportOutputSchema.parse(JSON.parse(text));
}
