import { isAbortError } from "../../shared/utils/abort";
import { describeError } from "../errors";
import { buildVideoQuestion } from "../prompts";
import { defineStage } from "../stage";
import { StageName, type VisualInsight } from "../types";
import { youtubeId } from "./video-search";

/**
 * Video Analyze Stage - ask the video service about each found video
 *
 * Videos are handled one at a time. A video that fails to index or answers
 * with nothing is left out of the results.
 */
export const videoAnalyzeStage = defineStage({
  name: StageName.VIDEO_ANALYZE,
  reads: ["videoSources", "objective"],
  writes: ["visualAnalysis"],
  async run(view, { services, signal }) {
    const video = services.video;
    if (!video || view.videoSources.length === 0) {
      console.log("🎞️  No videos to analyze");
      return { visualAnalysis: [] };
    }

    const visualAnalysis: VisualInsight[] = [];
    for (const [index, source] of view.videoSources.entries()) {
      const topic = (source.snippet || view.objective).slice(0, 200);
      const name = `news_${index + 1}_${youtubeId(source.url) ?? "video"}`;
      console.log(`   [${index + 1}/${view.videoSources.length}] ${source.title.slice(0, 60)}`);

      try {
        const analysis = await video.analyze(
          { url: source.url, name, question: buildVideoQuestion(topic, view.objective) },
          { signal }
        );
        if (!analysis.trim()) {
          console.log("   ⚠️ Empty analysis, skipping");
          continue;
        }
        visualAnalysis.push({
          videoUrl: source.url,
          videoTitle: source.title,
          analysis,
          sourceTopic: topic.slice(0, 100),
        });
      } catch (error) {
        if (isAbortError(error, signal)) throw error;
        console.log(`   ⚠️ Video analysis failed: ${describeError(error)}`);
      }
    }

    console.log(`🎞️  Analyzed ${visualAnalysis.length}/${view.videoSources.length} video(s)`);
    return { visualAnalysis };
  },
});
