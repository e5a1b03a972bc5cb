import { isAbortError } from "../../shared/utils/abort";
import { describeError } from "../errors";
import type { SearchHit } from "../services";
import { defineStage } from "../stage";
import { StageName, type VideoSource } from "../types";

export const VIDEO_SEARCH_MAX_RESULTS = 5;
export const VIDEO_SNIPPET_LENGTH = 300;

const YOUTUBE_PATTERN = /(?:https?:\/\/)?(?:www\.)?(?:youtube\.com\/watch\?v=|youtu\.be\/)([\w-]+)/;

export function youtubeId(text: string): string | null {
  const match = YOUTUBE_PATTERN.exec(text);
  return match ? match[1] : null;
}

export function canonicalVideoUrl(id: string): string {
  return `https://www.youtube.com/watch?v=${id}`;
}

/**
 * Map one search hit to videos: a YouTube result URL is the hit's only video,
 * otherwise every YouTube link embedded in the page content, in order.
 */
export function videosFromHit(hit: SearchHit): VideoSource[] {
  const snippet = hit.content.slice(0, VIDEO_SNIPPET_LENGTH);

  const direct = youtubeId(hit.url);
  if (direct) {
    return [{ url: canonicalVideoUrl(direct), title: hit.title, snippet, source: "youtube" }];
  }

  return Array.from(hit.content.matchAll(new RegExp(YOUTUBE_PATTERN, "g")), (match) => ({
    url: canonicalVideoUrl(match[1]),
    title: `(embedded) ${hit.title}`,
    snippet,
    source: "embedded" as const,
  }));
}

/**
 * Video Search Stage - find YouTube coverage for the current topics
 *
 * At most maxVideosPerTopic per topic and maxVideos overall, no URL twice.
 * When the topics turn up nothing the configured fallback queries are tried.
 * A failing query is skipped.
 */
export const videoSearchStage = defineStage({
  name: StageName.VIDEO_SEARCH,
  reads: ["topics", "objective"],
  writes: ["videoSources"],
  async run(view, { services, settings, signal }) {
    if (!settings.enableVideo || !services.video) {
      console.log("🎬 Video analysis disabled, skipping video search");
      return { videoSources: [] };
    }

    const seen = new Set<string>();
    const videoSources: VideoSource[] = [];

    const collect = async (query: string, limit: number) => {
      let hits: SearchHit[];
      try {
        hits = await services.news.search(query, {
          maxResults: VIDEO_SEARCH_MAX_RESULTS,
          depth: "basic",
          signal,
        });
      } catch (error) {
        if (isAbortError(error, signal)) throw error;
        console.log(`   ⚠️ Video query "${query}" failed: ${describeError(error)}`);
        return;
      }

      let taken = 0;
      for (const video of hits.flatMap(videosFromHit)) {
        if (taken >= limit || videoSources.length >= settings.maxVideos) break;
        if (seen.has(video.url)) continue;
        seen.add(video.url);
        videoSources.push(video);
        taken++;
      }
    };

    for (const topic of view.topics) {
      if (videoSources.length >= settings.maxVideos) break;
      await collect(`${topic} video YouTube`, settings.maxVideosPerTopic);
    }

    if (videoSources.length === 0) {
      for (const template of settings.videoFallbackQueries) {
        if (videoSources.length >= settings.maxVideos) break;
        await collect(template.replaceAll("{objective}", view.objective), settings.maxVideos);
      }
    }

    console.log(`🎬 Found ${videoSources.length} video(s)`);
    return { videoSources };
  },
});
