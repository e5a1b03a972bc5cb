import { defineStage } from "../stage";
import { StageName } from "../types";

/**
 * Retry Update Stage - the next search pass covers exactly what the
 * evaluator said was missing
 */
export const retryUpdateStage = defineStage({
  name: StageName.RETRY_UPDATE,
  reads: ["evaluation"],
  writes: ["topics"],
  async run(view) {
    if (!view.evaluation) return {};
    console.log(`🔄 Next topics: ${view.evaluation.missingTopics.join(", ") || "(none)"}`);
    return { topics: [...view.evaluation.missingTopics] };
  },
});
