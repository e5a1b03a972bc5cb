import { buildPlannerPrompt } from "../prompts";
import { defineStage } from "../stage";
import { SearchPlanSchema, StageName } from "../types";

/**
 * Plan Stage - turn the exploration headlines into 3-5 search queries
 */
export const planStage = defineStage({
  name: StageName.PLAN,
  reads: ["explorationResults", "objective", "context"],
  writes: ["topics", "planningReasoning"],
  async run(view, { services, signal }) {
    const prompt = buildPlannerPrompt({
      objective: view.objective,
      context: view.context,
      explorationResults: view.explorationResults,
    });

    const plan = await services.reasoningModel.generate(SearchPlanSchema, prompt, { signal });
    const topics = plan.topics.map((topic) => topic.trim()).filter((topic) => topic.length > 0);

    console.log(`🧭 Planned ${topics.length} topic(s):`);
    topics.forEach((topic, i) => console.log(`   ${i + 1}. ${topic}`));

    return { topics, planningReasoning: plan.reasoning };
  },
});
