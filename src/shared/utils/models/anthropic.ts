import { ChatAnthropic } from "@langchain/anthropic";
import { ConfigurationError } from "../../../research/errors";

interface AnthropicArgs {
  apiKey?: string;
  model?: string;
  temperature?: number;
}

export const claudeBase = (args: AnthropicArgs = {}): ChatAnthropic => {
  const apiKey = args.apiKey ?? process.env.ANTHROPIC_API_KEY;
  if (!apiKey) {
    throw new ConfigurationError("ANTHROPIC_API_KEY environment variable is not set.");
  }

  return new ChatAnthropic({
    model: args.model ?? "claude-sonnet-4-20250514",
    temperature: args.temperature ?? 0.2,
    maxTokens: 4096,
    apiKey,
    maxRetries: 2,
  });
};
