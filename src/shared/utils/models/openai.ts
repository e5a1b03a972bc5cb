import { ChatOpenAI } from "@langchain/openai";
import { ConfigurationError } from "../../../research/errors";

interface OpenAIArgs {
  apiKey?: string;
  model?: string;
  temperature?: number;
}

export const gptBase = (args: OpenAIArgs = {}): ChatOpenAI => {
  const apiKey = args.apiKey ?? process.env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new ConfigurationError("OPENAI_API_KEY environment variable is not set.");
  }

  return new ChatOpenAI({
    model: args.model ?? "gpt-4o",
    temperature: args.temperature ?? 0.2,
    apiKey,
    maxRetries: 2,
  });
};
