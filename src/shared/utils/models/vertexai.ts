import { ChatVertexAI } from "@langchain/google-vertexai";
import { ConfigurationError } from "../../../research/errors";

interface GeminiArgs {
  credentialsPath?: string;
  model?: string;
  temperature?: number;
}

type ChatVertexAIFields = NonNullable<ConstructorParameters<typeof ChatVertexAI>[0]>;

/**
 * Constructor fields for Gemini; the service account key file is handed to
 * google-auth explicitly, so it need not be in process.env.
 */
export const geminiFields = (args: GeminiArgs = {}): ChatVertexAIFields => {
  const keyFilename = args.credentialsPath ?? process.env.GOOGLE_APPLICATION_CREDENTIALS;
  if (!keyFilename) {
    throw new ConfigurationError(
      "GOOGLE_APPLICATION_CREDENTIALS environment variable is not set. " +
      "Gemini cannot be initialized. Ensure it's set to the path of your service account key file."
    );
  }

  return {
    model: args.model ?? "gemini-2.5-pro",
    temperature: args.temperature ?? 0.2,
    maxRetries: 2,
    authOptions: { keyFilename },
  };
};

export const geminiBase = (args: GeminiArgs = {}): ChatVertexAI => new ChatVertexAI(geminiFields(args));
