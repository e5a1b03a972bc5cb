import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import type { z } from "zod";
import { MalformedOutputError } from "../research/errors";
import type { CallOptions, StructuredModel } from "../research/services";

/**
 * StructuredModel over a LangChain chat model.
 *
 * withStructuredOutput binds the schema as a tool; the result is parsed again
 * here so anything that does not match fails instead of being coerced.
 */
export class ChatStructuredModel implements StructuredModel {
  constructor(private readonly model: BaseChatModel) {}

  async generate<T extends Record<string, unknown>>(
    schema: z.ZodType<T>,
    prompt: string,
    options: CallOptions = {}
  ): Promise<T> {
    const structured = this.model.withStructuredOutput(schema);
    const raw: unknown = await structured.invoke(prompt, { signal: options.signal });

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new MalformedOutputError(
        schema.description ?? "the response schema",
        parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      );
    }
    return parsed.data;
  }
}
