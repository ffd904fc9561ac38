import OpenAI from "openai";
import { DECISION_JSON_SCHEMA } from "../prompt";
import { tryParseJson, type DecisionCall, type DecisionClient, type ModelOutput } from "../requester";

const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";

export class OpenAIDecisionClient implements DecisionClient {
  readonly name = "openai";
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(apiKey: string, model: string = DEFAULT_OPENAI_MODEL) {
    if (!apiKey) {
      throw new Error("OPENAI_API_KEY not set");
    }
    // Retries are owned by the requester, which only retries rate limits.
    this.client = new OpenAI({ apiKey, maxRetries: 0 });
    this.model = model;
  }

  async generate(call: DecisionCall): Promise<ModelOutput> {
    const response = await this.client.responses.create(
      {
        model: this.model,
        instructions: call.systemPrompt,
        input: call.prompt,
        max_output_tokens: call.maxOutputTokens,
        temperature: 0.4,
        text: {
          format: {
            type: "json_schema",
            name: "agent_decision",
            strict: true,
            schema: DECISION_JSON_SCHEMA
          }
        }
      },
      { signal: call.signal }
    );
    const text = response.output_text?.trim() || "";
    return { parsed: tryParseJson(text), text };
  }
}
