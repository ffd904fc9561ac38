import { GoogleGenerativeAI, SchemaType, type Schema } from "@google/generative-ai";
import { tryParseJson, type DecisionCall, type DecisionClient, type ModelOutput } from "../requester";

const DEFAULT_GEMINI_MODEL = "gemini-2.0-flash";

const stringList: Schema = { type: SchemaType.ARRAY, items: { type: SchemaType.STRING } };

const DECISION_SCHEMA: Schema = {
  type: SchemaType.OBJECT,
  properties: {
    scamDetected: {
      type: SchemaType.BOOLEAN,
      description: "True ONLY for clear scams. False for standard OTPs and receipts."
    },
    conversationStatus: {
      type: SchemaType.STRING,
      format: "enum",
      enum: ["ONGOING", "FINISHED"],
      description: "FINISHED once enough intelligence is found, ONGOING to get more."
    },
    replyText: {
      type: SchemaType.STRING,
      description: "Reply to the sender. Empty string if safe."
    },
    extractedIntelligence: {
      type: SchemaType.OBJECT,
      properties: {
        bankAccounts: stringList,
        upiIds: stringList,
        phishingLinks: stringList,
        phoneNumbers: stringList,
        suspiciousKeywords: stringList
      },
      required: ["bankAccounts", "upiIds", "phishingLinks", "phoneNumbers", "suspiciousKeywords"]
    },
    agentNotes: {
      type: SchemaType.STRING,
      description: "Persona used and reasoning."
    }
  },
  required: ["scamDetected", "conversationStatus", "replyText", "extractedIntelligence", "agentNotes"]
};

export class GeminiDecisionClient implements DecisionClient {
  readonly name = "gemini";
  private readonly client: GoogleGenerativeAI;
  private readonly modelName: string;

  constructor(apiKey: string, modelName: string = DEFAULT_GEMINI_MODEL) {
    if (!apiKey) {
      throw new Error("GEMINI_API_KEY not set");
    }
    this.client = new GoogleGenerativeAI(apiKey);
    this.modelName = modelName;
  }

  async generate(call: DecisionCall): Promise<ModelOutput> {
    const model = this.client.getGenerativeModel({
      model: this.modelName,
      systemInstruction: call.systemPrompt,
      generationConfig: {
        responseMimeType: "application/json",
        responseSchema: DECISION_SCHEMA,
        temperature: 0.4,
        maxOutputTokens: call.maxOutputTokens
      }
    });
    const result = await model.generateContent(call.prompt, { signal: call.signal });
    const text = result.response.text();
    return { parsed: tryParseJson(text), text };
  }
}
