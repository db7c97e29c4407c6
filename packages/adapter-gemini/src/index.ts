import {
  GoogleGenerativeAI,
  type GenerateContentRequest,
  type SingleRequestOptions,
} from "@google/generative-ai";
import {
  ConfigurationError,
  ProviderError,
  errorMessage,
  type GenerateRequest,
  type GeneratorPort,
} from "@faqbot/core";

/** The slice of GenerativeModel this adapter calls. */
export interface ContentModel {
  generateContent(
    request: GenerateContentRequest,
    options: SingleRequestOptions
  ): Promise<{ response: { text(): string } }>;
}

export interface GeminiGeneratorOptions {
  apiKey?: string;      // default: process.env.GEMINI_API_KEY
  model?: string;       // default: process.env.GEMINI_MODEL || "gemini-1.5-flash"
  temperature?: number; // default: 0.3
  timeoutMs?: number;   // default: 15000
  // allow DI for tests
  createModel?: (apiKey: string, systemInstruction: string) => ContentModel;
}

export function makeGeminiGenerator(opts: GeminiGeneratorOptions = {}): GeneratorPort {
  const apiKey = opts.apiKey ?? process.env.GEMINI_API_KEY;
  const modelId = opts.model ?? process.env.GEMINI_MODEL ?? "gemini-1.5-flash";
  const temperature = opts.temperature ?? 0.3;
  const timeoutMs = Math.max(1000, opts.timeoutMs ?? 15000);

  const createModel =
    opts.createModel ??
    ((key: string, systemInstruction: string): ContentModel =>
      new GoogleGenerativeAI(key).getGenerativeModel({
        model: modelId,
        systemInstruction,
        generationConfig: { temperature },
      }));

  return {
    async generate({ systemPrompt, userPrompt }: GenerateRequest): Promise<string> {
      // key is checked per call; building the generator never fails
      if (!apiKey) {
        throw new ConfigurationError("GEMINI_API_KEY is not configured; unable to generate assistant responses.");
      }
      const model = createModel(apiKey, systemPrompt);

      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), timeoutMs);

      try {
        const res = await model.generateContent(
          { contents: [{ role: "user", parts: [{ text: userPrompt }] }] },
          { signal: controller.signal }
        );
        return res.response.text().trim();
      } catch (err) {
        if (controller.signal.aborted) {
          throw new ProviderError(`Gemini request timed out after ${timeoutMs}ms`, { cause: err });
        }
        throw new ProviderError(describeFailure(modelId, err), { cause: err });
      } finally {
        clearTimeout(timer);
      }
    },
  };
}

/* ---------------- helpers ---------------- */

function describeFailure(modelId: string, err: unknown): string {
  const status = statusOf(err);
  // Helpful hint if model id is wrong (404)
  if (status === 404) return `Gemini model not found: check GEMINI_MODEL (${modelId})`;
  const prefix = status ? `Gemini request failed with status ${status}` : "Gemini request failed";
  return `${prefix}: ${errorMessage(err)}`;
}

function statusOf(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}
