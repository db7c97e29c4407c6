import type { ChatRequest, ChatResponse } from "../domain/Chat.js";
import { toResponderError, type ResponderError } from "../domain/errors.js";
import type { GeneratorPort, KnowledgeStoreProvider } from "../ports/index.js";
import { match } from "../matching/matcher.js";
import { moduleLogger, type Logger } from "../telemetry/logger.js";
import { composeAnswer, responseTypeFor } from "./composeAnswer.js";
import { rewriteAnswer } from "./rewrite.js";

export const DEFAULT_MIN_SCORE = 0.45;

export interface ResponderConfig {
  store: KnowledgeStoreProvider;
  generator?: GeneratorPort; // omitted: template answers are returned verbatim
  minScore?: number;
  logger?: Logger;
}

export type AskOutcome =
  | { ok: true; response: ChatResponse }
  | { ok: false; error: ResponderError };

export interface Responder {
  ask(request: ChatRequest): Promise<AskOutcome>;
}

export function createResponder(cfg: ResponderConfig): Responder {
  const minScore = cfg.minScore ?? DEFAULT_MIN_SCORE;
  const logger = cfg.logger ?? moduleLogger("responder");

  async function answer(req: ChatRequest): Promise<ChatResponse> {
    const store = await cfg.store.get();
    const best = match(req.question, store);
    const result = composeAnswer(store, best, { minScore, maxSources: req.max_references });

    if (!best.entry || best.score < minScore) {
      logger.info("No knowledge base match", { question: req.question, score: best.score });
    }

    const text = cfg.generator
      ? await rewriteAnswer(cfg.generator, req.question, result, logger)
      : result.templateAnswer;

    return {
      answer: text,
      sources: result.sources,
      conversation_id: req.conversation_id ?? null,
      response_type: responseTypeFor(result.links),
      links: result.links,
      action: null,
      follow_up: null,
    };
  }

  return {
    async ask(req: ChatRequest): Promise<AskOutcome> {
      try {
        return { ok: true, response: await answer(req) };
      } catch (err) {
        const error = toResponderError(err);
        if (error.kind === "internal") {
          logger.error(`Unexpected error while answering: ${error.message}`);
        }
        return { ok: false, error };
      }
    },
  };
}
