import type { ChatAnswer } from "../domain/Chat.js";
import { ConfigurationError, errorMessage } from "../domain/errors.js";
import type { GeneratorPort } from "../ports/GeneratorPort.js";
import { moduleLogger, type Logger } from "../telemetry/logger.js";
import { buildRewritePrompt } from "./prompt.js";

/**
 * Asks the generator for a natural reply. Any failure other than missing
 * configuration returns the template answer unchanged; there is no retry.
 */
export async function rewriteAnswer(
  generator: GeneratorPort,
  question: string,
  answer: ChatAnswer,
  logger: Logger = moduleLogger("rewrite")
): Promise<string> {
  const prompt = buildRewritePrompt(question, answer);

  let reply: string;
  try {
    reply = await generator.generate(prompt);
  } catch (err) {
    if (err instanceof ConfigurationError) throw err;
    logger.error(`Generative rewrite failed, using template answer: ${errorMessage(err)}`);
    return answer.templateAnswer;
  }

  const text = reply.trim();
  return text || answer.templateAnswer;
}
