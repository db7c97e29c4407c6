import { KnowledgeStore } from "../knowledge/KnowledgeStore.js";
import { createRootLogger, type Logger } from "../telemetry/logger.js";

export function silentLogger(): Logger {
  const l = createRootLogger("error");
  l.silent = true;
  return l;
}

export function storeOf(doc: unknown, sourceName = "faq.json"): KnowledgeStore {
  return KnowledgeStore.fromDocument(doc, sourceName, { logger: silentLogger() });
}

export const passwordDoc = {
  faqs: [{ id: "reset_password", question: "how do I reset my password", answer: "Use the reset link." }],
};

export const sampleDoc = {
  faqs: [
    {
      id: "reset_password",
      question: "How do I reset my password?",
      aliases: ["forgot password"],
      answer: "Use the reset link.",
      instruction: "Mention the email delay.",
      links: [{ label: "Sign in", url: "/login" }],
    },
    {
      id: "create_account",
      question: "How do I create an account?",
      aliases: ["sign up"],
      answer: "Choose Sign up.",
      clarify: "Ask which plan they want.",
    },
    { id: "empty_answer", question: "what is the meaning of life", answer: "" },
  ],
  fallback: {
    ask: "No idea, sorry.",
    instruction: "Ask them to rephrase.",
    contact: { label: "Contact", url: "/contact" },
  },
};
