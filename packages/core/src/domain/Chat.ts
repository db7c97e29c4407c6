import type { LinkItem } from "./Knowledge.js";

export type ResponseType =
  | "text"
  | "text_with_links"
  | "text_with_action"
  | "text_with_follow_up";

export interface SourceDocument {
  source: string; // e.g. "faq.json::reset_password"
  snippet: string | null;
  score: number | null;
}

/** Template answer before any generative rewrite. */
export interface ChatAnswer {
  templateAnswer: string;
  instruction?: string;
  clarify?: string;
  links: LinkItem[];
  sources: SourceDocument[];
}

export interface ChatRequest {
  question: string;
  conversation_id?: string;
  max_references: number; // 1-10
}

// Reserved for clients; the responder never fills these in.
export interface ActionPayload {
  name: string;
  method: string;
  endpoint: string;
  parameters?: Record<string, unknown>;
}

export interface FollowUpField {
  name: string;
  label: string;
  input_type: string; // text, email, password, otp
  required: boolean;
}

export interface FollowUpRequest {
  prompt: string;
  fields: FollowUpField[];
}

export interface ChatResponse {
  answer: string;
  sources: SourceDocument[];
  conversation_id: string | null;
  response_type: ResponseType;
  links: LinkItem[];
  action: ActionPayload | null;
  follow_up: FollowUpRequest | null;
}
