import type { ResponderError } from "@faqbot/core";

export interface ErrorBody {
  detail: string;
}

/** Load and configuration problems are 503; anything else stays opaque. */
export function toHttpError(error: ResponderError): { status: number; body: ErrorBody } {
  switch (error.kind) {
    case "load":
    case "configuration":
      return { status: 503, body: { detail: error.message } };
    case "provider":
    case "internal":
      return { status: 500, body: { detail: "Unexpected error while processing the chat request." } };
  }
}
