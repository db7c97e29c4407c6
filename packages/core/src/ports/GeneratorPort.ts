export interface GenerateRequest {
  systemPrompt: string;
  userPrompt: string;
}

/**
 * Text-generation capability used to rewrite template answers.
 * Implementations throw ConfigurationError when they cannot run at all
 * (no credential) and ProviderError when a call fails.
 */
export interface GeneratorPort {
  generate(req: GenerateRequest): Promise<string>;
}
