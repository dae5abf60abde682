export interface TextConstraints {
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
}

/**
 * One text-generation backend. Implementations reject with a ProviderError whose
 * kind tells the caller whether a fallback backend is worth trying.
 */
export interface TextGenerationPort {
  readonly name: string;
  generate(prompt: string, constraints?: TextConstraints): Promise<string>;
}
