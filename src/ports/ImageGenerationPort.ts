export interface ImageGenerationPort {
  readonly name: string;
  /** Resolves to a reference (local file path) for the stored image. */
  generate(prompt: string): Promise<string>;
}
