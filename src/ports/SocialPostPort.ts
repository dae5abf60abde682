export interface SocialPostPort {
  readonly platform: string;
  /** Resolves to the platform's id for the new post. */
  publish(content: string, imageReference?: string): Promise<string>;
}
