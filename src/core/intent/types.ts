export type Intent =
  | 'system_status'
  | 'voice_test'
  | 'help'
  | 'auto_reply_status'
  | 'general_query'
  | 'text_generation'
  | 'create_image'
  | 'social_post'
  | 'reply_generation';

/** Intents the model is allowed to pick for a user command. */
export const COMMAND_INTENTS = [
  'general_query',
  'text_generation',
  'create_image',
  'social_post',
  'auto_reply_status',
  'system_status',
  'help',
  'voice_test',
] as const satisfies readonly Intent[];

export type IntentParameters = Record<string, string>;

export interface IntentClassification {
  intent: Intent;
  parameters: IntentParameters;
  /** pattern = fast path, model = LLM guess, fallback = general_query after a failed guess */
  source: 'pattern' | 'model' | 'fallback';
}
