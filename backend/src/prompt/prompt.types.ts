export const PROMPT_SLOTS = ['query', 'context', 'history'] as const;

export type PromptSlot = (typeof PROMPT_SLOTS)[number];

export interface PromptTemplate {
  readonly id: string;
  readonly text: string;
  readonly requiredSlots: readonly PromptSlot[];
}

export interface ConversationMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface BuildPromptOptions {
  history?: readonly ConversationMessage[];
  /** Context budget in whitespace tokens, provenance markers included. */
  tokenBudget?: number;
}

export interface BuiltPrompt {
  text: string;
  templateId: string;
  includedChunkIds: string[];
  truncated: boolean;
  contextTokens: number;
}

export const PROMPT_TEMPLATES_TOKEN = Symbol('PROMPT_TEMPLATES');
