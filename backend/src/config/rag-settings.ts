import { z } from 'zod';

export const boundaryPolicySchema = z.enum(['sentence', 'paragraph', 'fixed']);

export const tieBreakPolicySchema = z.enum(['sequence-index', 'chunk-id']);

export const ragSettingsSchema = z.object({
  chunking: z
    .object({
      maxTokens: z.number().int().positive(),
      overlapTokens: z.number().int().nonnegative(),
      minTokens: z.number().int().positive().optional(),
      boundaryPolicy: boundaryPolicySchema,
    })
    .superRefine((chunking, ctx) => {
      if (chunking.overlapTokens >= chunking.maxTokens) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['overlapTokens'],
          message: 'overlapTokens must be smaller than maxTokens',
        });
      }
      if (
        chunking.minTokens !== undefined &&
        chunking.minTokens > chunking.maxTokens
      ) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['minTokens'],
          message: 'minTokens must not exceed maxTokens',
        });
      }
    }),
  retrieval: z
    .object({
      semanticWeight: z.number().nonnegative(),
      lexicalWeight: z.number().nonnegative(),
      candidateMultiplier: z.number().int().positive(),
      defaultTopK: z.number().int().positive(),
      tieBreak: tieBreakPolicySchema,
    })
    .refine(
      (retrieval) => retrieval.semanticWeight + retrieval.lexicalWeight > 0,
      'at least one fusion weight must be positive',
    ),
  prompt: z.object({
    templateId: z.string().trim().min(1),
    contextTokenBudget: z.number().int().positive(),
  }),
  generation: z.object({
    model: z.string().trim().min(1).optional(),
    temperature: z.number().min(0).max(2),
    maxOutputTokens: z.number().int().positive().optional(),
    maxRetries: z.number().int().nonnegative(),
    baseDelayMs: z.number().int().positive(),
    maxDelayMs: z.number().int().positive(),
    deadlineMs: z.number().int().positive(),
  }),
});

export type RagSettings = z.infer<typeof ragSettingsSchema>;
export type ChunkingSettings = RagSettings['chunking'];
export type RetrievalSettings = RagSettings['retrieval'];
export type PromptSettings = RagSettings['prompt'];
export type GenerationSettings = RagSettings['generation'];

export const DEFAULT_RAG_SETTINGS: RagSettings = {
  chunking: {
    maxTokens: 256,
    overlapTokens: 32,
    boundaryPolicy: 'sentence',
  },
  retrieval: {
    semanticWeight: 0.5,
    lexicalWeight: 0.5,
    candidateMultiplier: 2,
    defaultTopK: 6,
    tieBreak: 'sequence-index',
  },
  prompt: {
    templateId: 'grounded-answer',
    contextTokenBudget: 1500,
  },
  generation: {
    temperature: 0.2,
    maxRetries: 3,
    baseDelayMs: 500,
    maxDelayMs: 8000,
    deadlineMs: 60000,
  },
};

/**
 * Sections are merged shallowly over the current snapshot and the result is
 * validated as a whole, so a patch may carry loosely typed values.
 */
export type RagSettingsPatch = {
  [Section in keyof RagSettings]?: Record<string, unknown>;
};
