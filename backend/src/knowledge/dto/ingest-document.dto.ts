import { z } from 'zod';

const BASE64_PATTERN = /^[A-Za-z0-9+/\s]*={0,2}\s*$/;

export const ingestDocumentSchema = z.object({
  sourceUri: z.string().trim().min(1, 'sourceUri is required'),
  mimeType: z.string().trim().min(1, 'mimeType is required'),
  content: z
    .string()
    .min(1, 'content is required')
    .regex(BASE64_PATTERN, 'content must be base64 encoded'),
  title: z.string().trim().min(1).optional(),
  metadata: z.record(z.unknown()).optional(),
});

export const ingestBatchSchema = z.object({
  documents: z
    .array(ingestDocumentSchema)
    .min(1, 'at least one document is required'),
});

export type IngestDocumentDto = z.infer<typeof ingestDocumentSchema>;
export type IngestBatchDto = z.infer<typeof ingestBatchSchema>;
