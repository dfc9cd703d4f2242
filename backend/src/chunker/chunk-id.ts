import { createHash } from 'node:crypto';

export function chunkIdFor(documentId: string, sequenceIndex: number): string {
  return createHash('sha256')
    .update(`${documentId}#${sequenceIndex}`)
    .digest('hex')
    .slice(0, 32);
}
