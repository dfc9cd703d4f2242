import type { KnowledgeDocument } from './knowledge.types.js';

export interface DocumentRepository {
  findById(id: string): Promise<KnowledgeDocument | null>;
  findLatestBySourceUri(sourceUri: string): Promise<KnowledgeDocument | null>;
  save(document: KnowledgeDocument): Promise<KnowledgeDocument>;
  list(): Promise<KnowledgeDocument[]>;
  remove(id: string): Promise<boolean>;
}

export const DOCUMENT_REPOSITORY_TOKEN = Symbol('DOCUMENT_REPOSITORY');

export class InMemoryDocumentRepository implements DocumentRepository {
  private readonly documents = new Map<string, KnowledgeDocument>();

  async findById(id: string): Promise<KnowledgeDocument | null> {
    await Promise.resolve();
    return this.documents.get(id) ?? null;
  }

  async findLatestBySourceUri(
    sourceUri: string,
  ): Promise<KnowledgeDocument | null> {
    await Promise.resolve();
    let latest: KnowledgeDocument | null = null;
    for (const document of this.documents.values()) {
      if (
        document.sourceUri === sourceUri &&
        (!latest || document.version > latest.version)
      ) {
        latest = document;
      }
    }
    return latest;
  }

  async save(document: KnowledgeDocument): Promise<KnowledgeDocument> {
    await Promise.resolve();
    const stored = Object.freeze({
      ...document,
      metadata: Object.freeze({ ...document.metadata }),
    });
    this.documents.set(document.id, stored);
    return stored;
  }

  async list(): Promise<KnowledgeDocument[]> {
    await Promise.resolve();
    return [...this.documents.values()].sort(
      (left, right) => right.ingestedAt.getTime() - left.ingestedAt.getTime(),
    );
  }

  async remove(id: string): Promise<boolean> {
    await Promise.resolve();
    return this.documents.delete(id);
  }

  snapshot(): ReadonlyMap<string, KnowledgeDocument> {
    return new Map(this.documents);
  }

  restore(snapshot: ReadonlyMap<string, KnowledgeDocument>): void {
    this.documents.clear();
    for (const [id, document] of snapshot) {
      this.documents.set(id, document);
    }
  }
}
