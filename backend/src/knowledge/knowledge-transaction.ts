import type {
  DocumentRepository,
  InMemoryDocumentRepository,
} from './document.repository.js';
import type { IndexStore } from './index-store.js';
import type { InMemoryIndexStore } from './in-memory-index.store.js';

/** Repository and index that write through the same transaction. */
export interface KnowledgeWriteScope {
  documents: DocumentRepository;
  index: IndexStore;
}

/**
 * Runs a group of document and index writes as one unit: all of them are
 * applied, or none are.
 */
export interface KnowledgeTransactionRunner {
  run<T>(work: (scope: KnowledgeWriteScope) => Promise<T>): Promise<T>;
}

export const KNOWLEDGE_TRANSACTION_TOKEN = Symbol('KNOWLEDGE_TRANSACTION');

/**
 * Units run one at a time; a failing unit puts both stores back to the
 * snapshot taken before it started.
 */
export class InMemoryKnowledgeTransactionRunner
  implements KnowledgeTransactionRunner
{
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly documents: InMemoryDocumentRepository,
    private readonly index: InMemoryIndexStore,
  ) {}

  run<T>(work: (scope: KnowledgeWriteScope) => Promise<T>): Promise<T> {
    const unit = this.queue.then(() => this.apply(work));
    this.queue = unit.then(
      () => undefined,
      () => undefined,
    );
    return unit;
  }

  private async apply<T>(
    work: (scope: KnowledgeWriteScope) => Promise<T>,
  ): Promise<T> {
    const documents = this.documents.snapshot();
    const entries = this.index.snapshot();
    try {
      return await work({ documents: this.documents, index: this.index });
    } catch (error) {
      this.documents.restore(documents);
      this.index.restore(entries);
      throw error;
    }
  }
}
