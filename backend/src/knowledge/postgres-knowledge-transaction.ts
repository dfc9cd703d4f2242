import type { SqlExecutor } from '../database/index.js';
import type {
  KnowledgeTransactionRunner,
  KnowledgeWriteScope,
} from './knowledge-transaction.js';
import { PostgresDocumentRepository } from './postgres-document.repository.js';
import { PostgresIndexStore } from './postgres-index.store.js';

/**
 * One BEGIN/COMMIT around the work. The repository and index store handed to
 * it share the transaction's client.
 */
export class PostgresKnowledgeTransactionRunner
  implements KnowledgeTransactionRunner
{
  constructor(private readonly sql: SqlExecutor) {}

  run<T>(work: (scope: KnowledgeWriteScope) => Promise<T>): Promise<T> {
    return this.sql.transaction((sql) =>
      work({
        documents: new PostgresDocumentRepository(sql),
        index: new PostgresIndexStore(sql),
      }),
    );
  }
}
