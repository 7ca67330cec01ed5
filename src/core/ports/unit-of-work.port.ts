/**
 * Unit of Work Port
 *
 * One database transaction and the repository bound to it. Nothing written
 * through `repository` is durable until `commit()` resolves.
 */

import type { HrRepositoryPort } from "./hr-repository.port.js";

export interface TransactionPort {
  readonly repository: HrRepositoryPort;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

export interface UnitOfWorkPort {
  begin(): Promise<TransactionPort>;
}
