import { Batch } from '../../protocol/batch';
import { RedisOp } from '../../protocol/operation';

/**
 * Surface shared by the connection, node and cluster clients.
 */
export interface RedisExecutor {
  /**
   * Resolves once the client is first ready. Work submitted earlier is queued.
   */
  readonly initialized: Promise<this>;
  executeBatch<A>(batch: Batch<A>, timeoutMs?: number): Promise<A>;
  executeOp<A>(op: RedisOp<A>, timeoutMs?: number): Promise<A>;
  /** Idempotent. Pending and later calls fail with `ClientStoppedError`. */
  close(): Promise<void>;
}

export const REDIS_EXECUTOR = 'REDIS_EXECUTOR';
