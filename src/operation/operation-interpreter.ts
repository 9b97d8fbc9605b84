import { Logger } from '@nestjs/common';
import { ConnectionUnit, ReservationToken } from '../connection/connection-unit';
import { AbortedOperationError, toError } from '../common/errors/redis.errors';
import { Deferred, deferred } from '../common/utils/deferred';
import { OpFailure, OpResult, OpSuccess, RedisOp } from '../protocol/operation';
import { RawReply } from '../protocol/reply';
import { withTimeout } from '../common/utils/timeout';

/**
 * Runs one `RedisOp` against one connection unit, holding the unit's
 * reservation from the first step until the single response.
 * One instance serves exactly one operation.
 */
export class OperationInterpreter<A> {
  private readonly logger = new Logger(OperationInterpreter.name);
  private readonly token = new ReservationToken();
  private response: Deferred<OpResult<A>> | null = null;
  private responded = false;
  private unsubscribe: () => void = () => undefined;

  constructor(private readonly connection: ConnectionUnit) {}

  run(op: RedisOp<A>): Promise<OpResult<A>> {
    if (this.response) {
      return Promise.reject(new Error('OperationInterpreter already runs an operation'));
    }
    const response = deferred<OpResult<A>>();
    this.response = response;

    this.unsubscribe = this.connection.onTerminated((cause) =>
      this.abort('connection terminated', cause),
    );
    // A unit that is already closed calls the listener at once, aborting the operation.
    if (!this.responded) {
      void this.drive(op);
    }
    return response.promise;
  }

  /**
   * Tears the operation down: the caller gets an `AbortedOperationError` and
   * the connection is released. No-op once a response was sent.
   */
  abort(reason: string, cause?: unknown): void {
    if (this.response && !this.responded) {
      this.respond(new OpFailure(new AbortedOperationError(reason, cause)));
    }
  }

  get finished(): boolean {
    return this.responded;
  }

  private async drive(op: RedisOp<A>): Promise<void> {
    let current = op;
    let reserving = true;

    for (;;) {
      const commands = current.kind === 'leaf' ? current.batch.commands : current.step.commands;

      let replies: RawReply[];
      try {
        replies = reserving
          ? await this.connection.reserving(commands, this.token)
          : await this.connection.execute(commands, this.token);
      } catch (error) {
        if (!this.responded) {
          this.respond(new OpFailure(toError(error)));
        }
        return;
      }
      reserving = false;

      if (this.responded) {
        // Aborted while the step was in flight; its reply is dropped.
        return;
      }

      try {
        if (current.kind === 'leaf') {
          this.respond(new OpSuccess(current.batch.decode(replies)));
          return;
        }
        current = current.step.decode(replies);
      } catch (error) {
        this.respond(new OpFailure(toError(error)));
        return;
      }
    }
  }

  private respond(result: OpResult<A>): void {
    if (this.responded || !this.response) {
      throw new Error('OperationInterpreter responded more than once');
    }
    this.responded = true;
    this.logger.debug(
      `Responding with ${result.ok ? 'success' : `failure: ${result.cause.message}`}`,
    );

    this.unsubscribe();
    this.connection.release(this.token);
    this.response.resolve(result);
  }
}

/**
 * Runs `op` on its own interpreter. When the caller's timeout expires the
 * interpreter is aborted, which releases the connection.
 */
export async function executeOperation<A>(
  connection: ConnectionUnit,
  op: RedisOp<A>,
  timeoutMs: number,
): Promise<A> {
  const interpreter = new OperationInterpreter<A>(connection);
  const result = await withTimeout(interpreter.run(op), timeoutMs, () =>
    interpreter.abort(`timed out after ${timeoutMs}ms`),
  );
  return result.get();
}
