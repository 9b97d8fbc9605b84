import {
  ErrorReplyError,
  OptimisticLockError,
  UnexpectedReplyError,
} from '../../common/errors/redis.errors';
import { atomic, mapBatch, rawBatch, sequence, transaction } from '../batch';
import { get, incr, ping, set } from '../commands';
import { ErrorReply } from '../reply';

describe('Batch', () => {
  describe('sequence', () => {
    it('should decode SET then GET into both results', () => {
      const combined = sequence(set('k', 'v'), get('k'));

      expect(combined.commands.map((command) => command.args)).toEqual([
        ['SET', 'k', 'v'],
        ['GET', 'k'],
      ]);
      expect(combined.transactional).toBe(false);
      expect(combined.decode(['OK', 'v'])).toEqual(['OK', 'v']);
    });

    it('should hand each batch its own slice of replies', () => {
      const combined = sequence(rawBatch([...ping().commands, ...ping().commands]), get('missing'));

      expect(combined.decode(['PONG', 'PONG', null])).toEqual([['PONG', 'PONG'], null]);
    });

    it('should join a list of batches of the same type', () => {
      const combined = sequence(...['a', 'b', 'c'].map((key) => incr(key)));

      expect(combined.decode([1, 2, 3])).toEqual([1, 2, 3]);
    });
  });

  describe('mapBatch', () => {
    it('should transform the decoded value', () => {
      const source = get('k');
      const length = mapBatch(source, (value) => (value ?? '').length);

      expect(length.commands).toBe(source.commands);
      expect(length.decode(['hello'])).toBe(5);
    });
  });

  describe('transaction', () => {
    const tx = transaction(sequence(set('k', 'v'), incr('n')));

    it('should wrap the commands in MULTI and EXEC', () => {
      expect(tx.transactional).toBe(true);
      expect(tx.commands.map((command) => command.args.join(' '))).toEqual([
        'MULTI',
        'SET k v',
        'INCR n',
        'EXEC',
      ]);
    });

    it('should decode the EXEC reply with the inner decoder', () => {
      expect(tx.decode(['OK', 'QUEUED', 'QUEUED', ['OK', 3]])).toEqual(['OK', 3]);
    });

    it('should fail with OptimisticLockError when EXEC returns null', () => {
      expect(() => tx.decode(['OK', 'QUEUED', 'QUEUED', null])).toThrow(OptimisticLockError);
    });

    it('should surface an error reply to a queued command', () => {
      const replies = [
        'OK',
        'QUEUED',
        new ErrorReply('ERR wrong number of arguments'),
        new ErrorReply('EXECABORT Transaction discarded because of previous errors.'),
      ];

      expect(() => tx.decode(replies)).toThrow(new ErrorReplyError('ERR wrong number of arguments'));
    });

    it('should reject an EXEC reply of the wrong size', () => {
      expect(() => tx.decode(['OK', 'QUEUED', 'QUEUED', ['OK']])).toThrow(UnexpectedReplyError);
    });

    it('should not wrap a transaction twice', () => {
      expect(transaction(tx)).toBe(tx);
    });
  });

  describe('atomic', () => {
    it('should leave a single command unwrapped', () => {
      const single = get('k');

      expect(atomic(single)).toBe(single);
    });

    it('should wrap several commands in a transaction', () => {
      const wrapped = atomic(sequence(set('a', '1'), set('b', '2')));

      expect(wrapped.transactional).toBe(true);
      expect(wrapped.commands).toHaveLength(4);
    });
  });
});
