import { Logger } from '@nestjs/common';
import { MessageLoop } from '../message-loop';

class RecordingLoop extends MessageLoop<number> {
  protected readonly logger = new Logger(RecordingLoop.name);
  readonly seen: number[] = [];

  protected receive(message: number): void {
    this.seen.push(message);
    if (message === 1) {
      this.tell(3);
      this.seen.push(2);
    }
    if (message === 4) {
      throw new Error('boom');
    }
  }
}

describe('MessageLoop', () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it('should finish the current message before handling one told meanwhile', () => {
    const loop = new RecordingLoop();

    loop.tell(1);

    expect(loop.seen).toEqual([1, 2, 3]);
  });

  it('should log a failing message and keep going', () => {
    const loop = new RecordingLoop();

    loop.tell(4);
    loop.tell(5);

    expect(loop.seen).toEqual([4, 5]);
    expect(errorSpy).toHaveBeenCalledWith('Failed to handle message: boom', expect.any(String));
  });
});
