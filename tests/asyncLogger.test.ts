import { enqueueLog } from '../src/asyncLogger';
import logger from '../src/logger';
import { loggingQueue } from '../src/queues';

describe('asyncLogger and loggingQueue drain', () => {
  test('enqueueLog schedules a log and drain waits for it', async () => {
    const spy = jest.spyOn(logger, 'log').mockImplementation(() => logger);

    enqueueLog('info', 'test-message-1');
    enqueueLog('warn', 'test-message-2');
    expect(spy).not.toHaveBeenCalled();

    await loggingQueue.drain();

    expect(spy).toHaveBeenNthCalledWith(1, expect.objectContaining({ level: 'info', message: 'test-message-1' }));
    expect(spy).toHaveBeenNthCalledWith(2, expect.objectContaining({ level: 'warn', message: 'test-message-2' }));
    spy.mockRestore();
  });
});
