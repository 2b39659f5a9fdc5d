import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import { flushLogger, getLogger, initLogger } from '../logger';

describe('logger', () => {
  it('should resolve a flush before any logger exists', async () => {
    await flushLogger();
  });

  it('should tag lines with the module and flush them before resolving', async () => {
    const lines: Array<{ module?: string; msg: string }> = [];
    let flushed = 0;
    const destination = {
      write(chunk: string) {
        const entry: { module?: string; msg: string } = JSON.parse(chunk);
        lines.push({ module: entry.module, msg: entry.msg });
      },
      flush(cb: (err?: Error) => void) {
        flushed++;
        cb();
      },
    };
    initLogger({ level: 'info', pretty: false, destination });

    getLogger('Link').info('Stopped');
    getLogger('Link').debug('hidden');
    await flushLogger();

    assert.deepEqual(lines, [{ module: 'Link', msg: 'Stopped' }]);
    assert.equal(flushed, 1);
  });

  it('should reject when the destination fails to flush', async () => {
    const destination = {
      write(_chunk: string) {},
      flush(cb: (err?: Error) => void) {
        cb(new Error('disk full'));
      },
    };
    initLogger({ level: 'info', pretty: false, destination });
    await assert.rejects(flushLogger(), /disk full/);
  });
});
