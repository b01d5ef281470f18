import { expect } from 'chai';
import { describe, it } from 'mocha';
import sinon from 'sinon';
import { anySignal, raceWithAbort, shutdownSignal } from '../src/lib/abort';
import { rejectionOf } from './helpers';

describe('abort helpers', () => {
  describe('raceWithAbort', () => {
    it('should pass the operation through without a signal', async () => {
      expect(await raceWithAbort(Promise.resolve('ok'), undefined)).to.equal(
        'ok'
      );
    });

    it('should resolve when the operation wins', async () => {
      const controller = new AbortController();
      const onAbort = sinon.spy();

      const value = await raceWithAbort(
        Promise.resolve(42),
        controller.signal,
        onAbort
      );
      controller.abort();

      expect(value).to.equal(42);
      expect(onAbort.notCalled).to.be.true;
    });

    it('should reject with the reason and run the teardown', async () => {
      const controller = new AbortController();
      const reason = new Error('cancelled');
      const onAbort = sinon.spy();

      const pending = raceWithAbort(
        new Promise<never>(() => {}),
        controller.signal,
        onAbort
      );
      controller.abort(reason);

      expect(await rejectionOf(pending)).to.equal(reason);
      expect(onAbort.calledOnce).to.be.true;
    });

    it('should reject at once on an aborted signal', async () => {
      const controller = new AbortController();
      const reason = new Error('cancelled');
      controller.abort(reason);
      const onAbort = sinon.spy();

      const error = await rejectionOf(
        raceWithAbort(Promise.reject(new Error('late')), controller.signal, onAbort)
      );

      expect(error).to.equal(reason);
      expect(onAbort.calledOnce).to.be.true;
    });
  });

  describe('anySignal', () => {
    it('should follow the first signal to abort', () => {
      const first = new AbortController();
      const second = new AbortController();
      const reason = new Error('timeout');

      const combined = anySignal(first.signal, undefined, second.signal);
      expect(combined.aborted).to.be.false;

      second.abort(reason);

      expect(combined.aborted).to.be.true;
      expect(combined.reason).to.equal(reason);
    });

    it('should start aborted when an input already is', () => {
      const controller = new AbortController();
      const reason = new Error('cancelled');
      controller.abort(reason);

      const combined = anySignal(undefined, controller.signal);

      expect(combined.aborted).to.be.true;
      expect(combined.reason).to.equal(reason);
    });
  });

  describe('shutdownSignal', () => {
    it('should abort on SIGTERM until released', () => {
      const sigtermListeners = process.listenerCount('SIGTERM');
      const shutdown = shutdownSignal();

      expect(process.listenerCount('SIGTERM')).to.equal(sigtermListeners + 1);
      process.emit('SIGTERM', 'SIGTERM');

      expect(shutdown.signal.aborted).to.be.true;
      expect(shutdown.signal.reason).to.have.property('name', 'AbortError');
      expect(shutdown.signal.reason).to.have.property(
        'message',
        'received SIGTERM, aborting'
      );

      shutdown.release();
      expect(process.listenerCount('SIGTERM')).to.equal(sigtermListeners);
    });

    it('should leave no handlers behind after release', () => {
      const sigintListeners = process.listenerCount('SIGINT');
      const shutdown = shutdownSignal();

      shutdown.release();

      expect(process.listenerCount('SIGINT')).to.equal(sigintListeners);
      expect(shutdown.signal.aborted).to.be.false;
    });
  });
});
