import sinon from 'sinon';
import { Writable } from 'stream';
import { SSHClient, SSHConnectionConfig } from '../src/interfaces';
import { Logger } from '../src/lib/logger';

export class FakeSSHClient implements SSHClient {
  connect = sinon
    .stub<[SSHConnectionConfig, AbortSignal?], Promise<void>>()
    .resolves();
  executeCommand = sinon
    .stub<[string, AbortSignal?], Promise<string>>()
    .resolves('');
  close = sinon.stub<[], Promise<void>>().resolves();
}

export class MemoryWritable extends Writable {
  private chunks: Buffer[] = [];

  _write(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void
  ): void {
    this.chunks.push(chunk);
    callback();
  }

  contents(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }
}

export function createSilentLogger() {
  const silentLogger = {
    debug: sinon.stub<[string], void>(),
    info: sinon.stub<[string], void>(),
    warn: sinon.stub<[string], void>(),
    error: sinon.stub<[string], void>(),
  } satisfies Logger;
  return silentLogger;
}

/**
 * Stands in for a network call that only settles by rejecting on abort.
 */
export const hangUntilAborted = (signal?: AbortSignal): Promise<never> =>
  new Promise<never>((_, reject) => {
    signal?.addEventListener('abort', () => reject(signal.reason), {
      once: true,
    });
  });

export async function rejectionOf(promise: Promise<unknown>): Promise<Error> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof Error) {
      return error;
    }
    throw new Error(`Expected an Error, got ${String(error)}`);
  }
  throw new Error('Expected promise to reject');
}

export const deviceConfig: SSHConnectionConfig = {
  host: '192.168.88.1',
  port: 22,
  username: 'admin',
  password: 'test-password',
};
