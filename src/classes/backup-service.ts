import { EventEmitter } from 'events';
import { Writable } from 'stream';
import {
  BackupStage,
  BackupState,
  SSHClient,
  SSHConnectionConfig,
} from '../interfaces';
import { raceWithAbort } from '../lib/abort';
import { BackupError, describeError } from '../lib/errors';
import { Logger, logger as defaultLogger } from '../lib/logger';

/**
 * @description The RouterOS command that dumps the full configuration as text.
 */
export const EXPORT_COMMAND = '/export';

export interface BackupService {
  on(
    event: 'stateChange',
    listener: (state: BackupState, previous: BackupState) => void
  ): this;
  emit(event: 'stateChange', state: BackupState, previous: BackupState): boolean;
}

/**
 * Runs a single backup against one device: connect, export, write, close.
 *
 * The service holds no state between calls apart from the last reported
 * state, so separate instances can back up separate devices concurrently.
 */
export class BackupService extends EventEmitter {
  private client: SSHClient;
  private logger: Logger;
  private _state: BackupState = 'idle';

  constructor(client: SSHClient, logger: Logger = defaultLogger) {
    super();
    this.client = client;
    this.logger = logger;
  }

  get state(): BackupState {
    return this._state;
  }

  /**
   * @description Exports the configuration of the device described by `config` into `output`.
   * @description `output` is written to but never ended: the caller owns it.
   * @throws BackupError tagged with the stage that failed.
   */
  async execute(
    config: SSHConnectionConfig,
    output: Writable,
    signal?: AbortSignal
  ): Promise<void> {
    this._state = 'idle';
    this.transition('connecting');
    await this.stage('connect', async () => {
      signal?.throwIfAborted();
      await this.client.connect(config, signal);
    });
    this.transition('connected');

    try {
      this.transition('exporting');
      const configuration = await this.stage('export', async () => {
        signal?.throwIfAborted();
        return this.client.executeCommand(EXPORT_COMMAND, signal);
      });

      this.transition('writing');
      await this.stage('write', async () => {
        signal?.throwIfAborted();
        await raceWithAbort(writeOutput(output, configuration), signal);
      });

      this.transition('done');
    } finally {
      await this.closeQuietly();
    }
  }

  private async stage<T>(
    stage: BackupStage,
    step: () => Promise<T>
  ): Promise<T> {
    try {
      return await step();
    } catch (error) {
      this.transition('failed');
      throw new BackupError(stage, error);
    }
  }

  // a close failure never replaces the outcome of the backup itself
  private async closeQuietly(): Promise<void> {
    try {
      await this.client.close();
    } catch (error) {
      this.logger.warn(`Failed to close connection: ${describeError(error)}`);
    }
  }

  private transition(next: BackupState): void {
    const previous = this._state;
    this._state = next;
    this.emit('stateChange', next, previous);
  }
}

/**
 * Writes `data` and waits for the sink to accept it. A failing write both
 * calls back with the error and emits `error`; the listener stays attached
 * in that case so the emitted event is consumed.
 */
function writeOutput(output: Writable, data: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onError = (error: Error) => reject(error);
    output.once('error', onError);

    output.write(data, (error) => {
      if (error) {
        reject(error);
        return;
      }
      output.removeListener('error', onError);
      resolve();
    });
  });
}
