export type BackupStage = 'connect' | 'export' | 'write';

export type BackupState =
  | 'idle'
  | 'connecting'
  | 'connected'
  | 'exporting'
  | 'writing'
  | 'done'
  | 'failed';

export interface BackupCommandOptions {
  /**
   * @description The hostname or IP address of the device.
   */
  host: string;
  /**
   * @description The SSH port, as given on the command line or in the environment.
   */
  port: string;
  /**
   * @description The SSH username.
   */
  username: string;
  /**
   * @description The SSH password.
   */
  password?: string;
  /**
   * @description The path to the SSH private key file.
   */
  key?: string;
  /**
   * @description The passphrase of an encrypted private key.
   */
  passphrase?: string;
  /**
   * @description The file the exported configuration is written to.
   */
  output: string;
  /**
   * @description The overall deadline of the backup in seconds.
   */
  timeout?: string;
  /**
   * @description Whether to print debug output.
   */
  verbose?: boolean;
}

export interface BuildInfo {
  version: string;
  commit: string;
  date: string;
  nodeVersion: string;
}
