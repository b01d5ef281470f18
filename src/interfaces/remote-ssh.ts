export interface SSHConnectionConfig {
  host: string;
  port: number; // conventionally 22
  username: string;

  // the caller supplies a usable credential: a password, a key file, or both
  password?: string;
  keyFile?: string; // path to the private key file
  passphrase?: string; // only read when keyFile points to an encrypted key
  readyTimeout?: number; // handshake timeout in milliseconds
}

/**
 * @description An open-run-close capability over a remote shell session.
 * @description Implementations own the session and must honor the abort signal
 * on every call that waits on the network.
 */
export interface SSHClient {
  connect(config: SSHConnectionConfig, signal?: AbortSignal): Promise<void>;
  executeCommand(command: string, signal?: AbortSignal): Promise<string>;
  close(): Promise<void>;
}

export interface ExecutionResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  duration: number;
}
