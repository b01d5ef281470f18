export * from './interfaces';
export { BackupService, EXPORT_COMMAND } from './classes/backup-service';
export { RemoteExecutor } from './classes/remote-executor';
export {
  BackupError,
  CloseError,
  ConnectError,
  ExecutionError,
  describeError,
  hasCause,
  isAbortError,
} from './lib/errors';
export { ValidationError } from './lib/sanitization';
export type { Logger, LogLevel } from './lib/logger';
