import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { isIP } from 'net';
import { logger } from './logger';

/**
 * Sanitization utilities for CLI input validation
 */

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Validates numeric inputs
 */
export function sanitizeNumber(
  value: string,
  fieldName: string,
  min?: number,
  max?: number
): number {
  if (!value || typeof value !== 'string') {
    throw new ValidationError(`${fieldName} is required`);
  }

  const trimmed = value.trim();

  if (!/^-?\d+$/.test(trimmed)) {
    throw new ValidationError(`${fieldName} must be a valid number`);
  }

  const num = parseInt(trimmed, 10);

  if (min !== undefined && num < min) {
    throw new ValidationError(`${fieldName} must be at least ${min}`);
  }

  if (max !== undefined && num > max) {
    throw new ValidationError(`${fieldName} cannot exceed ${max}`);
  }

  return num;
}

export function sanitizePort(port: string): number {
  return sanitizeNumber(port, 'port', 1, 65535);
}

/**
 * Converts a timeout given in seconds to milliseconds
 */
export function sanitizeTimeout(timeout: string): number {
  return sanitizeNumber(timeout, 'timeout', 1, 86400) * 1000;
}

/**
 * Validates SSH hostnames/IPs
 */
export function sanitizeSSHHost(host: string): string {
  if (!host || typeof host !== 'string') {
    throw new ValidationError('SSH host is required');
  }

  const trimmed = host.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('SSH host cannot be empty');
  }

  if (trimmed.length > 253) {
    throw new ValidationError('SSH host name is too long');
  }

  if (isIP(trimmed) !== 0) {
    return trimmed;
  }

  const hostnameRegex =
    /^[a-zA-Z0-9](?:[a-zA-Z0-9-]*[a-zA-Z0-9])?(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]*[a-zA-Z0-9])?)*$/;

  if (!hostnameRegex.test(trimmed)) {
    throw new ValidationError(
      'SSH host must be a valid hostname or IP address'
    );
  }

  return trimmed;
}

/**
 * Validates SSH usernames
 */
export function sanitizeSSHUsername(username: string): string {
  if (!username || typeof username !== 'string') {
    throw new ValidationError('SSH username is required');
  }

  const trimmed = username.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('SSH username cannot be empty');
  }

  if (trimmed.length > 64) {
    throw new ValidationError('SSH username cannot exceed 64 characters');
  }

  // RouterOS accepts login options after a '+', e.g. admin+ct
  if (!/^[a-zA-Z0-9._@+-]+$/.test(trimmed)) {
    throw new ValidationError(
      'SSH username can only contain letters, numbers, dots, hyphens, underscores, @ and +'
    );
  }

  return trimmed;
}

/**
 * Expands a leading ~ and resolves to an absolute path
 */
export function sanitizeFilePath(filePath: string, fieldName: string): string {
  if (!filePath || typeof filePath !== 'string') {
    throw new ValidationError(`${fieldName} is required`);
  }

  const trimmed = filePath.trim();

  if (trimmed.length === 0) {
    throw new ValidationError(`${fieldName} cannot be empty`);
  }

  if (trimmed.includes('\0')) {
    throw new ValidationError(`${fieldName} contains null bytes`);
  }

  const expanded =
    trimmed === '~' || trimmed.startsWith('~/')
      ? path.join(os.homedir(), trimmed.slice(1))
      : trimmed;

  const resolved = path.resolve(expanded);

  if (resolved.length > 4096) {
    throw new ValidationError(`${fieldName} path is too long`);
  }

  return resolved;
}

/**
 * Validates SSH key file path and permissions
 */
export function sanitizeSSHKeyPath(keyPath: string): string {
  const sanitized = sanitizeFilePath(keyPath, 'SSH key path');

  let stats: fs.Stats;
  try {
    stats = fs.statSync(sanitized);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new ValidationError(`SSH key file does not exist: ${sanitized}`);
    }
    throw new ValidationError(`Cannot access SSH key file: ${error}`);
  }

  if (!stats.isFile()) {
    throw new ValidationError('SSH key path must point to a file');
  }

  // Check file permissions (should not be group or world readable)
  const mode = stats.mode & 0o777;
  if (mode & 0o044) {
    logger.warn(
      'SSH key file is readable by others, consider changing permissions'
    );
  }

  return sanitized;
}

/**
 * Validates the backup destination: its directory must already exist
 */
export function sanitizeOutputPath(outputPath: string): string {
  const sanitized = sanitizeFilePath(outputPath, 'Output path');
  const directory = path.dirname(sanitized);

  let directoryStats: fs.Stats;
  try {
    directoryStats = fs.statSync(directory);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new ValidationError(
        `Output directory does not exist: ${directory}`
      );
    }
    throw new ValidationError(`Cannot access output directory: ${error}`);
  }

  if (!directoryStats.isDirectory()) {
    throw new ValidationError(`Output directory is not a directory: ${directory}`);
  }

  if (fs.existsSync(sanitized) && fs.statSync(sanitized).isDirectory()) {
    throw new ValidationError(`Output path is a directory: ${sanitized}`);
  }

  return sanitized;
}
