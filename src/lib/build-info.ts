import * as fs from 'fs';
import * as path from 'path';
import { BuildInfo } from '../interfaces';

const SHORT_COMMIT_LENGTH = 7;

interface BuildStamp {
  version?: string;
  commit?: string;
  date?: string;
}

/**
 * @description Merges the package version and the release stamp into the reported build info.
 * @description Missing values fall back to dev / none / unknown.
 */
export const resolveBuildInfo = (
  packageVersion: string | undefined,
  stamp: BuildStamp,
  nodeVersion: string
): BuildInfo => {
  const commit = stamp.commit?.trim();

  return {
    version: stamp.version || packageVersion || 'dev',
    commit: commit ? commit.slice(0, SHORT_COMMIT_LENGTH) : 'none',
    date: stamp.date || 'unknown',
    nodeVersion: nodeVersion || 'unknown',
  };
};

/**
 * @description Reads package.json and the optional build-info.json written beside it at release time.
 */
export const getBuildInfo = (startDir: string = __dirname): BuildInfo => {
  const root = findPackageRoot(startDir);
  if (!root) {
    return resolveBuildInfo(undefined, {}, process.version);
  }

  const pkg = readJsonObject(path.join(root, 'package.json'));
  const stamp = readJsonObject(path.join(root, 'build-info.json'));

  return resolveBuildInfo(
    stringField(pkg, 'version'),
    {
      version: stringField(stamp, 'version'),
      commit: stringField(stamp, 'commit'),
      date: stringField(stamp, 'date'),
    },
    process.version
  );
};

const findPackageRoot = (startDir: string): string | null => {
  let dir = path.resolve(startDir);

  for (;;) {
    if (fs.existsSync(path.join(dir, 'package.json'))) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
};

const readJsonObject = (filePath: string): Record<string, unknown> => {
  if (!fs.existsSync(filePath)) {
    return {};
  }

  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return {};
  }
  return Object.fromEntries(Object.entries(parsed));
};

const stringField = (
  source: Record<string, unknown>,
  key: string
): string | undefined => {
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
};
