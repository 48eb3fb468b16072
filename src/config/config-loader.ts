/**
 * @fileoverview Discovery and loading of mutrig.json configuration files.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationError, getErrorMessage } from '../errors';
import { assertValidConfig } from './config-validation';
import { ControllerConfig } from './types';

/** Key of the configuration section inside package.json. */
export const PACKAGE_SECTION = 'mutrig';

/**
 * Gets the list of configuration file candidates.
 *
 * @param explicitPath - Optional path given on the command line
 */
export function getConfigCandidates(explicitPath?: string): string[] {
  const candidates: string[] = [];
  if (explicitPath !== undefined && explicitPath !== '') {
    candidates.push(explicitPath);
  }
  candidates.push('mutrig.json');
  candidates.push('.mutrig.json');
  return candidates;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readPackageSection(pkgPath: string): unknown {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    return isRecord(pkg) ? pkg[PACKAGE_SECTION] : undefined;
  } catch {
    // An unreadable package.json just doesn't count as a config source.
    return undefined;
  }
}

/**
 * Searches for a configuration file starting from startDir and walking up
 * the directory tree. A package.json with a `mutrig` section also counts.
 *
 * @param startDir - Directory to start searching from
 * @param configCandidates - Config file names to look for
 * @returns The absolute path to the config file, or undefined if not found
 */
export function findConfigFile(startDir: string, configCandidates: string[]): string | undefined {
  for (let dir = path.resolve(startDir); ; ) {
    for (const candidate of configCandidates) {
      const full = path.isAbsolute(candidate) ? candidate : path.join(dir, candidate);
      if (fs.existsSync(full)) {
        return full;
      }
    }

    const pkgPath = path.join(dir, 'package.json');
    if (fs.existsSync(pkgPath) && readPackageSection(pkgPath) !== undefined) {
      return pkgPath;
    }

    const parent = path.dirname(dir);
    if (parent === dir) {
      return undefined;
    }
    dir = parent;
  }
}

/**
 * Loads and validates configuration from a file path.
 *
 * @throws ConfigurationError if the file cannot be read, parsed or validated
 */
export function loadConfigFile(configPath: string): ControllerConfig {
  let raw: unknown;
  try {
    if (path.basename(configPath) === 'package.json') {
      raw = readPackageSection(configPath) ?? {};
    } else {
      raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    }
  } catch (err) {
    throw new ConfigurationError(`Cannot read ${configPath}: ${getErrorMessage(err)}`, [], {
      path: configPath,
    });
  }
  return assertValidConfig(raw);
}

/**
 * Loads the configuration for a working directory. An explicit path must
 * exist; otherwise the directory tree is searched and an empty
 * configuration is returned when nothing is found.
 */
export function resolveConfig(startDir: string, explicitPath?: string): ControllerConfig {
  if (explicitPath !== undefined && explicitPath !== '') {
    const full = path.resolve(startDir, explicitPath);
    if (!fs.existsSync(full)) {
      throw new ConfigurationError(`Config file not found: ${explicitPath}`, [], { path: full });
    }
    return loadConfigFile(full);
  }
  const configPath = findConfigFile(startDir, getConfigCandidates());
  return configPath === undefined ? {} : loadConfigFile(configPath);
}
