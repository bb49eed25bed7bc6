import * as path from 'path';
import { pathToFileURL } from 'url';
import { ConfigError } from './errors.js';
import type { Application } from './types.js';

function isApplication(value: unknown): value is Application {
  return typeof value === 'function';
}

/**
 * Resolve `module:export` (export defaults to `default`) to an application.
 * Relative module paths are taken from the working directory.
 */
export async function importApplication(importString: string): Promise<Application> {
  const colon = importString.lastIndexOf(':');
  // a lone drive letter is part of the path, not the separator
  const hasExport = colon > 1;
  const modulePart = hasExport ? importString.slice(0, colon) : importString;
  const exportName = hasExport ? importString.slice(colon + 1) : 'default';
  if (!modulePart || !exportName) {
    throw new ConfigError(`Import string "${importString}" must be in format "<module>:<attribute>".`);
  }

  const isPath = modulePart.startsWith('.') || path.isAbsolute(modulePart);
  const target = isPath ? pathToFileURL(path.resolve(modulePart)).href : modulePart;
  let mod: Record<string, unknown>;
  try {
    mod = await import(target);
  } catch (e: unknown) {
    throw new ConfigError(`Could not import module "${modulePart}": ${e instanceof Error ? e.message : String(e)}`);
  }
  const app = mod[exportName];
  if (!isApplication(app)) {
    throw new ConfigError(`Attribute "${exportName}" not found in module "${modulePart}" or is not callable.`);
  }
  return app;
}
