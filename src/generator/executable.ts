import { constants, promises as fs } from 'node:fs';
import path from 'node:path';
import { GeneratorStartupError } from '../errors.js';

export async function resolveExecutable(executablePath: string | undefined): Promise<string> {
  if (!executablePath) {
    throw new GeneratorStartupError('No generator executable configured. Set PARAM_GENERATOR_PATH or pass --generator.');
  }

  const resolved = path.resolve(executablePath);
  try {
    await fs.access(resolved, constants.X_OK);
  } catch (error) {
    throw new GeneratorStartupError(`Generator executable is missing or not executable at ${resolved}.`, {
      cause: error,
    });
  }
  return resolved;
}
