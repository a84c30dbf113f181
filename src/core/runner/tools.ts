import { constants } from 'node:fs';
import { access, stat } from 'node:fs/promises';
import { delimiter, isAbsolute, join, resolve } from 'node:path';

/**
 * Whether `tool` resolves to an executable file, either as a path or through PATH.
 */
export async function isToolAvailable(tool: string, env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): Promise<boolean> {
  if (!tool.trim()) return false;
  if (tool.includes('/')) {
    return await isExecutableFile(isAbsolute(tool) ? tool : resolve(cwd, tool));
  }

  const dirs = (env.PATH ?? '').split(delimiter).filter(Boolean);
  for (const dir of dirs) {
    if (await isExecutableFile(join(dir, tool))) return true;
  }
  return false;
}

async function isExecutableFile(path: string): Promise<boolean> {
  try {
    const s = await stat(path);
    if (!s.isFile()) return false;
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
