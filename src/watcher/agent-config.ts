/**
 * Coding-agent routing: flips `default_agent` in the agent's JSON config
 * between the local and cloud agent names.
 */

import { readFile, rename, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { withLock } from '../utils/file-mutex.js';

const AgentConfigSchema = z.record(z.unknown());

export type AgentConfig = z.infer<typeof AgentConfigSchema>;

/**
 * Set `default_agent` to `agentName`, keeping every other key as is.
 *
 * Returns true when the file was rewritten, false when it is missing or
 * already points at that agent. Throws ConfigurationError for a file that
 * is not a JSON object.
 */
export async function setDefaultAgent(path: string, agentName: string): Promise<boolean> {
  return withLock(path, async () => {
    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new ConfigurationError(`${path} is not valid JSON`, error);
    }

    const parsed = AgentConfigSchema.safeParse(json);
    if (!parsed.success) {
      throw new ConfigurationError(`${path} must contain a JSON object`);
    }
    if (parsed.data['default_agent'] === agentName) {
      return false;
    }

    const next: AgentConfig = { ...parsed.data, default_agent: agentName };
    const tmp = `${path}.tmp`;
    await writeFile(tmp, JSON.stringify(next, null, 2) + '\n', 'utf-8');
    await rename(tmp, path);
    return true;
  });
}
