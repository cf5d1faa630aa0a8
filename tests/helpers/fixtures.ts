import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import { join } from 'node:path';
import { ModelDefinitionSchema, type ModelDefinition, type ModelDefinitionInput } from '../../src/config/schema.js';

export function defineModel(input: ModelDefinitionInput): ModelDefinition {
  return ModelDefinitionSchema.parse(input);
}

export async function makeTempDir(prefix: string = 'local-ai-test-'): Promise<string> {
  return mkdtemp(join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function touch(dir: string, ...names: string[]): Promise<void> {
  for (const name of names) {
    await writeFile(join(dir, name), '');
  }
}

/**
 * Response stub for a stubbed global fetch.
 */
export function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
