import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { ulid } from 'ulid';
import { TemplateLoader } from './loader.js';
import { TemplateSerializer } from './serializer.js';
import type { TemplateMapping } from './tagged.js';

/**
 * A template decoded from disk, labelled with the path it came from.
 * The path is what error messages report.
 */
export interface LoadedTemplate {
  path: string;
  root: TemplateMapping;
}

export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Read and decode a template file
 */
export async function readTemplateFile(
  filePath: string,
  loader: TemplateLoader = new TemplateLoader()
): Promise<LoadedTemplate> {
  const content = await fs.readFile(filePath, 'utf-8');
  return { path: filePath, root: loader.load(content, filePath) };
}

/**
 * Write a template to disk.
 *
 * The text is written to a temporary file next to the destination and then
 * renamed over it, so the destination is either the old file or the complete
 * new one.
 */
export async function writeTemplateFile(
  filePath: string,
  root: TemplateMapping,
  serializer: TemplateSerializer = new TemplateSerializer()
): Promise<void> {
  const content = serializer.serialize(root);
  const dir = path.dirname(filePath);
  const tempPath = path.join(dir, `.${path.basename(filePath)}.${ulid()}.tmp`);

  await fs.mkdir(dir, { recursive: true });
  try {
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (err) {
    await fs.rm(tempPath, { force: true });
    throw err;
  }
}
