/**
 * Comment-preserving YAML file handling for overlay edits
 */

import { access, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  isMap,
  isScalar,
  isSeq,
  parseAllDocuments,
  parseDocument,
  YAMLMap,
  YAMLSeq,
  type Document,
} from 'yaml';
import { BuildError } from '@keelson/shared';

export const KUSTOMIZATION_FILE_NAMES = ['kustomization.yaml', 'kustomization.yml', 'Kustomization'] as const;

export interface YamlFile {
  path: string;
  documents: Document[];
  /** Serialized form at load time, used to detect edits */
  original: string;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export async function findKustomizationFile(overlayDir: string): Promise<string> {
  for (const name of KUSTOMIZATION_FILE_NAMES) {
    const candidate = join(overlayDir, name);
    if (await exists(candidate)) {
      return candidate;
    }
  }
  throw new BuildError(`No kustomization file found in ${overlayDir}`, { overlayDir });
}

async function readText(path: string, purpose: string): Promise<string> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    throw new BuildError(
      `Cannot read ${purpose} ${path}: ${error instanceof Error ? error.message : String(error)}`,
      { path }
    );
  }
}

function assertParsed(doc: Document, path: string): void {
  const [first] = doc.errors;
  if (first) {
    throw new BuildError(`${path} is not valid YAML: ${first.message}`, { path });
  }
}

export function serialize(documents: Document[]): string {
  return documents
    .map((doc, index) => {
      const text = doc.toString();
      return index > 0 && !text.startsWith('---') ? `---\n${text}` : text;
    })
    .join('');
}

/**
 * Load a single-document file whose root must be a mapping
 */
export async function loadMappingFile(path: string, purpose: string): Promise<{ file: YamlFile; root: YAMLMap }> {
  const doc = parseDocument(await readText(path, purpose));
  assertParsed(doc, path);

  const root = doc.contents;
  if (!isMap(root)) {
    throw new BuildError(`${path} is not a YAML mapping`, { path });
  }
  return { file: { path, documents: [doc], original: serialize([doc]) }, root };
}

/**
 * Load a possibly multi-document file
 */
export async function loadDocumentsFile(path: string, purpose: string): Promise<YamlFile> {
  const documents: Document[] = [...parseAllDocuments(await readText(path, purpose))];
  for (const doc of documents) {
    assertParsed(doc, path);
  }
  return { path, documents, original: serialize(documents) };
}

/**
 * Write the file back if its content changed. Resolves true when written.
 */
export async function saveIfChanged(file: YamlFile): Promise<boolean> {
  const next = serialize(file.documents);
  if (next === file.original) {
    return false;
  }
  await writeFile(file.path, next, 'utf8');
  return true;
}

function isEmptyValue(node: unknown): boolean {
  return node === undefined || node === null || (isScalar(node) && node.value === null);
}

/**
 * The list under `key`, created when absent
 */
export function ensureSeq(parent: YAMLMap, key: string, where: string): YAMLSeq {
  const node = parent.get(key, true);
  if (isEmptyValue(node)) {
    const seq = new YAMLSeq();
    parent.set(key, seq);
    return seq;
  }
  if (!isSeq(node)) {
    throw new BuildError(`${where}: '${key}' must be a list`);
  }
  // `key: []` would otherwise stay in flow style once items are added
  if (node.items.length === 0) node.flow = false;
  return node;
}

/**
 * The mapping under `key`, created when absent
 */
export function ensureMap(parent: YAMLMap, key: string, where: string): YAMLMap {
  const node = parent.get(key, true);
  if (isEmptyValue(node)) {
    const map = new YAMLMap();
    parent.set(key, map);
    return map;
  }
  if (!isMap(node)) {
    throw new BuildError(`${where}: '${key}' must be a mapping`);
  }
  if (node.items.length === 0) node.flow = false;
  return node;
}

/**
 * First mapping in `seq` whose `key` equals `value`
 */
export function findMapBy(seq: YAMLSeq, key: string, value: string): YAMLMap | undefined {
  for (const item of seq.items) {
    if (isMap(item) && item.get(key) === value) {
      return item;
    }
  }
  return undefined;
}
