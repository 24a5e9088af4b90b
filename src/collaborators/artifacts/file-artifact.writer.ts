import { Injectable, Logger } from '@nestjs/common';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type {
  ArtifactWriter,
  StructuredDocument,
} from '../collaborator.interfaces';

const SAFE_CHARACTER = /[\p{L}\p{N}._\- ]/u;
const MAX_NAME_LENGTH = 50;

/**
 * File name for a document title: letters, digits and `._- ` are kept, the
 * rest dropped, then cut to 50 characters. Empty results become "doc".
 */
export function safeFileName(title: string): string {
  const kept = Array.from(title)
    .filter((character) => SAFE_CHARACTER.test(character))
    .join('');
  return (kept || 'doc').slice(0, MAX_NAME_LENGTH);
}

/** `<base>.json`, or `<base>-2.json`, `<base>-3.json`, ... when taken. */
export function uniqueFileName(
  base: string,
  taken: ReadonlySet<string>,
): string {
  let name = `${base}.json`;
  for (let counter = 2; taken.has(name); counter += 1) {
    name = `${base}-${counter}.json`;
  }
  return name;
}

@Injectable()
export class FileArtifactWriter implements ArtifactWriter {
  private readonly logger = new Logger(FileArtifactWriter.name);

  async writeDocument(
    dir: string,
    document: StructuredDocument,
    taken: Set<string> = new Set<string>(),
  ): Promise<string> {
    const fileName = uniqueFileName(safeFileName(document.title), taken);
    taken.add(fileName);
    return this.writeJson(dir, fileName, document);
  }

  async writeJson(
    dir: string,
    fileName: string,
    payload: unknown,
  ): Promise<string> {
    await mkdir(dir, { recursive: true });
    const path = join(dir, fileName);
    await writeFile(path, `${JSON.stringify(payload, null, 2)}\n`, 'utf8');
    this.logger.debug(`Wrote artifact ${path}`);
    return path;
  }
}
