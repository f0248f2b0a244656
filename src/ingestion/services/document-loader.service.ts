/**
 * Document Loader
 * Reads .txt, .md and .json files from a directory tree into ingestion inputs.
 * Text encodings other than UTF-8 are detected with chardet and decoded with iconv-lite.
 */

import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as chardet from 'chardet';
import * as iconv from 'iconv-lite';
import type { DocumentMetadata, MetadataValue } from '../../chunking/types';
import { errorMessage } from '../../shared/utils/error-message';
import { DocumentLoadError } from '../errors/ingestion-errors';
import type { IngestDocumentInput, LoadedDirectory } from '../types';

const TEXT_TYPES: Readonly<Record<string, string>> = {
  '.txt': 'text',
  '.md': 'markdown',
};

const REPLACEMENT_CHAR = '\uFFFD';

@Injectable()
export class DocumentLoaderService {
  private readonly logger = new Logger(DocumentLoaderService.name);

  /**
   * Load every supported file under `directory`, in path order. Nested
   * directories are walked unless `recursive` is false; sources and skipped
   * entries are paths relative to `directory`.
   * @throws DocumentLoadError when the directory cannot be listed
   */
  async loadDirectory(
    directory: string,
    recursive = true,
  ): Promise<LoadedDirectory> {
    let entries: string[];
    try {
      entries = (await listFiles(directory, '', recursive)).sort();
    } catch (error) {
      throw new DocumentLoadError(directory, errorMessage(error));
    }

    const documents: IngestDocumentInput[] = [];
    const skipped: string[] = [];

    for (const relativePath of entries) {
      try {
        const loaded = await this.loadFile(
          path.join(directory, relativePath),
          relativePath,
        );
        if (loaded.length === 0) {
          skipped.push(relativePath);
        }
        documents.push(...loaded);
      } catch (error) {
        this.logger.warn(`Skipping ${relativePath}: ${errorMessage(error)}`);
        skipped.push(relativePath);
      }
    }

    this.logger.log(
      `[Load] directory=${directory} recursive=${recursive} documents=${documents.length} skipped=${skipped.length}`,
    );
    return { documents, skipped };
  }

  /**
   * Documents in one file; unsupported or empty files yield none.
   * @param source - defaults to the file name
   */
  async loadFile(
    filePath: string,
    source: string = path.basename(filePath),
  ): Promise<IngestDocumentInput[]> {
    const filename = path.basename(filePath);
    const extension = path.extname(filename).toLowerCase();

    if (extension === '.json') {
      return this.loadJson(filePath, filename, source);
    }

    const type = TEXT_TYPES[extension];
    if (type === undefined) {
      return [];
    }

    const content = await this.readText(filePath);
    if (content.trim().length === 0) {
      return [];
    }
    return [{ content, source, metadata: { type, filename } }];
  }

  /**
   * An array yields one document per item, with the item's `metadata`
   * merged in. A single object yields one document: its `content`/`text`, or
   * else its fields as `key: value` lines.
   */
  private async loadJson(
    filePath: string,
    filename: string,
    source: string,
  ): Promise<IngestDocumentInput[]> {
    let data: unknown;
    try {
      data = JSON.parse(await this.readText(filePath));
    } catch (error) {
      throw new DocumentLoadError(filePath, errorMessage(error));
    }

    if (!Array.isArray(data)) {
      return [
        {
          content: isRecord(data)
            ? (textField(data) ?? flattenObject(data))
            : JSON.stringify(data),
          source,
          metadata: { type: 'json', filename },
        },
      ];
    }

    const items: unknown[] = data;
    return items.map((item, index) => {
      const metadata: DocumentMetadata = {
        ...itemMetadata(item),
        type: 'json',
        filename,
        index,
      };
      return {
        content: itemContent(item),
        source: `${source}_${index}`,
        metadata,
      };
    });
  }

  private async readText(filePath: string): Promise<string> {
    const buffer = await fs.readFile(filePath);
    const utf8 = buffer.toString('utf-8');
    if (!utf8.includes(REPLACEMENT_CHAR)) {
      return utf8;
    }

    const detected = chardet.detect(buffer);
    if (detected && iconv.encodingExists(detected)) {
      this.logger.debug(`Decoding ${filePath} as ${detected}`);
      return iconv.decode(buffer, detected);
    }
    return utf8;
  }
}

async function listFiles(
  root: string,
  relativeDir: string,
  recursive: boolean,
): Promise<string[]> {
  const dirents = await fs.readdir(path.join(root, relativeDir), {
    withFileTypes: true,
  });

  const files: string[] = [];
  for (const dirent of dirents) {
    const relativePath = relativeDir
      ? `${relativeDir}/${dirent.name}`
      : dirent.name;
    if (dirent.isFile()) {
      files.push(relativePath);
    } else if (recursive && dirent.isDirectory()) {
      files.push(...(await listFiles(root, relativePath, recursive)));
    }
  }
  return files;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function textField(record: Record<string, unknown>): string | undefined {
  for (const key of ['content', 'text']) {
    const value = record[key];
    if (typeof value === 'string') {
      return value;
    }
  }
  return undefined;
}

/** Scalar fields as `key: value`, nested objects as `key: <json>`; arrays and nulls are left out */
function flattenObject(record: Record<string, unknown>): string {
  return Object.entries(record)
    .flatMap(([key, value]) => {
      if (
        typeof value === 'string' ||
        typeof value === 'number' ||
        typeof value === 'boolean'
      ) {
        return [`${key}: ${value}`];
      }
      return isRecord(value) ? [`${key}: ${JSON.stringify(value)}`] : [];
    })
    .join('\n');
}

/** `content` or `text` of an object item, otherwise the item as JSON */
function itemContent(item: unknown): string {
  if (typeof item === 'string') {
    return item;
  }
  return (isRecord(item) ? textField(item) : undefined) ?? JSON.stringify(item);
}

/** Scalar entries of an item's `metadata` object */
function itemMetadata(item: unknown): Record<string, MetadataValue> {
  if (!isRecord(item) || !isRecord(item.metadata)) {
    return {};
  }
  const metadata: Record<string, MetadataValue> = {};
  for (const [key, value] of Object.entries(item.metadata)) {
    if (
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'boolean'
    ) {
      metadata[key] = value;
    }
  }
  return metadata;
}
