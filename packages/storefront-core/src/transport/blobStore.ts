import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, join, resolve } from 'path';
import { StorageError, ValidationError } from '../errors';
import type { BlobStore } from './types';

// Slash-separated segments; a segment may not start with a dot.
const REF_PATTERN = /^[A-Za-z0-9_-][A-Za-z0-9._-]*(\/[A-Za-z0-9_-][A-Za-z0-9._-]*)*$/;

export function assertBlobRef(ref: string): void {
  if (!REF_PATTERN.test(ref)) {
    throw new ValidationError(`Invalid blob reference '${ref}'`);
  }
}

const CONTENT_TYPES: Record<string, string> = {
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png',
  webp: 'image/webp',
  gif: 'image/gif',
  pdf: 'application/pdf',
  zip: 'application/zip',
  txt: 'text/plain',
  epub: 'application/epub+zip',
  mp3: 'audio/mpeg',
  mp4: 'video/mp4',
};

export function contentTypeForRef(ref: string): string {
  const dot = ref.lastIndexOf('.');
  if (dot === -1) return 'application/octet-stream';
  return CONTENT_TYPES[ref.slice(dot + 1).toLowerCase()] ?? 'application/octet-stream';
}

export function fileNameForRef(ref: string): string {
  return ref.slice(ref.lastIndexOf('/') + 1);
}

export class FsBlobStore implements BlobStore {
  private readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  async put(ref: string, data: Buffer): Promise<void> {
    assertBlobRef(ref);
    const path = join(this.root, ref);
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, data);
    } catch (error) {
      throw new StorageError(`write blob ${ref}`, error);
    }
  }

  async get(ref: string): Promise<Buffer | null> {
    assertBlobRef(ref);
    try {
      return await readFile(join(this.root, ref));
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
      throw new StorageError(`read blob ${ref}`, error);
    }
  }
}

export class MemoryBlobStore implements BlobStore {
  private readonly blobs = new Map<string, Buffer>();

  async put(ref: string, data: Buffer): Promise<void> {
    assertBlobRef(ref);
    this.blobs.set(ref, Buffer.from(data));
  }

  async get(ref: string): Promise<Buffer | null> {
    assertBlobRef(ref);
    const blob = this.blobs.get(ref);
    return blob ? Buffer.from(blob) : null;
  }
}
