import { createHash } from 'node:crypto';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { IngestionError } from '../lib/errors';
import { removeFiles } from '../lib/files';
import type { MediaKind, PermitRequest } from '../types/permit';

const MEDIA_KINDS: Record<string, MediaKind> = {
  pdf: 'pdf',
  jpg: 'image',
  jpeg: 'image',
  png: 'image',
  docx: 'docx',
  txt: 'text',
};

export const SUPPORTED_EXTENSIONS: readonly string[] = Object.keys(MEDIA_KINDS);

/**
 * Media kind for a file name, or null when the extension is not accepted.
 */
export function mediaKindFor(fileName: string): MediaKind | null {
  const extension = path.extname(fileName).slice(1).toLowerCase();
  return MEDIA_KINDS[extension] ?? null;
}

/**
 * Reduces a client-supplied file name to a safe ASCII base name.
 */
export function sanitizeFileName(fileName: string): string {
  const base = path.basename(fileName.replace(/\\/g, '/'));
  const ascii = base
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/\s+/g, '_')
    .replace(/[^A-Za-z0-9._-]/g, '')
    .replace(/^[._]+/, '');
  return ascii.length > 0 ? ascii : 'upload';
}

export function hashContent(content: Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}

export interface AcceptedSubmission {
  request: PermitRequest;
  storedPath: string;
}

/**
 * Accepts submitted bytes: checks the file type, assigns a fresh request id,
 * fingerprints the content and keeps a copy under the upload directory.
 */
export class Ingestion {
  constructor(private readonly uploadDir: string) {}

  async accept(fileName: string, content: Buffer): Promise<AcceptedSubmission> {
    const safeName = sanitizeFileName(fileName);
    const mediaKind = mediaKindFor(safeName);
    if (!mediaKind) {
      throw new IngestionError(
        `File type not supported: ${fileName}. Allowed: ${SUPPORTED_EXTENSIONS.join(', ')}`
      );
    }
    if (content.length === 0) {
      throw new IngestionError(`File is empty: ${fileName}`);
    }

    const request: PermitRequest = {
      id: uuidv4(),
      fileName: safeName,
      mediaKind,
      contentHash: hashContent(content),
      receivedAt: new Date().toISOString(),
    };

    const storedPath = path.join(this.uploadDir, `${request.id}_${safeName}`);
    try {
      await mkdir(this.uploadDir, { recursive: true });
      await writeFile(storedPath, content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new IngestionError(`Could not store ${fileName}: ${reason}`);
    }

    return { request, storedPath };
  }

  /**
   * Deletes every stored upload and resolves with how many were removed.
   */
  async purge(): Promise<number> {
    return removeFiles(this.uploadDir);
  }
}
