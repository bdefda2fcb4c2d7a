import fs from 'fs';
import path from 'path';
import { createHash } from 'crypto';
import sharp from 'sharp';
import type { MapItem } from './types';
import { writeFileAtomic } from './atomic-write';
import { logErrorDetails } from './errors';
import { runWithConcurrency, sanitizeFilePart } from './map-utils';

export type ThumbnailOptions = {
  outputDir: string;
  /** Metadata field holding the local source image path */
  sourceField: string;
  /** Relative source paths resolve against this directory */
  sourceBaseDir: string;
  maxSize: number;
  quality: number;
  concurrency: number;
  maxRetries?: number;
};

export const THUMBS_DIR = 'thumbs';

export function thumbnailFileName(id: string): string {
  const hash = createHash('sha1').update(id).digest('hex').slice(0, 8);
  const label = sanitizeFilePart(id) || 'item';
  return `${label}-${hash}.webp`;
}

export function resolveSourcePath(item: MapItem, sourceField: string, baseDir: string): string | null {
  const value = item.metadata[sourceField];
  if (typeof value !== 'string' || !value.trim()) return null;
  return path.isAbsolute(value) ? value : path.join(baseDir, value);
}

/**
 * Writes a WEBP thumbnail (longest side ≤ maxSize) for each item with a local
 * source image. Existing thumbnails are reused; failures are logged and the
 * item keeps its original image reference.
 *
 * @returns item id → thumbnail path relative to `outputDir`
 */
export async function generateThumbnails(
  items: readonly MapItem[],
  options: ThumbnailOptions
): Promise<Map<string, string>> {
  const thumbsDir = path.join(options.outputDir, THUMBS_DIR);
  const results = await runWithConcurrency(items, options.concurrency, async (item) => {
    const source = resolveSourcePath(item, options.sourceField, options.sourceBaseDir);
    if (!source) return null;

    const fileName = thumbnailFileName(item.id);
    const target = path.join(thumbsDir, fileName);
    const relative = `${THUMBS_DIR}/${fileName}`;
    if (fs.existsSync(target)) return { id: item.id, relative };

    try {
      const buffer = await sharp(source)
        .resize({ width: options.maxSize, height: options.maxSize, fit: 'inside', withoutEnlargement: true })
        .webp({ quality: options.quality })
        .toBuffer();
      await writeFileAtomic(target, buffer, { maxRetries: options.maxRetries });
      return { id: item.id, relative };
    } catch (error) {
      logErrorDetails(`   ⚠️ Thumbnail for ${item.id} failed. `, error);
      return null;
    }
  });

  const thumbnails = new Map<string, string>();
  for (const entry of results) {
    if (entry) thumbnails.set(entry.id, entry.relative);
  }
  return thumbnails;
}
