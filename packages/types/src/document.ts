/**
 * @module document
 * Export / import boundary of the editor.
 */

import type { Bitmap } from './bitmap';

/** Raster encodings supported on save and load. */
export type ImageFormat = 'png' | 'jpeg' | 'bmp';

/** Saves and loads flattened bitmaps. Never throws on I/O failure. */
export interface DocumentService {
  /**
   * Encode `bitmap` and write it to `filePath`, creating missing parent
   * directories. `format` defaults to the extension mapping; `quality`
   * (1-100) only affects JPEG.
   * @returns `true` on success, `false` on any I/O or encoding failure.
   */
  save(bitmap: Bitmap, filePath: string, format?: ImageFormat, quality?: number): boolean;
  /** Decode the file at `filePath`, or `null` when it cannot be read. */
  load(filePath: string): Bitmap | null;
  /** First `<base>_edited_NNN<ext>` path in `directory` that does not exist. */
  generateUniqueFilePath(directory: string, baseName: string, extension: string): string;
  /** Map a file extension to an encoding (unknown extensions map to PNG). */
  getFormatFromExtension(filePath: string): ImageFormat;
}
