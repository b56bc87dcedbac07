/**
 * @module document-service
 * Saves and loads flattened bitmaps on the local file system.
 *
 * Failures never escape: they are logged and reported as `false` / `null`.
 * File I/O is synchronous, matching the editor's single-threaded model.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Bitmap, DocumentService, EventBus, ImageFormat, Logger } from '@layerkit/types';
import { DEFAULT_EDITOR_OPTIONS, clamp, consoleLogger } from '@layerkit/core';
import { decodeImage, encodeImage, formatFromExtension, isUnencodableExtension } from './codecs';

export interface DocumentServiceOptions {
  logger?: Logger;
  /** When given, `image:saved` is published after every successful save. */
  bus?: EventBus;
  /** JPEG quality used when `save` gets none. */
  defaultQuality?: number;
  /** Infix between base name and counter, e.g. `_edited_`. */
  uniqueNameSuffix?: string;
  uniqueNameMaxAttempts?: number;
}

export class DocumentServiceImpl implements DocumentService {
  private readonly logger: Logger;
  private readonly bus: EventBus | null;
  private readonly defaultQuality: number;
  private readonly uniqueNameSuffix: string;
  private readonly uniqueNameMaxAttempts: number;

  constructor(options: DocumentServiceOptions = {}) {
    this.logger = options.logger ?? consoleLogger('DocumentService');
    this.bus = options.bus ?? null;
    this.defaultQuality = options.defaultQuality ?? DEFAULT_EDITOR_OPTIONS.jpegQuality;
    this.uniqueNameSuffix = options.uniqueNameSuffix ?? DEFAULT_EDITOR_OPTIONS.uniqueNameSuffix;
    this.uniqueNameMaxAttempts = Math.max(
      1,
      options.uniqueNameMaxAttempts ?? DEFAULT_EDITOR_OPTIONS.uniqueNameMaxAttempts,
    );
  }

  /**
   * Without `format`, a GIF, TIFF or WebP extension is refused rather than
   * written as PNG under the wrong name. A non-finite `quality` falls back
   * to the default.
   */
  save(bitmap: Bitmap, filePath: string, format?: ImageFormat, quality?: number): boolean {
    if (filePath.trim() === '') return false;
    if (!format && isUnencodableExtension(filePath)) {
      this.logger.warn(`Cannot encode ${path.extname(filePath)} files: ${filePath}`);
      return false;
    }

    const resolvedFormat = format ?? formatFromExtension(filePath);
    const requested = quality !== undefined && Number.isFinite(quality) ? quality : this.defaultQuality;
    const resolvedQuality = clamp(Math.round(requested), 1, 100);
    try {
      const directory = path.dirname(filePath);
      if (!fs.existsSync(directory)) {
        fs.mkdirSync(directory, { recursive: true });
      }
      fs.writeFileSync(filePath, encodeImage(bitmap, resolvedFormat, resolvedQuality));
    } catch (err) {
      this.logger.error(`Save failed for ${filePath}:`, err);
      return false;
    }

    this.logger.info(`Saved ${bitmap.width}x${bitmap.height} ${resolvedFormat} to ${filePath}`);
    this.bus?.emit('image:saved', { path: filePath });
    return true;
  }

  load(filePath: string): Bitmap | null {
    try {
      return decodeImage(new Uint8Array(fs.readFileSync(filePath)));
    } catch (err) {
      this.logger.error(`Load failed for ${filePath}:`, err);
      return null;
    }
  }

  /**
   * `<directory>/<baseName><suffix>001<extension>`, counting up while the
   * path exists. After the last attempt the final candidate is returned
   * even if it exists.
   */
  generateUniqueFilePath(directory: string, baseName: string, extension: string): string {
    let candidate = '';
    for (let counter = 1; counter <= this.uniqueNameMaxAttempts; counter++) {
      const suffix = `${this.uniqueNameSuffix}${String(counter).padStart(3, '0')}`;
      candidate = path.join(directory, `${baseName}${suffix}${extension}`);
      if (!fs.existsSync(candidate)) return candidate;
    }
    this.logger.warn(`No free file name after ${this.uniqueNameMaxAttempts} attempts in ${directory}`);
    return candidate;
  }

  getFormatFromExtension(filePath: string): ImageFormat {
    return formatFromExtension(filePath);
  }
}
