import sharp from 'sharp';
import { ANSI_RESET, ansi256Bg, ansi256Fg, rgbTo256 } from '../../utils/ansi.js';
import * as logger from '../../utils/logger.js';

/** Decoded pixels, row-major, `channels` bytes per pixel (RGB first). */
export interface RgbImage {
  width: number;
  height: number;
  channels: number;
  data: Uint8Array;
}

const UPPER_HALF_BLOCK = '▀';

function colorAt(image: RgbImage, x: number, y: number): number {
  const offset = (y * image.width + x) * image.channels;
  return rgbTo256(image.data[offset], image.data[offset + 1], image.data[offset + 2]);
}

/**
 * Render pixels as terminal rows of upper half blocks: each character cell
 * shows two pixel rows, the top one as foreground and the bottom one as
 * background. An odd last pixel row leaves the background at its default.
 */
export function formatImageRows(image: RgbImage): string[] {
  const rows: string[] = [];
  for (let y = 0; y < image.height; y += 2) {
    let row = '';
    for (let x = 0; x < image.width; x++) {
      const top = ansi256Fg(colorAt(image, x, y));
      const bottom = y + 1 < image.height ? ansi256Bg(colorAt(image, x, y + 1)) : '';
      row += `${top}${bottom}${UPPER_HALF_BLOCK}`;
      if (!bottom) row += ANSI_RESET;
    }
    rows.push(row + ANSI_RESET);
  }
  return rows;
}

/**
 * Decode an image file and scale it to fit `columns` x `rows` character cells.
 * Rejects when sharp cannot read the file.
 */
export async function decodeImage(filePath: string, columns: number, rows: number): Promise<RgbImage> {
  const { data, info } = await sharp(filePath)
    .rotate()
    .resize(Math.max(1, columns), Math.max(1, rows * 2), { fit: 'inside' })
    .flatten({ background: '#000000' })
    .raw()
    .toBuffer({ resolveWithObject: true });

  return { width: info.width, height: info.height, channels: info.channels, data };
}

/**
 * Holds the rendered preview of at most one image and decodes a new one
 * whenever the requested file or size changes. Results for a request that
 * has since been replaced are dropped.
 */
export class ImagePreview {
  private key: string | null = null;
  private content: string | null = null;

  constructor(
    private onReady: () => void,
    private onFailure: (filePath: string, err: unknown) => void
  ) {}

  contentFor(filePath: string, columns: number, rows: number): string {
    const key = `${filePath}\0${columns}x${rows}`;
    if (key !== this.key) {
      this.key = key;
      this.content = null;
      this.startDecode(filePath, columns, rows, key);
    }
    return this.content ?? '{gray-fg}Loading image...{/gray-fg}';
  }

  clear(): void {
    this.key = null;
    this.content = null;
  }

  private startDecode(filePath: string, columns: number, rows: number, key: string): void {
    logger.debug(`decoding ${filePath} at ${columns}x${rows}`);
    void decodeImage(filePath, columns, rows).then(
      (image) => {
        if (this.key !== key) return;
        this.content = formatImageRows(image)
          .map((row) => `{escape}${row}{/escape}`)
          .join('\n');
        this.onReady();
      },
      (err: unknown) => {
        if (this.key !== key) return;
        logger.debug(`decoding ${filePath} failed: ${err instanceof Error ? err.message : String(err)}`);
        this.clear();
        this.onFailure(filePath, err);
      }
    );
  }
}
