/*
 * This file is part of TREB.
 *
 * TREB is free software: you can redistribute it and/or modify it under the 
 * terms of the GNU General Public License as published by the Free Software 
 * Foundation, either version 3 of the License, or (at your option) any 
 * later version.
 *
 * TREB is distributed in the hope that it will be useful, but WITHOUT ANY 
 * WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS 
 * FOR A PARTICULAR PURPOSE. See the GNU General Public License for more 
 * details.
 *
 * You should have received a copy of the GNU General Public License along 
 * with TREB. If not, see <https://www.gnu.org/licenses/>. 
 *
 * Copyright 2022-2025 trebco, llc. 
 * info@treb.app
 * 
 */

import * as fs from 'node:fs';
import { createHash } from 'node:crypto';
import Base64JS from 'base64-js';
import { IoError, ParameterError } from './errors';

export type ImageType = 'png'|'jpeg'|'gif'|'bmp';

/** content types for media defaults */
export const ImageContentTypes: Record<ImageType, string> = {
  png: 'image/png',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  bmp: 'image/bmp',
};

interface ImageInfo {
  type: ImageType;
  width: number;
  height: number;
}

const ReadUint16BE = (data: Uint8Array, offset: number) => (data[offset] << 8) | data[offset + 1];
const ReadUint16LE = (data: Uint8Array, offset: number) => data[offset] | (data[offset + 1] << 8);

const ReadUint32BE = (data: Uint8Array, offset: number) =>
  ((data[offset] << 24) >>> 0) + (data[offset + 1] << 16) + (data[offset + 2] << 8) + data[offset + 3];

const ReadInt32LE = (data: Uint8Array, offset: number) =>
  data[offset] | (data[offset + 1] << 8) | (data[offset + 2] << 16) | (data[offset + 3] << 24);

/**
 * find the first SOFn marker and read dimensions. SOF markers are
 * C0-CF, except C4 (huffman), C8 (reserved) and CC (arithmetic).
 */
const JPEGDimensions = (data: Uint8Array): { width: number, height: number }|undefined => {
  let offset = 2;
  while (offset + 9 < data.length) {
    if (data[offset] !== 0xff) {
      return undefined;
    }
    const marker = data[offset + 1];
    const length = ReadUint16BE(data, offset + 2);
    if (marker >= 0xc0 && marker <= 0xcf && marker !== 0xc4 && marker !== 0xc8 && marker !== 0xcc) {
      return {
        height: ReadUint16BE(data, offset + 5),
        width: ReadUint16BE(data, offset + 7),
      };
    }
    offset += 2 + length;
  }
  return undefined;
};

/**
 * identify the image type from its signature and read dimensions from
 * the header. returns undefined for anything we don't support.
 */
export const ImageInfoFromData = (data: Uint8Array): ImageInfo|undefined => {

  if (data.length >= 24 && data[0] === 0x89 && data[1] === 0x50 && data[2] === 0x4e && data[3] === 0x47) {
    return { type: 'png', width: ReadUint32BE(data, 16), height: ReadUint32BE(data, 20) };
  }

  if (data.length >= 4 && data[0] === 0xff && data[1] === 0xd8) {
    const dimensions = JPEGDimensions(data);
    return dimensions ? { type: 'jpeg', ...dimensions } : undefined;
  }

  if (data.length >= 10 && data[0] === 0x47 && data[1] === 0x49 && data[2] === 0x46 && data[3] === 0x38) {
    return { type: 'gif', width: ReadUint16LE(data, 6), height: ReadUint16LE(data, 8) };
  }

  if (data.length >= 26 && data[0] === 0x42 && data[1] === 0x4d) {
    return { type: 'bmp', width: ReadInt32LE(data, 18), height: Math.abs(ReadInt32LE(data, 22)) };
  }

  return undefined;

};

/**
 * image for inserting into a worksheet, or into a header/footer.
 * identical image data is written to the package once, however many
 * times it's used.
 */
export class Image {

  /** from a data uri (`data:image/png;base64,...`) or bare base64 */
  public static FromBase64(text: string): Image {
    const match = text.match(/^data:[^;,]*;base64,(.*)$/s);
    return new Image(Base64JS.toByteArray((match ? match[1] : text).replace(/\s+/g, '')));
  }

  public static FromFile(path: string): Image {
    try {
      return new Image(new Uint8Array(fs.readFileSync(path)));
    }
    catch (err) {
      if (err instanceof ParameterError) {
        throw err;
      }
      throw new IoError(`error reading image file ${path}`, err);
    }
  }

  public readonly type: ImageType;

  /** natural size, in pixels */
  public readonly width: number;
  public readonly height: number;

  /** sha-256 of the data, for dedup */
  public readonly hash: string;

  public scale_width = 1;
  public scale_height = 1;
  public alt_text = '';

  /** index of the media part, assigned at save */
  public media_index = 0;

  constructor(public readonly data: Uint8Array) {
    const info = ImageInfoFromData(data);
    if (!info) {
      throw new ParameterError('unsupported image type');
    }
    this.type = info.type;
    this.width = info.width;
    this.height = info.height;
    this.hash = createHash('sha256').update(data).digest('hex');
  }

  public SetScaleWidth(scale: number) {
    this.scale_width = scale;
    return this;
  }

  public SetScaleHeight(scale: number) {
    this.scale_height = scale;
    return this;
  }

  public SetAltText(text: string) {
    this.alt_text = text;
    return this;
  }

  /** display size, in pixels */
  public get display_width() {
    return Math.round(this.width * this.scale_width);
  }

  public get display_height() {
    return Math.round(this.height * this.scale_height);
  }

  /** path of the media part, relative to xl/ */
  public get media_path() {
    return `media/image${this.media_index}.${this.type}`;
  }

}
