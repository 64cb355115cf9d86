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

import UZip from 'uzip';
import Base64JS from 'base64-js';
import { ContainerError } from './errors';

/**
 * write-only zip container. entries are stored in the order they are
 * set; the encoder writes no timestamps, so the same entries produce
 * the same bytes.
 */
export class ZipWrapper {

  public records: UZip.UZIPFiles = {};

  private encoder = new TextEncoder();

  /**
   * check if entry exists
   */
  public Has(path: string) {
    return !!this.records[path];
  }

  /** list of paths, in insertion order */
  public get paths() {
    return Object.keys(this.records);
  }

  /**
   * set a binary file. data is either bytes or a base64 string.
   */
  public SetBinary(path: string, data: Uint8Array|string, encoding?: 'base64') {

    if (typeof data !== 'string') {
      this.records[path] = data;
    }
    else if (encoding === 'base64') {
      this.records[path] = Base64JS.toByteArray(data);
    }
    else {
      throw new ContainerError('unsupported encoding: ' + encoding, undefined);
    }

  }

  public Set(path: string, text: string) {
    this.records[path] = this.encoder.encode(text);
  }

  /**
   * nondestructive
   */
  public ArrayBuffer(compress = true): ArrayBuffer {
    try {
      return UZip.encode(this.records, !compress);
    }
    catch (err) {
      throw new ContainerError('error creating zip container', err);
    }
  }

}
