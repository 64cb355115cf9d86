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

import { type DOMContent, SerializeXML, TextNode } from './xml-utils';

/**
 * shared strings table. built at save time, as worksheets are written,
 * so indices follow the order strings are first seen.
 */
export class SharedStrings {

  public strings: string[] = [];

  /** total number of references, including repeats */
  public count = 0;

  private reverse: Map<string, number> = new Map();

  /** find existing string or insert, and return index */
  public Ensure(text: string): number {

    this.count++;

    let index = this.reverse.get(text);
    if (typeof index === 'number') {
      return index;
    }

    index = this.strings.length;
    this.strings.push(text);
    this.reverse.set(text, index);
    return index;

  }

  public XML(): string {

    const dom: DOMContent = {
      sst: {
        a$: {
          'xmlns': 'http://schemas.openxmlformats.org/spreadsheetml/2006/main',
          count: this.count,
          uniqueCount: this.strings.length,
        },
        si: this.strings.map(t => ({ t: TextNode(t) })),
      },
    };

    return SerializeXML(dom);

  }

}
