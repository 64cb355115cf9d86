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

import {
  type Border, type Fill, type Font, Format,
  BorderKey, FillKey, FontKey,
} from './format';

export interface NumberFormat {
  id: number;
  format: string;
}

/**
 * one entry in the cellXfs table. the format is the registered format
 * with its fill normalized; the indices point into the registry's
 * font, fill, border and number format tables.
 */
export interface CellXf {
  format: Format;
  font: number;
  fill: number;
  border: number;
  number_format: number;

  /** index into cellStyleXfs: 0 normal, 1 hyperlink */
  xf_id: number;
}

/** user-defined number formats start here */
export const BASE_NUMBER_FORMAT_ID = 164;

/**
 * the workbook-level style table. worksheets keep their own format
 * lists; at save time every sheet's formats are registered here and
 * collapse into one deduplicated list, and the registry then builds
 * the font, fill, border and number format tables that styles.xml
 * references.
 *
 * the registry is reset at the start of every save. index 0 is always
 * the default format.
 */
export class FormatRegistry {

  /**
   * built-in number formats. a format string that matches one of these
   * uses the built-in id instead of getting a custom entry.
   */
  public static default_styles: {[index: number]: string} = {
    0:	'General',
    1:	'0',
    2:	'0.00',
    3:	'#,##0',
    4:	'#,##0.00',
    9:	'0%',
    10:	'0.00%',
    11:	'0.00E+00',
    12:	'# ?/?',
    13:	'# ??/??',
    14:	'm/d/yyyy',
    15:	'd-mmm-yy',
    16:	'd-mmm',
    17:	'mmm-yy',
    18:	'h:mm AM/PM',
    19:	'h:mm:ss AM/PM',
    20:	'h:mm',
    21:	'h:mm:ss',
    22:	'm/d/yyyy h:mm',
    37:	'#,##0 ;(#,##0)',
    38:	'#,##0 ;[Red](#,##0)',
    39:	'#,##0.00;(#,##0.00)',
    40:	'#,##0.00;[Red](#,##0.00)',
    45:	'mm:ss',
    46:	'[h]:mm:ss',
    47:	'mm:ss.0',
    48:	'##0.0E+0',
    49:	'@',
  };

  /**
   * look up a built-in number format by text. general matches any
   * casing, since it's the one people type.
   */
  public static BuiltInNumberFormat(format: string): number|undefined {
    if (/^general$/i.test(format)) {
      return 0;
    }
    for (const [key, value] of Object.entries(FormatRegistry.default_styles)) {
      if (value === format) {
        return Number(key);
      }
    }
    return undefined;
  }

  /**
   * solid fills swap foreground and background (that's how the file
   * format wants them). a color with no pattern means a solid fill.
   */
  public static NormalizeFill(source: Fill): Fill {

    let { pattern, foreground_color, background_color } = source;

    if (pattern === 'solid' && background_color && foreground_color) {
      [foreground_color, background_color] = [background_color, foreground_color];
    }

    if ((pattern === 'none' || pattern === 'solid') && background_color && !foreground_color) {
      foreground_color = background_color;
      background_color = undefined;
      pattern = 'solid';
    }

    if ((pattern === 'none' || pattern === 'solid') && !background_color && foreground_color) {
      pattern = 'solid';
    }

    return { pattern, foreground_color, background_color };

  }

  /** registered formats, by global index */
  public formats: Format[] = [];

  public fonts: Font[] = [];
  public fills: Fill[] = [];
  public borders: Border[] = [];
  public number_formats: NumberFormat[] = [];
  public cell_xfs: CellXf[] = [];

  /** set if the hyperlink style is reserved at index 1 */
  public has_hyperlink_style = false;

  private indices: Map<string, number> = new Map();

  constructor() {
    this.Reset();
  }

  public Reset() {
    const format = new Format();
    this.formats = [format];
    this.indices = new Map([[format.Key(), 0]]);
    this.fonts = [];
    this.fills = [];
    this.borders = [];
    this.number_formats = [];
    this.cell_xfs = [];
    this.has_hyperlink_style = false;
  }

  /**
   * reserve index 1 for the hyperlink format. this has to happen before
   * any other format is registered.
   */
  public AddHyperlinkStyle() {
    if (this.formats.length !== 1) {
      throw new Error('hyperlink style must be registered first');
    }
    this.Register(new Format().SetHyperlink());
    this.has_hyperlink_style = true;
  }

  /**
   * register a format and return its global index. the same format
   * (by value) always gets the same index.
   */
  public Register(format: Format): number {
    const key = format.Key();
    const index = this.indices.get(key);
    if (index !== undefined) {
      return index;
    }
    const next = this.formats.length;
    this.formats.push(format);
    this.indices.set(key, next);
    return next;
  }

  /** number of registered formats */
  public get count() {
    return this.formats.length;
  }

  /**
   * build the font, fill, border and number format tables and the
   * cellXfs list. call after every sheet has registered.
   */
  public Prepare() {

    const font_map: Map<string, number> = new Map();
    const border_map: Map<string, number> = new Map();
    const number_format_map: Map<string, number> = new Map();

    // the first two fills are implicit

    this.fills = [{ pattern: 'none' }, { pattern: 'gray125' }];
    const fill_map: Map<string, number> = new Map(this.fills.map((fill, index): [string, number] => [FillKey(fill), index]));

    this.fonts = [];
    this.borders = [];
    this.number_formats = [];

    let next_number_format = BASE_NUMBER_FORMAT_ID;

    const Lookup = <T>(map: Map<string, number>, list: T[], key: string, value: T) => {
      let index = map.get(key);
      if (index === undefined) {
        index = list.length;
        list.push(value);
        map.set(key, index);
      }
      return index;
    };

    this.cell_xfs = this.formats.map(format => {

      const fill = FormatRegistry.NormalizeFill(format.fill);

      let number_format = format.num_format_index;
      if (!number_format && format.num_format) {
        const built_in = FormatRegistry.BuiltInNumberFormat(format.num_format);
        if (built_in !== undefined) {
          number_format = built_in;
        }
        else {
          const existing = number_format_map.get(format.num_format);
          if (existing !== undefined) {
            number_format = existing;
          }
          else {
            number_format = next_number_format++;
            number_format_map.set(format.num_format, number_format);
            this.number_formats.push({ id: number_format, format: format.num_format });
          }
        }
      }

      return {
        format: new Format({ ...format.properties, fill }),
        font: Lookup(font_map, this.fonts, FontKey(format.font), format.font),
        fill: Lookup(fill_map, this.fills, FillKey(fill), fill),
        border: Lookup(border_map, this.borders, BorderKey(format.border), format.border),
        number_format,
        xf_id: (format.hyperlink && this.has_hyperlink_style) ? 1 : 0,
      };

    });

  }

}
