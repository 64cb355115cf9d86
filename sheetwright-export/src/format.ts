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

import { type Color, ColorKey } from 'sheetwright-base-types';
import { ParameterError } from './errors';

export type FormatUnderline = 'single'|'double'|'singleAccounting'|'doubleAccounting';
export type FormatScript = 'superscript'|'subscript';

export type FormatPattern =
  'none'|'solid'|'mediumGray'|'darkGray'|'lightGray'|'darkHorizontal'|
  'darkVertical'|'darkDown'|'darkUp'|'darkGrid'|'darkTrellis'|'lightHorizontal'|
  'lightVertical'|'lightDown'|'lightUp'|'lightGrid'|'lightTrellis'|'gray125'|'gray0625';

export type FormatBorder =
  'none'|'thin'|'medium'|'dashed'|'dotted'|'thick'|'double'|'hair'|'mediumDashed'|
  'dashDot'|'mediumDashDot'|'dashDotDot'|'mediumDashDotDot'|'slantDashDot';

export type DiagonalBorderType = 'up'|'down'|'both';

export type HorizontalAlignment = 'general'|'left'|'center'|'right'|'fill'|'justify'|'centerContinuous'|'distributed';
export type VerticalAlignment = 'top'|'center'|'bottom'|'justify'|'distributed';

export interface Font {
  readonly name: string;
  readonly size: number;
  readonly family: number;
  readonly scheme: string;
  readonly bold: boolean;
  readonly italic: boolean;
  readonly strikethrough: boolean;
  readonly underline?: FormatUnderline;
  readonly script?: FormatScript;
  readonly color?: Color;
}

export interface Fill {
  readonly pattern: FormatPattern;
  readonly foreground_color?: Color;
  readonly background_color?: Color;
}

export interface BorderSide {
  readonly style: FormatBorder;
  readonly color?: Color;
}

export interface Border {
  readonly top: BorderSide;
  readonly bottom: BorderSide;
  readonly left: BorderSide;
  readonly right: BorderSide;
  readonly diagonal: BorderSide;
  readonly diagonal_type?: DiagonalBorderType;
}

export interface Alignment {
  readonly horizontal?: HorizontalAlignment;
  readonly vertical?: VerticalAlignment;
  readonly wrap: boolean;
  readonly shrink: boolean;
  readonly indent: number;
  readonly rotation: number;
}

export interface FormatProperties {
  readonly font: Font;
  readonly fill: Fill;
  readonly border: Border;

  /** number format text. empty means general, or see num_format_index */
  readonly num_format: string;

  /** explicit built-in number format index. 0 means unset */
  readonly num_format_index: number;

  readonly alignment: Alignment;
  readonly locked: boolean;
  readonly hidden: boolean;
  readonly quote_prefix: boolean;
  readonly hyperlink: boolean;
}

/** freeze a properties object and everything hanging off it */
const Freeze = <T extends object>(value: T): Readonly<T> => {
  const members: unknown[] = Object.values(value);
  for (const member of members) {
    if (typeof member === 'object' && member !== null && !Object.isFrozen(member)) {
      Freeze(member);
    }
  }
  return Object.freeze(value);
};

const no_border: BorderSide = { style: 'none' };

export const DefaultFont: Font = Freeze({
  name: 'Calibri',
  size: 11,
  family: 2,
  scheme: 'minor',
  bold: false,
  italic: false,
  strikethrough: false,
});

export const DefaultFormatProperties: FormatProperties = Freeze({
  font: DefaultFont,
  fill: { pattern: 'none' },
  border: {
    top: no_border,
    bottom: no_border,
    left: no_border,
    right: no_border,
    diagonal: no_border,
  },
  num_format: '',
  num_format_index: 0,
  alignment: {
    wrap: false,
    shrink: false,
    indent: 0,
    rotation: 0,
  },
  locked: true,
  hidden: false,
  quote_prefix: false,
  hyperlink: false,
});

// --- keys --------------------------------------------------------------------

//
// keys are built from explicit field lists so they don't depend on
// the order in which properties were set. colors use ColorKey, so
// `red` and `#ff0000` are the same color.
//

export const FontKey = (font: Font) => JSON.stringify([
  font.name, font.size, font.family, font.scheme, font.bold, font.italic,
  font.strikethrough, font.underline || '', font.script || '', ColorKey(font.color),
]);

export const FillKey = (fill: Fill) => JSON.stringify([
  fill.pattern, ColorKey(fill.foreground_color), ColorKey(fill.background_color),
]);

const SideKey = (side: BorderSide) => [side.style, ColorKey(side.color)];

export const BorderKey = (border: Border) => JSON.stringify([
  SideKey(border.top), SideKey(border.bottom), SideKey(border.left),
  SideKey(border.right), SideKey(border.diagonal), border.diagonal_type || '',
]);

const AlignmentKey = (alignment: Alignment) => [
  alignment.horizontal || '', alignment.vertical || '', alignment.wrap,
  alignment.shrink, alignment.indent, alignment.rotation,
];

/**
 * cell format. formats are immutable values: properties are frozen,
 * and every Set method returns a new format and leaves the original
 * alone. a format can be shared between cells and sheets.
 *
 * two formats with the same properties are the same format as far as
 * the workbook is concerned, regardless of how they were built.
 */
export class Format {

  public readonly properties: FormatProperties;

  constructor(properties: Partial<FormatProperties> = {}) {
    this.properties = Freeze({ ...DefaultFormatProperties, ...properties });
  }

  public get font() { return this.properties.font; }
  public get fill() { return this.properties.fill; }
  public get border() { return this.properties.border; }
  public get num_format() { return this.properties.num_format; }
  public get num_format_index() { return this.properties.num_format_index; }
  public get alignment() { return this.properties.alignment; }
  public get hyperlink() { return this.properties.hyperlink; }

  /** total serialization of the format, used for dedup */
  public Key(): string {
    const p = this.properties;
    return JSON.stringify([
      FontKey(p.font), FillKey(p.fill), BorderKey(p.border),
      p.num_format, p.num_format_index, AlignmentKey(p.alignment),
      p.locked, p.hidden, p.quote_prefix, p.hyperlink,
    ]);
  }

  public Equals(other: Format) {
    return this.Key() === other.Key();
  }

  /** true if this is the same as the default format */
  public IsDefault() {
    return this.Key() === default_key;
  }

  // --- font ------------------------------------------------------------------

  public SetFontName(name: string) {
    return this.WithFont({ name, scheme: name === DefaultFont.name ? DefaultFont.scheme : '' });
  }

  public SetFontSize(size: number) {
    return this.WithFont({ size });
  }

  public SetFontFamily(family: number) {
    return this.WithFont({ family });
  }

  public SetFontColor(color: Color) {
    return this.WithFont({ color });
  }

  public SetBold(bold = true) {
    return this.WithFont({ bold });
  }

  public SetItalic(italic = true) {
    return this.WithFont({ italic });
  }

  public SetUnderline(underline: FormatUnderline = 'single') {
    return this.WithFont({ underline });
  }

  public SetFontStrikethrough(strikethrough = true) {
    return this.WithFont({ strikethrough });
  }

  public SetFontScript(script: FormatScript) {
    return this.WithFont({ script });
  }

  // --- number format ---------------------------------------------------------

  /** set number format text, like `0.00%` or `yyyy-mm-dd` */
  public SetNumFormat(num_format: string) {
    return this.With({ num_format, num_format_index: 0 });
  }

  /** set a built-in number format by index */
  public SetNumFormatIndex(num_format_index: number) {
    return this.With({ num_format_index, num_format: '' });
  }

  // --- fill ------------------------------------------------------------------

  public SetPattern(pattern: FormatPattern) {
    return this.WithFill({ pattern });
  }

  public SetBackgroundColor(background_color: Color) {
    return this.WithFill({ background_color });
  }

  public SetForegroundColor(foreground_color: Color) {
    return this.WithFill({ foreground_color });
  }

  // --- border ----------------------------------------------------------------

  /** set all four sides */
  public SetBorder(style: FormatBorder) {
    return this.WithBorder({
      top: { ...this.border.top, style },
      bottom: { ...this.border.bottom, style },
      left: { ...this.border.left, style },
      right: { ...this.border.right, style },
    });
  }

  /** set color on all four sides */
  public SetBorderColor(color: Color) {
    return this.WithBorder({
      top: { ...this.border.top, color },
      bottom: { ...this.border.bottom, color },
      left: { ...this.border.left, color },
      right: { ...this.border.right, color },
    });
  }

  public SetBorderTop(style: FormatBorder, color?: Color) {
    return this.WithBorder({ top: { style, color } });
  }

  public SetBorderBottom(style: FormatBorder, color?: Color) {
    return this.WithBorder({ bottom: { style, color } });
  }

  public SetBorderLeft(style: FormatBorder, color?: Color) {
    return this.WithBorder({ left: { style, color } });
  }

  public SetBorderRight(style: FormatBorder, color?: Color) {
    return this.WithBorder({ right: { style, color } });
  }

  public SetBorderDiagonal(style: FormatBorder, diagonal_type: DiagonalBorderType, color?: Color) {
    return this.WithBorder({ diagonal: { style, color }, diagonal_type });
  }

  // --- alignment -------------------------------------------------------------

  public SetAlign(horizontal: HorizontalAlignment) {
    return this.WithAlignment({ horizontal });
  }

  public SetVerticalAlign(vertical: VerticalAlignment) {
    return this.WithAlignment({ vertical });
  }

  public SetTextWrap(wrap = true) {
    return this.WithAlignment({ wrap });
  }

  public SetShrink(shrink = true) {
    return this.WithAlignment({ shrink });
  }

  public SetIndent(indent: number) {
    return this.WithAlignment({ indent });
  }

  /** rotation in degrees, -90 to 90, or 270 for stacked text */
  public SetRotation(rotation: number) {
    if (rotation !== 270 && !(Number.isInteger(rotation) && rotation >= -90 && rotation <= 90)) {
      throw new ParameterError(`Rotation must be -90 to 90, or 270 (got ${rotation})`);
    }
    return this.WithAlignment({ rotation });
  }

  // --- protection and flags --------------------------------------------------

  public SetUnlocked() {
    return this.With({ locked: false });
  }

  public SetHidden() {
    return this.With({ hidden: true });
  }

  public SetQuotePrefix() {
    return this.With({ quote_prefix: true });
  }

  /**
   * hyperlink style: theme hyperlink color, single underline. cells
   * written with a url and no explicit format get this style.
   */
  public SetHyperlink() {
    return new Format({
      ...this.properties,
      hyperlink: true,
      font: { ...this.font, color: { theme: 10 }, underline: 'single', scheme: '' },
    });
  }

  // --- internals -------------------------------------------------------------

  protected With(properties: Partial<FormatProperties>) {
    return new Format({ ...this.properties, ...properties });
  }

  protected WithFont(font: Partial<Font>) {
    return this.With({ font: { ...this.font, ...font } });
  }

  protected WithFill(fill: Partial<Fill>) {
    return this.With({ fill: { ...this.fill, ...fill } });
  }

  protected WithBorder(border: Partial<Border>) {
    return this.With({ border: { ...this.border, ...border } });
  }

  protected WithAlignment(alignment: Partial<Alignment>) {
    return this.With({ alignment: { ...this.alignment, ...alignment } });
  }

}

const default_key = new Format().Key();
