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
  type Color, type ICellAddress, Area, MAX_COLUMNS, MAX_ROWS,
  QuoteSheetName, ValidateSheetName,
} from 'sheetwright-base-types';
import type { Chart, ChartCacheData } from './chart';
import type { CacheDataSource } from './chart-cache';
import {
  ColumnWidthToPixels, ColumnWidthToXML, DEFAULT_COLUMN_PIXELS,
  DEFAULT_ROW_PIXELS, RowHeightToPixels,
} from './column-width';
import { DefinedName } from './defined-name';
import { Drawing, PositionToAnchor } from './drawing';
import { ParameterError, RowColumnLimitError, SheetNameError } from './errors';
import { Format } from './format';
import type { Image } from './image';
import { type RelationshipMap, AddRel, RelationshipType } from './relationship';
import type { SharedStrings } from './shared-strings';
import { ColorAttributes } from './styles';
import { type TableOptions, Table } from './table';
import { type HeaderFooterImage, type HeaderFooterPosition, VMLDrawing } from './vml';
import { type DOMContent, SerializeXML, TextNode } from './xml-utils';

/** longest string a cell can hold */
export const MAX_STRING_LENGTH = 32767;

/** longest url in a hyperlink */
export const MAX_URL_LENGTH = 2079;

/** longest header or footer text */
export const MAX_HEADER_FOOTER_LENGTH = 255;

/** cached result of a formula, written as the cell value */
export type FormulaResult = number|string|boolean;

export type CellValue =
  { type: 'number', value: number } |
  { type: 'string', value: string } |
  { type: 'boolean', value: boolean } |
  { type: 'blank' } |
  {
    type: 'formula',
    formula: string,
    result?: FormulaResult,

    /** set for the anchor cell of an array formula */
    array?: Area,

    /** dynamic (spilled) array */
    dynamic?: boolean,
  };

/** cell value plus its local format index */
export type Cell = CellValue & { format: number };

export interface Hyperlink {
  row: number;
  column: number;

  /** external target; unset for links within the workbook */
  url?: string;

  /** location within the workbook, like `Sheet2!A1` */
  location?: string;

  tooltip?: string;
}

export interface InsertOptions {

  /** offset from the top-left of the cell, in pixels */
  x_offset?: number;
  y_offset?: number;
}

interface ObjectAnchor {
  row: number;
  column: number;
  x_offset: number;
  y_offset: number;
}

export type DrawingObject = (
  { chart: Chart } |
  { image: Image }
) & { anchor: ObjectAnchor };

export type HeaderFooterSection = 'left'|'center'|'right';

type SectionImages = Partial<Record<HeaderFooterSection, Image>>;

export interface PrintTitles {
  first: number;
  last: number;
}

/** anything that looks like an external link */
const external_url = /^(?:https?|ftps?|mailto|news|file):/i;

/**
 * functions that return arrays. formulas that call them are written
 * as dynamic arrays; they also need the future-function prefix in the
 * file. note that the prefix is not matched inside string literals,
 * which we don't parse.
 */
const dynamic_functions: Record<string, string> = {
  ANCHORARRAY: '_xlfn.ANCHORARRAY',
  FILTER: '_xlfn._xlws.FILTER',
  RANDARRAY: '_xlfn.RANDARRAY',
  SEQUENCE: '_xlfn.SEQUENCE',
  SORT: '_xlfn._xlws.SORT',
  SORTBY: '_xlfn.SORTBY',
  UNIQUE: '_xlfn.UNIQUE',
  XLOOKUP: '_xlfn.XLOOKUP',
  XMATCH: '_xlfn.XMATCH',
};

const dynamic_function_regex = new RegExp(`(?<![\\w.])(${Object.keys(dynamic_functions).join('|')})\\(`, 'gi');

/** 1899-12-30, the zero date in the 1900 date system */
const epoch = Date.UTC(1899, 11, 30);

/**
 * convert a date to a serial number. uses the UTC fields, so a date
 * built with Date.UTC comes out as written. dates before 1900-03-01
 * are adjusted for the phantom 1900-02-29.
 */
export const DateToSerial = (date: Date): number => {
  const serial = (date.getTime() - epoch) / 86400000;
  return serial < 61 ? serial - 1 : serial;
};

/**
 * split header/footer text into left, center and right sections.
 * text before any section code is centered.
 */
export const HeaderFooterSections = (text: string): Record<HeaderFooterSection, string> => {
  const sections = { left: '', center: '', right: '' };
  let current: HeaderFooterSection = 'center';
  for (const part of text.split(/(&[LCR])/)) {
    switch (part) {
      case '&L': current = 'left'; break;
      case '&C': current = 'center'; break;
      case '&R': current = 'right'; break;
      default: sections[current] += part;
    }
  }
  return sections;
};

const picture_placeholder = /&\[Picture\]|&G/;

export class Worksheet implements CacheDataSource {

  public name = '';

  /** sparse cell store: row -> column -> cell */
  public cells: Map<number, Map<number, Cell>> = new Map();

  /**
   * formats used in this sheet. index 0 is the default. cells refer to
   * formats by local index; the workbook maps them to global indices
   * at save.
   */
  public formats: Format[] = [new Format()];

  /** column widths in characters */
  public column_widths: Map<number, number> = new Map();

  /** row heights in points */
  public row_heights: Map<number, number> = new Map();

  public hyperlinks: Hyperlink[] = [];
  public merges: Area[] = [];
  public tables: Table[] = [];
  public drawing_objects: DrawingObject[] = [];

  public autofilter?: Area;
  public print_area?: Area;
  public repeat_rows?: PrintTitles;
  public repeat_columns?: PrintTitles;

  public header = '';
  public footer = '';
  public header_images: SectionImages = {};
  public footer_images: SectionImages = {};

  public paper_size = 0;
  public landscape = false;
  public tab_color?: Color;

  // flags

  public active = false;
  public first_sheet = false;
  public hidden = false;
  public uses_string_table = false;
  public has_dynamic_arrays = false;
  public has_hyperlink_style = false;

  // --- save state ------------------------------------------------------------

  /** local format index -> global xf index, set at save */
  public global_xf_indices: number[] = [];

  public relationships: RelationshipMap = {};
  public drawing?: Drawing;
  public vml?: VMLDrawing;

  private format_indices: Map<string, number> = new Map([[this.formats[0].Key(), 0]]);

  constructor(name?: string) {
    if (name !== undefined) {
      this.SetName(name);
    }
  }

  // --- sheet properties ------------------------------------------------------

  /** throws SheetNameError if the name is not allowed */
  public SetName(name: string) {
    const error = ValidateSheetName(name);
    if (error) {
      throw new SheetNameError(error);
    }
    this.name = name;
    return this;
  }

  public SetActive(active = true) {
    this.active = active;
    return this;
  }

  /** first visible tab in the tab bar */
  public SetFirstSheet(first_sheet = true) {
    this.first_sheet = first_sheet;
    return this;
  }

  public SetHidden(hidden = true) {
    this.hidden = hidden;
    return this;
  }

  public SetTabColor(color: Color) {
    this.tab_color = color;
    return this;
  }

  /** paper size index, as used by the printer settings (9 is A4) */
  public SetPaperSize(paper_size: number) {
    this.paper_size = paper_size;
    return this;
  }

  public SetLandscape(landscape = true) {
    this.landscape = landscape;
    return this;
  }

  // --- formats ---------------------------------------------------------------

  /** local index for a format, adding it to the list if necessary */
  public FormatIndex(format?: Format): number {
    if (!format) {
      return 0;
    }
    const key = format.Key();
    let index = this.format_indices.get(key);
    if (index === undefined) {
      index = this.formats.length;
      this.formats.push(format);
      this.format_indices.set(key, index);
    }
    return index;
  }

  /** set the local -> global format map. the list is positional. */
  public SetGlobalXfIndices(indices: number[]) {
    this.global_xf_indices = indices;
  }

  // --- cells -----------------------------------------------------------------

  /**
   * write a value, choosing the type from the value. null writes a
   * blank cell (which is only stored if it has a format).
   */
  public Write(row: number, column: number, value: number|string|boolean|Date|null, format?: Format) {
    if (value === null) {
      return this.WriteBlank(row, column, format);
    }
    if (value instanceof Date) {
      return this.WriteDateTime(row, column, value, format);
    }
    switch (typeof value) {
      case 'number':
        return this.WriteNumber(row, column, value, format);
      case 'boolean':
        return this.WriteBoolean(row, column, value, format);
      default:
        return this.WriteString(row, column, value, format);
    }
  }

  public WriteNumber(row: number, column: number, value: number, format?: Format) {
    if (!Number.isFinite(value)) {
      throw new ParameterError(`Can't write ${value} as a number`);
    }
    return this.Insert(row, column, { type: 'number', value, format: this.FormatIndex(format) });
  }

  public WriteString(row: number, column: number, value: string, format?: Format) {
    if (value.length > MAX_STRING_LENGTH) {
      throw new ParameterError(`String exceeds the limit of ${MAX_STRING_LENGTH} characters`);
    }
    this.uses_string_table = true;
    return this.Insert(row, column, { type: 'string', value, format: this.FormatIndex(format) });
  }

  public WriteBoolean(row: number, column: number, value: boolean, format?: Format) {
    return this.Insert(row, column, { type: 'boolean', value, format: this.FormatIndex(format) });
  }

  /** a blank cell with no format is not stored */
  public WriteBlank(row: number, column: number, format?: Format) {
    const index = this.FormatIndex(format);
    if (!index) {
      this.CheckDimensions(row, column);
      return this;
    }
    return this.Insert(row, column, { type: 'blank', format: index });
  }

  /**
   * formulas may start with `=`. the result is written as the cached
   * value; it defaults to 0. formulas that call array functions are
   * written as dynamic arrays.
   */
  public WriteFormula(row: number, column: number, formula: string, format?: Format, result?: FormulaResult) {
    dynamic_function_regex.lastIndex = 0;
    if (dynamic_function_regex.test(formula)) {
      return this.WriteDynamicArrayFormula(row, column, row, column, formula, format, result);
    }
    return this.Insert(row, column, {
      type: 'formula',
      formula: this.FormulaText(formula),
      result,
      format: this.FormatIndex(format),
    });
  }

  /**
   * legacy (CSE) array formula. the formula is stored in the first
   * cell; the rest of the range gets zeros in the same format.
   */
  public WriteArrayFormula(
      first_row: number, first_column: number, last_row: number, last_column: number,
      formula: string, format?: Format, result?: FormulaResult) {
    return this.ArrayFormula(first_row, first_column, last_row, last_column, formula, false, format, result);
  }

  /** array formula that spills; needs the metadata part */
  public WriteDynamicArrayFormula(
      first_row: number, first_column: number, last_row: number, last_column: number,
      formula: string, format?: Format, result?: FormulaResult) {
    return this.ArrayFormula(first_row, first_column, last_row, last_column, formula, true, format, result);
  }

  /** write a date as a serial number. the default format is `m/d/yyyy h:mm`. */
  public WriteDateTime(row: number, column: number, date: Date, format?: Format) {
    if (Number.isNaN(date.getTime())) {
      throw new ParameterError('Invalid date');
    }
    return this.WriteNumber(row, column, DateToSerial(date), format || new Format().SetNumFormatIndex(22));
  }

  /**
   * write a hyperlink. external urls get a relationship; `internal:`
   * links point to a location in the workbook, like
   * `internal:Sheet2!A1`. the cell shows `text`, or the url. without a
   * format, the cell uses the hyperlink style.
   */
  public WriteUrl(row: number, column: number, url: string, text?: string, format?: Format, tooltip?: string) {

    if (url.length > MAX_URL_LENGTH) {
      throw new ParameterError(`URL exceeds the limit of ${MAX_URL_LENGTH} characters`);
    }

    const link: Hyperlink = { row, column, tooltip };
    let display = url;

    if (url.startsWith('internal:')) {
      link.location = url.substring(9);
      display = link.location;
    }
    else if (external_url.test(url)) {
      link.url = url.replace(/ /g, '%20');
      display = url.replace(/^mailto:/i, '');
    }
    else {
      throw new ParameterError(`Unsupported URL '${url}'`);
    }

    if (!format) {
      format = new Format().SetHyperlink();
      this.has_hyperlink_style = true;
    }

    this.WriteString(row, column, text ?? display, format);

    this.hyperlinks = this.hyperlinks.filter(test => test.row !== row || test.column !== column);
    this.hyperlinks.push(link);

    return this;

  }

  /** cell at an address, if there is one */
  public CellAt(row: number, column: number): Cell|undefined {
    return this.cells.get(row)?.get(column);
  }

  // --- layout ----------------------------------------------------------------

  /** width in characters */
  public SetColumnWidth(column: number, width: number) {
    this.CheckDimensions(0, column);
    if (width < 0) {
      throw new ParameterError('Column width cannot be negative');
    }
    this.column_widths.set(column, width);
    return this;
  }

  /** height in points */
  public SetRowHeight(row: number, height: number) {
    this.CheckDimensions(row, 0);
    if (height < 0 || height > 409) {
      throw new ParameterError('Row height must be between 0 and 409 points');
    }
    this.row_heights.set(row, height);
    return this;
  }

  public ColumnPixels(column: number): number {
    const width = this.column_widths.get(column);
    return width === undefined ? DEFAULT_COLUMN_PIXELS : ColumnWidthToPixels(width);
  }

  public RowPixels(row: number): number {
    const height = this.row_heights.get(row);
    return height === undefined ? DEFAULT_ROW_PIXELS : RowHeightToPixels(height);
  }

  /**
   * merge a range and write text into the first cell. the other cells
   * get blanks in the same format, so borders are drawn across.
   */
  public MergeRange(
      first_row: number, first_column: number, last_row: number, last_column: number,
      text: string, format?: Format) {

    const area = this.CheckRange(first_row, first_column, last_row, last_column);

    if (area.count === 1) {
      throw new ParameterError(`Can't merge a single cell (${area.spreadsheet_label})`);
    }

    for (const merge of this.merges) {
      if (merge.Intersects(area)) {
        throw new ParameterError(`Merge range ${area.spreadsheet_label} overlaps ${merge.spreadsheet_label}`);
      }
    }

    this.merges.push(area);
    this.WriteString(first_row, first_column, text, format);

    for (const address of area.Array()) {
      if (address.row !== first_row || address.column !== first_column) {
        this.WriteBlank(address.row, address.column, format);
      }
    }

    return this;

  }

  // --- print and filter ------------------------------------------------------

  public SetAutofilter(first_row: number, first_column: number, last_row: number, last_column: number) {
    this.autofilter = this.CheckRange(first_row, first_column, last_row, last_column);
    return this;
  }

  public SetPrintArea(first_row: number, first_column: number, last_row: number, last_column: number) {
    this.print_area = this.CheckRange(first_row, first_column, last_row, last_column);
    return this;
  }

  /** rows to repeat at the top of each printed page */
  public SetRepeatRows(first_row: number, last_row = first_row) {
    this.CheckRange(first_row, 0, last_row, 0);
    this.repeat_rows = { first: Math.min(first_row, last_row), last: Math.max(first_row, last_row) };
    return this;
  }

  /** columns to repeat at the left of each printed page */
  public SetRepeatColumns(first_column: number, last_column = first_column) {
    this.CheckRange(0, first_column, 0, last_column);
    this.repeat_columns = { first: Math.min(first_column, last_column), last: Math.max(first_column, last_column) };
    return this;
  }

  /**
   * header text, with the usual codes (`&L`, `&C`, `&R`, `&P`, ...).
   * images go where the text has `&[Picture]` or `&G`.
   */
  public SetHeader(text: string) {
    this.header = this.CheckHeaderFooter(text);
    return this;
  }

  public SetFooter(text: string) {
    this.footer = this.CheckHeaderFooter(text);
    return this;
  }

  /** the header must already have a picture placeholder in the section */
  public SetHeaderImage(section: HeaderFooterSection, image: Image) {
    this.CheckPlaceholder(this.header, section, 'header');
    this.header_images[section] = image;
    return this;
  }

  public SetFooterImage(section: HeaderFooterSection, image: Image) {
    this.CheckPlaceholder(this.footer, section, 'footer');
    this.footer_images[section] = image;
    return this;
  }

  /** header and footer images in the order the vml lists them */
  public HeaderFooterImages(): HeaderFooterImage[] {

    const list: HeaderFooterImage[] = [];
    const codes: Array<[HeaderFooterSection, 'L'|'C'|'R']> = [['left', 'L'], ['center', 'C'], ['right', 'R']];

    for (const [images, suffix] of [[this.header_images, 'H'], [this.footer_images, 'F']] as const) {
      for (const [section, code] of codes) {
        const image = images[section];
        if (image) {
          const position: HeaderFooterPosition = `${code}${suffix}`;
          list.push({ position, image });
        }
      }
    }

    return list;

  }

  // --- tables, charts, images ------------------------------------------------

  /**
   * add a table. header cells are written now, along with column
   * formulas and the totals row. tables can't overlap each other.
   */
  public AddTable(
      first_row: number, first_column: number, last_row: number, last_column: number,
      options: Partial<TableOptions> = {}): Table {

    const area = this.CheckRange(first_row, first_column, last_row, last_column);
    const table = new Table(area, options);

    for (const existing of this.tables) {
      if (existing.area.Intersects(area)) {
        throw new ParameterError(`Table range ${area.spreadsheet_label} overlaps table at ${existing.area.spreadsheet_label}`);
      }
    }

    const start = area.start;
    const data = table.data_area;

    table.headers.forEach((header, index) => {

      const column = start.column + index;
      const definition = table.options.columns[index];

      if (table.options.header_row) {
        this.WriteString(start.row, column, header, definition?.header_format);
      }

      const formula = table.ColumnFormula(index);
      if (formula) {
        for (let row = data.start.row; row <= data.end.row; row++) {
          this.WriteFormula(row, column, formula, definition?.format);
        }
      }

      if (table.options.total_row) {
        const total_formula = table.TotalFormula(index);
        if (total_formula) {
          this.WriteFormula(area.end.row, column, total_formula, definition?.format);
        }
        else if (definition?.total_label) {
          this.WriteString(area.end.row, column, definition.total_label);
        }
      }

    });

    this.tables.push(table);
    return table;

  }

  /** insert a chart with its top-left corner in a cell */
  public InsertChart(row: number, column: number, chart: Chart, options: InsertOptions = {}) {
    this.CheckDimensions(row, column);
    if (!chart.series.length) {
      throw new ParameterError('Chart must have at least one series');
    }
    this.drawing_objects.push({ chart, anchor: this.Anchor(row, column, options) });
    return this;
  }

  /** insert an image with its top-left corner in a cell */
  public InsertImage(row: number, column: number, image: Image, options: InsertOptions = {}) {
    this.CheckDimensions(row, column);
    this.drawing_objects.push({ image, anchor: this.Anchor(row, column, options) });
    return this;
  }

  public get charts(): Chart[] {
    const charts: Chart[] = [];
    for (const entry of this.drawing_objects) {
      if ('chart' in entry) {
        charts.push(entry.chart);
      }
    }
    return charts;
  }

  public get images(): Image[] {
    const images: Image[] = [];
    for (const entry of this.drawing_objects) {
      if ('image' in entry) {
        images.push(entry.image);
      }
    }
    return images;
  }

  // --- save ------------------------------------------------------------------

  /** clear state from a previous save */
  public Reset() {
    this.global_xf_indices = [];
    this.relationships = {};
    this.drawing = undefined;
    this.vml = undefined;
  }

  /**
   * build the drawing for this sheet. charts and media need their
   * indices set before this is called.
   */
  public PrepareDrawing(index: number) {
    const drawing = new Drawing(index);
    for (const entry of this.drawing_objects) {
      const size = ('chart' in entry) ?
        { width: entry.chart.width, height: entry.chart.height } :
        { width: entry.image.display_width, height: entry.image.display_height };
      const anchor = PositionToAnchor({ ...entry.anchor, ...size },
        column => this.ColumnPixels(column), row => this.RowPixels(row));
      if ('chart' in entry) {
        drawing.AddChart(entry.chart, anchor);
      }
      else {
        drawing.AddImage(entry.image, anchor);
      }
    }
    this.drawing = drawing;
  }

  public PrepareVML(index: number) {
    this.vml = new VMLDrawing(index, this.HeaderFooterImages());
  }

  /**
   * structural names for this sheet, before the sheet name is filled
   * in: autofilter, print area and print titles, if used.
   */
  public StructuralNames(): DefinedName[] {

    const names: DefinedName[] = [];

    if (this.autofilter) {
      names.push(DefinedName.Structural('autofilter', this.autofilter.absolute_label));
    }

    if (this.print_area) {
      names.push(DefinedName.Structural('print-area', this.print_area.absolute_label));
    }

    if (this.repeat_rows || this.repeat_columns) {
      const ranges: string[] = [];
      if (this.repeat_columns) {
        const { first, last } = this.repeat_columns;
        ranges.push(`$${Area.ColumnToLabel(first)}:$${Area.ColumnToLabel(last)}`);
      }
      if (this.repeat_rows) {
        const { first, last } = this.repeat_rows;
        ranges.push(`$${first + 1}:$${last + 1}`);
      }
      names.push(DefinedName.Structural('print-titles', ...ranges));
    }

    return names;

  }

  /**
   * cache data for a chart range. numbers are written in their string
   * form, booleans as 1/0 and formulas as their cached result. the
   * cache is numeric unless some value is a string.
   */
  public GetCacheData(area: Area): ChartCacheData {

    let type: 'number'|'string' = 'number';
    const data: string[] = [];

    const Text = (value: FormulaResult|undefined): string => {
      switch (typeof value) {
        case 'undefined':
          return '';
        case 'boolean':
          return value ? '1' : '0';
        case 'string':
          type = 'string';
          return value;
        default:
          return String(value);
      }
    };

    for (const address of area.Array()) {
      const cell = this.CellAt(address.row, address.column);
      if (!cell || cell.type === 'blank') {
        data.push('');
      }
      else if (cell.type === 'formula') {
        data.push(Text(cell.result));
      }
      else {
        data.push(Text(cell.value));
      }
    }

    return { type, data };

  }

  /**
   * worksheet xml. strings go into the shared table as they are seen,
   * and relationships are created in the order the parts are
   * referenced: hyperlinks, drawing, vml, tables.
   */
  public XML(strings: SharedStrings): string {

    this.relationships = {};

    const hyperlinks = this.HyperlinksDOM();

    let drawing: DOMContent|undefined;
    if (this.drawing && !this.drawing.empty) {
      drawing = { a$: { 'r:id': AddRel(this.relationships, RelationshipType.drawing, `../drawings/drawing${this.drawing.index}.xml`) } };
    }

    let legacy: DOMContent|undefined;
    if (this.vml) {
      legacy = { a$: { 'r:id': AddRel(this.relationships, RelationshipType.vml_drawing, `../drawings/vmlDrawing${this.vml.index}.vml`) } };
    }

    let table_parts: DOMContent|undefined;
    if (this.tables.length) {
      table_parts = {
        a$: { count: this.tables.length },
        tablePart: this.tables.map(table => ({
          a$: { 'r:id': AddRel(this.relationships, RelationshipType.table, `../tables/table${table.index}.xml`) },
        })),
      };
    }

    const tab_color = ColorAttributes(this.tab_color);

    // NOTE: order matters

    const dom: DOMContent = {
      worksheet: {
        a$: {
          xmlns: 'http://schemas.openxmlformats.org/spreadsheetml/2006/main',
          'xmlns:r': 'http://schemas.openxmlformats.org/officeDocument/2006/relationships',
        },
        sheetPr: tab_color ? { tabColor: { a$: tab_color } } : undefined,
        dimension: { a$: { ref: this.Dimension() } },
        sheetViews: {
          sheetView: {
            a$: {
              tabSelected: this.active ? 1 : undefined,
              workbookViewId: 0,
            },
          },
        },
        sheetFormatPr: { a$: { defaultRowHeight: 15 } },
        cols: this.ColumnsDOM(),
        sheetData: { row: this.RowsDOM(strings) },
        autoFilter: this.autofilter ? { a$: { ref: this.autofilter.spreadsheet_label } } : undefined,
        mergeCells: this.merges.length ? {
          a$: { count: this.merges.length },
          mergeCell: this.merges.map(merge => ({ a$: { ref: merge.spreadsheet_label } })),
        } : undefined,
        hyperlinks,
        pageMargins: {
          a$: { left: 0.7, right: 0.7, top: 0.75, bottom: 0.75, header: 0.3, footer: 0.3 },
        },
        pageSetup: (this.paper_size || this.landscape) ? {
          a$: {
            paperSize: this.paper_size || undefined,
            orientation: this.landscape ? 'landscape' : undefined,
          },
        } : undefined,
        headerFooter: (this.header || this.footer) ? {
          oddHeader: this.header ? TextNode(this.header.replace(/&\[Picture\]/g, '&G')) : undefined,
          oddFooter: this.footer ? TextNode(this.footer.replace(/&\[Picture\]/g, '&G')) : undefined,
        } : undefined,
        drawing,
        legacyDrawingHF: legacy,
        tableParts: table_parts,
      },
    };

    return SerializeXML(dom);

  }

  // --- internals -------------------------------------------------------------

  protected CheckDimensions(row: number, column: number) {
    if (!Number.isInteger(row) || !Number.isInteger(column)
        || row < 0 || column < 0 || row >= MAX_ROWS || column >= MAX_COLUMNS) {
      throw new RowColumnLimitError(row, column);
    }
  }

  /** check both corners, and return the normalized area */
  protected CheckRange(first_row: number, first_column: number, last_row: number, last_column: number) {
    this.CheckDimensions(first_row, first_column);
    this.CheckDimensions(last_row, last_column);
    return new Area({ row: first_row, column: first_column }, { row: last_row, column: last_column }, true);
  }

  protected CheckHeaderFooter(text: string) {
    if (text.length > MAX_HEADER_FOOTER_LENGTH) {
      throw new ParameterError(`Header/footer text exceeds the limit of ${MAX_HEADER_FOOTER_LENGTH} characters`);
    }
    return text;
  }

  protected CheckPlaceholder(text: string, section: HeaderFooterSection, label: string) {
    if (!picture_placeholder.test(HeaderFooterSections(text)[section])) {
      throw new ParameterError(`The ${section} section of the ${label} has no &[Picture] placeholder`);
    }
  }

  protected Insert(row: number, column: number, cell: Cell) {
    this.CheckDimensions(row, column);
    let row_map = this.cells.get(row);
    if (!row_map) {
      row_map = new Map();
      this.cells.set(row, row_map);
    }
    row_map.set(column, cell);
    return this;
  }

  protected Anchor(row: number, column: number, options: InsertOptions): ObjectAnchor {
    return { row, column, x_offset: options.x_offset || 0, y_offset: options.y_offset || 0 };
  }

  /** strip the leading `=` and add prefixes for newer functions */
  protected FormulaText(formula: string) {
    return formula.replace(/^=/, '').replace(dynamic_function_regex,
      (match, name: string) => `${dynamic_functions[name.toUpperCase()]}(`);
  }

  protected ArrayFormula(
      first_row: number, first_column: number, last_row: number, last_column: number,
      formula: string, dynamic: boolean, format?: Format, result?: FormulaResult) {

    const area = this.CheckRange(first_row, first_column, last_row, last_column);
    const index = this.FormatIndex(format);

    if (dynamic) {
      this.has_dynamic_arrays = true;
    }

    const start = area.start;
    this.Insert(start.row, start.column, {
      type: 'formula',
      formula: this.FormulaText(formula.replace(/^\{=?(.*)\}$/, '$1')),
      array: area,
      dynamic,
      result,
      format: index,
    });

    for (const address of area.Array()) {
      if (address.row !== start.row || address.column !== start.column) {
        this.Insert(address.row, address.column, { type: 'number', value: 0, format: index });
      }
    }

    return this;

  }

  /** used range, or A1 if the sheet is empty */
  protected Dimension(): string {

    let start: ICellAddress|undefined;
    let end: ICellAddress|undefined;

    for (const [row, row_map] of this.cells.entries()) {
      for (const column of row_map.keys()) {
        if (!start || !end) {
          start = { row, column };
          end = { row, column };
        }
        else {
          start = { row: Math.min(start.row, row), column: Math.min(start.column, column) };
          end = { row: Math.max(end.row, row), column: Math.max(end.column, column) };
        }
      }
    }

    return (start && end) ? new Area(start, end).spreadsheet_label : 'A1';

  }

  /** consecutive columns with the same width share one entry */
  protected ColumnsDOM(): DOMContent|undefined {

    const columns = [...this.column_widths.keys()].sort((a, b) => a - b);
    const entries: Array<{ min: number, max: number, width: number }> = [];

    for (const column of columns) {
      const width = this.column_widths.get(column) ?? 0;
      const last = entries[entries.length - 1];
      if (last && last.max === column && last.width === width) {
        last.max = column + 1;
      }
      else {
        entries.push({ min: column + 1, max: column + 1, width });
      }
    }

    if (!entries.length) {
      return undefined;
    }

    return {
      col: entries.map(entry => ({
        a$: {
          min: entry.min,
          max: entry.max,
          width: ColumnWidthToXML(entry.width),
          hidden: entry.width === 0 ? 1 : undefined,
          customWidth: 1,
        },
      })),
    };

  }

  protected CellDOM(row: number, column: number, cell: Cell, strings: SharedStrings): DOMContent {

    let v: string|number|undefined;
    let t: string|undefined;
    let f: DOMContent|string|undefined;
    let cm: number|undefined;

    switch (cell.type) {

      case 'number':
        v = cell.value;
        break;

      case 'string':
        v = strings.Ensure(cell.value);
        t = 's';
        break;

      case 'boolean':
        v = cell.value ? 1 : 0;
        t = 'b';
        break;

      case 'formula':
        f = cell.formula;
        switch (typeof cell.result) {
          case 'string':
            v = cell.result;
            t = 'str';
            break;
          case 'boolean':
            v = cell.result ? 1 : 0;
            t = 'b';
            break;
          case 'number':
            v = cell.result;
            break;
          default:
            v = 0;
        }
        if (cell.array) {
          f = {
            t$: cell.formula,
            a$: { t: 'array', ref: cell.array.spreadsheet_label },
          };
          if (cell.dynamic) {
            cm = 1;
          }
        }
        break;

    }

    const s = this.global_xf_indices[cell.format] ?? cell.format;

    return {
      a$: {
        r: Area.CellAddressToLabel({ row, column }),
        s: s || undefined,
        t,
        cm,
      },
      f,
      v: (typeof v === 'string') ? TextNode(v) : v,
    };

  }

  protected RowsDOM(strings: SharedStrings): DOMContent[] {

    const rows = new Set([...this.cells.keys(), ...this.row_heights.keys()]);
    const sheet_rows: DOMContent[] = [];

    for (const row of [...rows].sort((a, b) => a - b)) {

      const row_map = this.cells.get(row);
      const columns = row_map ? [...row_map.keys()].sort((a, b) => a - b) : [];

      const c: DOMContent[] = [];
      for (const column of columns) {
        const cell = row_map?.get(column);
        if (cell) {
          c.push(this.CellDOM(row, column, cell, strings));
        }
      }

      const height = this.row_heights.get(row);

      sheet_rows.push({
        a$: {
          r: row + 1,
          spans: columns.length ? `${columns[0] + 1}:${columns[columns.length - 1] + 1}` : undefined,
          ht: height,
          hidden: height === 0 ? 1 : undefined,
          customHeight: height === undefined ? undefined : 1,
        },
        c,
      });

    }

    return sheet_rows;

  }

  protected HyperlinksDOM(): DOMContent|undefined {

    if (!this.hyperlinks.length) {
      return undefined;
    }

    const links = [...this.hyperlinks].sort((a, b) => a.row - b.row || a.column - b.column);

    return {
      hyperlink: links.map(link => ({
        a$: {
          ref: Area.CellAddressToLabel({ row: link.row, column: link.column }),
          'r:id': link.url ? AddRel(this.relationships, RelationshipType.hyperlink, link.url, 'External') : undefined,
          location: link.location,
          tooltip: link.tooltip,
        },
      })),
    };

  }

  /** sheet name as used in formulas */
  public get quoted_name() {
    return QuoteSheetName(this.name);
  }

}
