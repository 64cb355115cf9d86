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

import { Area } from 'sheetwright-base-types';
import { ParameterError } from './errors';
import type { Format } from './format';
import { type DOMContent, SerializeXML } from './xml-utils';

export type TotalFunction = 'average'|'countNums'|'count'|'max'|'min'|'stdDev'|'sum'|'var';

/** SUBTOTAL function numbers for the totals row (ignoring hidden rows) */
const subtotal_codes: Record<TotalFunction, number> = {
  average: 101,
  countNums: 102,
  count: 103,
  max: 104,
  min: 105,
  stdDev: 107,
  sum: 109,
  var: 110,
};

export interface TableColumn {

  /** header text. defaults to `Column1`, `Column2`, ... */
  header?: string;

  /** formula for every data row, like `=[@Price]*[@Qty]` */
  formula?: string;

  /** text for the totals row; ignored if there's a total function */
  total_label?: string;

  total_function?: TotalFunction;

  /** format for the data cells in this column */
  format?: Format;

  /** format for the header cell */
  header_format?: Format;
}

export interface TableOptions {
  name?: string;
  style: string;
  header_row: boolean;
  total_row: boolean;
  autofilter: boolean;
  banded_rows: boolean;
  banded_columns: boolean;
  first_column: boolean;
  last_column: boolean;
  columns: TableColumn[];
}

export const DefaultTableOptions: TableOptions = {
  style: 'TableStyleMedium9',
  header_row: true,
  total_row: false,
  autofilter: true,
  banded_rows: true,
  banded_columns: false,
  first_column: false,
  last_column: false,
  columns: [],
};

const table_name_regex = /^[\p{L}_\\][^ ,/*[\]:"'!]*$/u;

/**
 * worksheet table (list object). header and total cells are written
 * into the sheet when the table is added; the table part itself is
 * written at save.
 */
export class Table {

  public options: TableOptions;

  /** table id in the package, assigned at save */
  public index = 0;

  /** header names, one per column */
  public headers: string[];

  constructor(public area: Area, options: Partial<TableOptions> = {}) {

    this.options = { ...DefaultTableOptions, ...options };

    if (this.options.name !== undefined && !table_name_regex.test(this.options.name)) {
      throw new ParameterError(`Invalid table name '${this.options.name}'`);
    }

    if (this.options.name !== undefined && Area.ParseCellLabel(this.options.name)) {
      throw new ParameterError(`Table name '${this.options.name}' cannot look like a cell reference`);
    }

    const minimum_rows = 1 + (this.options.header_row ? 1 : 0) + (this.options.total_row ? 1 : 0);
    if (area.rows < minimum_rows) {
      throw new ParameterError('Table must have at least one data row');
    }

    if (this.options.columns.length > area.columns) {
      throw new ParameterError('Table has more column definitions than columns');
    }

    this.headers = [];
    const seen: Set<string> = new Set();

    for (let i = 0; i < area.columns; i++) {
      const header = this.options.columns[i]?.header || `Column${i + 1}`;
      if (seen.has(header.toLowerCase())) {
        throw new ParameterError(`Duplicate table column header '${header}'`);
      }
      seen.add(header.toLowerCase());
      this.headers.push(header);
    }

  }

  /** the name used in the package: explicit, or `Table{index}` */
  public get name() {
    return this.options.name || `Table${this.index}`;
  }

  /** rows holding data, excluding header and totals */
  public get data_area(): Area {
    const start = this.area.start;
    const end = this.area.end;
    return new Area(
      { row: start.row + (this.options.header_row ? 1 : 0), column: start.column },
      { row: end.row - (this.options.total_row ? 1 : 0), column: end.column });
  }

  /**
   * the totals row formula for a column, or undefined. structured
   * references use the column header.
   */
  public TotalFormula(column: number): string|undefined {
    const definition = this.options.columns[column];
    if (!definition?.total_function) {
      return undefined;
    }
    const header = this.headers[column].replace(/(['#[\]])/g, `'$1`);
    return `SUBTOTAL(${subtotal_codes[definition.total_function]},[${header}])`;
  }

  /**
   * column formula as written to the file, without `=`. the `@` (this
   * row) shorthand is expanded.
   */
  public ColumnFormula(column: number): string|undefined {
    const formula = this.options.columns[column]?.formula;
    if (!formula) {
      return undefined;
    }
    return formula.replace(/^=/, '').replace(/@/g, '[#This Row],');
  }

  public XML(): string {

    const options = this.options;
    const end = this.area.end;

    const autofilter_area = new Area(this.area.start, {
      row: end.row - (options.total_row ? 1 : 0),
      column: end.column,
    });

    const dom: DOMContent = {
      table: {
        a$: {
          xmlns: 'http://schemas.openxmlformats.org/spreadsheetml/2006/main',
          id: this.index,
          name: this.name,
          displayName: this.name,
          ref: this.area.spreadsheet_label,
          headerRowCount: options.header_row ? undefined : 0,
          totalsRowCount: options.total_row ? 1 : undefined,
          totalsRowShown: options.total_row ? undefined : 0,
        },
        autoFilter: (options.header_row && options.autofilter) ? {
          a$: { ref: autofilter_area.spreadsheet_label },
        } : undefined,
        tableColumns: {
          a$: { count: this.headers.length },
          tableColumn: this.headers.map((name, index) => {
            const column = options.columns[index];
            const block: DOMContent = {
              a$: {
                id: index + 1,
                name,
                totalsRowLabel: (options.total_row && !column?.total_function) ? column?.total_label : undefined,
                totalsRowFunction: options.total_row ? column?.total_function : undefined,
              },
            };
            const formula = this.ColumnFormula(index);
            if (formula) {
              block.calculatedColumnFormula = formula;
            }
            return block;
          }),
        },
        tableStyleInfo: {
          a$: {
            name: options.style,
            showFirstColumn: options.first_column ? 1 : 0,
            showLastColumn: options.last_column ? 1 : 0,
            showRowStripes: options.banded_rows ? 1 : 0,
            showColumnStripes: options.banded_columns ? 1 : 0,
          },
        },
      },
    };

    return SerializeXML(dom);

  }

}
