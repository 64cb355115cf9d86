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

/** zero-based cell address. absolute flags only matter for labels. */
export interface ICellAddress {
  row: number;
  column: number;
  absolute_row?: boolean;
  absolute_column?: boolean;
}

export interface IArea {
  start: ICellAddress;
  end: ICellAddress;
}

/** sheet dimensions in the xlsx format */
export const MAX_ROWS = 1048576;
export const MAX_COLUMNS = 16384;

export const IsCellAddress = (obj: unknown): obj is ICellAddress => {
  return (
    !!obj &&
    typeof obj === 'object' &&
    'row' in obj && typeof obj.row === 'number' &&
    'column' in obj && typeof obj.column === 'number');
};

const cell_label_regex = /^(\$?)([A-Za-z]{1,3})(\$?)(\d+)$/;

/**
 * class represents a rectangular area on a sheet, either a range or
 * a single cell. unlike the grid's version there are no infinite
 * (entire row/column) areas; a file writer always knows the extent.
 */
export class Area implements IArea {

  public static ColumnToLabel(c: number){
    let s = String.fromCharCode(65 + c % 26);
    while (c > 25){
      c = Math.floor(c / 26) - 1;
      s = String.fromCharCode(65 + c % 26) + s;
    }
    return s;
  }

  /** inverse of ColumnToLabel. returns -1 for anything that's not letters */
  public static LabelToColumn(label: string): number {
    if (!/^[A-Za-z]+$/.test(label)) {
      return -1;
    }
    let column = 0;
    for (const char of label.toUpperCase()) {
      column = column * 26 + (char.charCodeAt(0) - 64);
    }
    return column - 1;
  }

  public static CellAddressToLabel(address: ICellAddress){
    return (address.absolute_column ? '$' : '')
      + this.ColumnToLabel(address.column)
      + (address.absolute_row ? '$' : '')
      + (address.row + 1);
  }

  /**
   * parse a label like `B3` or `$B$3`. returns undefined if the
   * label is not a cell reference.
   */
  public static ParseCellLabel(label: string): ICellAddress|undefined {
    const match = label.trim().match(cell_label_regex);
    if (!match) {
      return undefined;
    }
    const row = Number(match[4]) - 1;
    if (row < 0) {
      return undefined;
    }
    return {
      row,
      column: this.LabelToColumn(match[2]),
      absolute_column: match[1] === '$',
      absolute_row: match[3] === '$',
    };
  }

  /**
   * parse `A1` or `A1:C4` (no sheet name). returns undefined on
   * anything else.
   */
  public static FromLabel(label: string): Area|undefined {
    const parts = label.split(':');
    if (parts.length > 2) {
      return undefined;
    }
    const start = this.ParseCellLabel(parts[0]);
    const end = parts.length === 2 ? this.ParseCellLabel(parts[1]) : start;
    if (!start || !end) {
      return undefined;
    }
    return new Area(start, end, true);
  }

  private start_: ICellAddress;
  private end_: ICellAddress;

  /** accessor returns a _copy_ of the start address */
  public get start() {
    return { ...this.start_ };
  }

  /** accessor returns a _copy_ of the end address */
  public get end(){
    return { ...this.end_ };
  }

  public get rows(): number {
    return this.end_.row - this.start_.row + 1;
  }

  public get columns(): number {
    return this.end_.column - this.start_.column + 1;
  }

  public get count(): number {
    return this.rows * this.columns;
  }

  /** relative label, `A1` for a single cell or `A1:B2` */
  public get spreadsheet_label(): string {
    if (this.count === 1) {
      return Area.CellAddressToLabel({ row: this.start_.row, column: this.start_.column });
    }
    return Area.CellAddressToLabel({ row: this.start_.row, column: this.start_.column })
      + ':' + Area.CellAddressToLabel({ row: this.end_.row, column: this.end_.column });
  }

  /** absolute label, `$A$1` or `$A$1:$B$2` */
  public get absolute_label(): string {
    const start = Area.CellAddressToLabel({
      row: this.start_.row, column: this.start_.column, absolute_row: true, absolute_column: true });
    if (this.count === 1) {
      return start;
    }
    return start + ':' + Area.CellAddressToLabel({
      row: this.end_.row, column: this.end_.column, absolute_row: true, absolute_column: true });
  }

  constructor(start: ICellAddress, end: ICellAddress = start, normalize = false){
    this.start_ = { ...start };
    this.end_ = { ...end };
    if (normalize) {
      this.Normalize();
    }
  }

  /** ensure start is top-left and end is bottom-right */
  public Normalize(){
    const rows = [this.start_.row, this.end_.row].sort((a, b) => a - b);
    const columns = [this.start_.column, this.end_.column].sort((a, b) => a - b);
    this.start_ = { ...this.start_, row: rows[0], column: columns[0] };
    this.end_ = { ...this.end_, row: rows[1], column: columns[1] };
    return this;
  }

  public Contains(address: ICellAddress): boolean {
    return address.row >= this.start_.row && address.row <= this.end_.row
      && address.column >= this.start_.column && address.column <= this.end_.column;
  }

  public Intersects(area: IArea): boolean {
    return !(area.start.row > this.end_.row || area.end.row < this.start_.row
      || area.start.column > this.end_.column || area.end.column < this.start_.column);
  }

  public Equals(area: IArea): boolean {
    return area.start.row === this.start_.row && area.start.column === this.start_.column
      && area.end.row === this.end_.row && area.end.column === this.end_.column;
  }

  /** true if every address fits in an xlsx sheet */
  public IsValid(): boolean {
    return this.start_.row >= 0 && this.start_.column >= 0
      && this.end_.row < MAX_ROWS && this.end_.column < MAX_COLUMNS;
  }

  /** row-major list of addresses */
  public Array(): ICellAddress[] {
    const list: ICellAddress[] = [];
    for (let row = this.start_.row; row <= this.end_.row; row++) {
      for (let column = this.start_.column; column <= this.end_.column; column++) {
        list.push({ row, column });
      }
    }
    return list;
  }

  public toJSON(){
    return { start: this.start, end: this.end };
  }

}
