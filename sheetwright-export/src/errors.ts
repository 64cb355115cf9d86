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

/**
 * base class for errors thrown by the writer. callers can test for
 * this to separate our errors from anything else.
 */
export class XlsxError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'XlsxError';
  }
}

/** bad argument, or a reference that can't be resolved at save */
export class ParameterError extends XlsxError {
  constructor(message: string) {
    super(message);
    this.name = 'ParameterError';
  }
}

/** lookup of a worksheet by name or index failed */
export class WorksheetReferenceError extends XlsxError {
  constructor(public readonly reference: string|number) {
    super(typeof reference === 'number' ?
      `Worksheet index ${reference} is out of range` :
      `Unknown worksheet name '${reference}'`);
    this.name = 'WorksheetReferenceError';
  }
}

export class SheetNameError extends XlsxError {
  constructor(message: string) {
    super(message);
    this.name = 'SheetNameError';
  }
}

export class RowColumnLimitError extends XlsxError {
  constructor(public readonly row: number, public readonly column: number) {
    super(`Cell (${row}, ${column}) is outside the worksheet limits`);
    this.name = 'RowColumnLimitError';
  }
}

export class SheetNameReusedError extends XlsxError {
  constructor(public readonly sheet_name: string) {
    super(`Worksheet name '${sheet_name}' has already been used`);
    this.name = 'SheetNameReusedError';
  }
}

export class TableNameReusedError extends XlsxError {
  constructor(public readonly table_name: string) {
    super(`Table name '${table_name}' has already been used`);
    this.name = 'TableNameReusedError';
  }
}

/** file system failure while writing the package */
export class IoError extends XlsxError {
  constructor(message: string, cause: unknown) {
    super(message, { cause });
    this.name = 'IoError';
  }
}

/** failure in the zip encoder */
export class ContainerError extends XlsxError {
  constructor(message: string, cause: unknown) {
    super(message, { cause });
    this.name = 'ContainerError';
  }
}
