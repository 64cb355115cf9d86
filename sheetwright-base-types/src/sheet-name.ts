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

import { Area } from './area';

/** max length of a worksheet name */
export const MAX_SHEET_NAME_LENGTH = 31;

const unquoted_name_regex = /^[A-Za-z_\u00A0-\uFFFF][A-Za-z0-9_.\u00A0-\uFFFF]*$/;
const cell_reference_regex = /^[A-Za-z]{1,3}\d+$/;
const rc_reference_regex = /^(?:[Rr]\d*)?(?:[Cc]\d*)?$/;

export const IsQuoted = (name: string) => {
  return name.length >= 2 && name.startsWith(`'`) && name.endsWith(`'`);
};

/**
 * quote a sheet name for use in a formula or reference, if it needs
 * quoting. embedded apostrophes are doubled. names that are already
 * quoted are returned as-is.
 */
export const QuoteSheetName = (name: string) => {

  if (IsQuoted(name)) {
    return name;
  }

  if (unquoted_name_regex.test(name)
      && !cell_reference_regex.test(name)
      && !rc_reference_regex.test(name)) {
    return name;
  }

  return `'${name.replace(/'/g, `''`)}'`;

};

/** inverse of QuoteSheetName */
export const UnquoteSheetName = (name: string) => {
  if (IsQuoted(name)) {
    return name.substring(1, name.length - 1).replace(/''/g, `'`);
  }
  return name;
};

/**
 * check a worksheet name against the rules for xlsx. returns an error
 * message, or undefined if the name is OK.
 */
export const ValidateSheetName = (name: string): string|undefined => {

  if (!name.trim().length) {
    return 'Worksheet name cannot be blank';
  }

  if (name.length > MAX_SHEET_NAME_LENGTH) {
    return `Worksheet name '${name}' exceeds the limit of ${MAX_SHEET_NAME_LENGTH} characters`;
  }

  if (/[[\]:*?/\\]/.test(name)) {
    return `Worksheet name '${name}' cannot contain any of the characters '[]:*?/\\'`;
  }

  if (name.startsWith(`'`) || name.endsWith(`'`)) {
    return `Worksheet name '${name}' cannot start or end with an apostrophe`;
  }

  if (name.toLowerCase() === 'history') {
    return `Worksheet name 'History' is reserved`;
  }

  return undefined;

};

export interface RangeReference {

  /** unquoted sheet name, empty if the reference has none */
  sheet_name: string;

  area: Area;
}

/**
 * parse a reference like `Sheet1!$A$1:$B$4` or `'My Data'!C3`. the
 * split is on the last `!`, since a quoted sheet name can contain one.
 * returns undefined if the cell part doesn't parse.
 */
export const ParseRangeReference = (reference: string): RangeReference|undefined => {

  let text = reference.trim();
  if (text.startsWith('=')) {
    text = text.substring(1);
  }

  const index = text.lastIndexOf('!');
  const sheet_name = index >= 0 ? UnquoteSheetName(text.substring(0, index)) : '';
  const area = Area.FromLabel(text.substring(index + 1));

  if (!area) {
    return undefined;
  }

  return { sheet_name, area };

};
