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

import { UnquoteSheetName } from 'sheetwright-base-types';
import { ParameterError } from './errors';

/**
 * global names are workbook-scoped; local names are scoped to one
 * sheet. the other types are structural names the worksheet creates
 * for autofilters, print areas and print titles.
 */
export type DefinedNameType = 'global'|'local'|'autofilter'|'print-area'|'print-titles';

const structural_names: Record<DefinedNameType, string> = {
  'global': '',
  'local': '',
  'autofilter': '_xlnm._FilterDatabase',
  'print-area': '_xlnm.Print_Area',
  'print-titles': '_xlnm.Print_Titles',
};

/** characters that can't appear in a name */
const invalid_name_characters = /[ ,/*[\]:"']/;

/**
 * a named range or constant. user names are created by the workbook's
 * DefineName; structural names are created by worksheets and get their
 * sheet name and range filled in at save.
 */
export class DefinedName {

  /**
   * parse and validate a name like `Sales` or `Sheet2!Sales` with a
   * formula like `=Sheet2!$G$1:$G$10`. throws ParameterError if the
   * name is invalid.
   */
  public static Parse(name: string, formula: string): DefinedName {

    const defined_name = new DefinedName();

    const position = name.indexOf('!');
    if (position >= 0) {
      defined_name.quoted_sheet_name = name.substring(0, position);
      defined_name.name = name.substring(position + 1);
      defined_name.type = 'local';
    }
    else {
      defined_name.name = name;
      defined_name.type = 'global';
    }

    if (!/^[\p{L}_\\]/u.test(defined_name.name)) {
      throw new ParameterError(`Name '${defined_name.name}' must start with a letter or underscore`);
    }

    if (invalid_name_characters.test(defined_name.name)) {
      throw new ParameterError(
        `Name '${defined_name.name}' cannot contain any of the characters ,/*[]:"' or space`);
    }

    defined_name.range = formula.startsWith('=') ? formula.substring(1) : formula;
    defined_name.SetSortName();

    return defined_name;

  }

  /**
   * create a structural name. ranges are sheet-relative (`$A$1:$D$10`);
   * more than one range (print titles) are joined with commas.
   */
  public static Structural(type: 'autofilter'|'print-area'|'print-titles', ...ranges: string[]) {
    const defined_name = new DefinedName();
    defined_name.type = type;
    defined_name.name = structural_names[type];
    defined_name.ranges = ranges;
    defined_name.SetSortName();
    return defined_name;
  }

  public name = '';
  public range = '';
  public type: DefinedNameType = 'global';

  /** sheet name as written, possibly quoted. empty for global names */
  public quoted_sheet_name = '';

  /** worksheet index, for everything but global names */
  public index = 0;

  /** lowercased name without prefixes, for ordering */
  public sort_name = '';

  /** unqualified ranges, for structural names */
  public ranges: string[] = [];

  public get unquoted_sheet_name() {
    return UnquoteSheetName(this.quoted_sheet_name);
  }

  /**
   * set sheet name for structural names and build the range. returns
   * a copy, so the worksheet's template is left alone.
   */
  public Initialize(quoted_sheet_name: string): DefinedName {
    const copy = this.Clone();
    copy.quoted_sheet_name = quoted_sheet_name;
    if (this.ranges.length) {
      copy.range = this.ranges.map(range => `${quoted_sheet_name}!${range}`).join(',');
    }
    return copy;
  }

  public Clone(): DefinedName {
    const copy = new DefinedName();
    copy.name = this.name;
    copy.range = this.range;
    copy.type = this.type;
    copy.quoted_sheet_name = this.quoted_sheet_name;
    copy.index = this.index;
    copy.sort_name = this.sort_name;
    copy.ranges = [...this.ranges];
    return copy;
  }

  /**
   * the entry for the "Named Ranges" list in app.xml. empty if this
   * name doesn't get one: autofilters never do, and global names only
   * if they refer to a range.
   */
  public AppName(): string {
    switch (this.type) {
      case 'autofilter':
        return '';
      case 'local':
        return `${this.quoted_sheet_name}!${this.name}`;
      case 'print-area':
        return `${this.quoted_sheet_name}!Print_Area`;
      case 'print-titles':
        return `${this.quoted_sheet_name}!Print_Titles`;
      case 'global':
        return this.range.includes('!') ? this.name : '';
    }
  }

  private SetSortName() {
    this.sort_name = this.name.replace('_xlnm.', '').replace(/\\/g, '').toLowerCase();
  }

}

export interface ResolvedNames {
  names: DefinedName[];
  app_names: string[];
}

/**
 * merge user names with the worksheets' structural names, map sheet
 * names to indices and sort. structural names must already be
 * initialized.
 *
 * throws ParameterError if a name refers to a sheet that doesn't exist.
 */
export const ResolveDefinedNames = (
    names: DefinedName[],
    sheet_indices: Map<string, number>): ResolvedNames => {

  const resolved = names.map(name => name.Clone());

  for (const defined_name of resolved) {
    const sheet_name = defined_name.unquoted_sheet_name;
    if (sheet_name) {
      const index = sheet_indices.get(sheet_name);
      if (index === undefined) {
        throw new ParameterError(
          `Unknown worksheet name '${sheet_name}' in defined name '${defined_name.name}'`);
      }
      defined_name.index = index;
    }
  }

  resolved.sort((a, b) => {
    if (a.sort_name !== b.sort_name) {
      return a.sort_name < b.sort_name ? -1 : 1;
    }
    if (a.range !== b.range) {
      return a.range < b.range ? -1 : 1;
    }
    return 0;
  });

  return {
    names: resolved,
    app_names: resolved.map(name => name.AppName()).filter(name => !!name),
  };

};
