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

import { ParseRangeReference, QuoteSheetName, UnquoteSheetName, ValidateSheetName } from '../src/sheet-name';
import { ColorKey, HTMLToARGB } from '../src/color';

test('quoting', () => {

  expect(QuoteSheetName('Sheet1')).toEqual('Sheet1');
  expect(QuoteSheetName('Sales.Q1')).toEqual('Sales.Q1');
  expect(QuoteSheetName('My Data')).toEqual(`'My Data'`);
  expect(QuoteSheetName(`O'Brien`)).toEqual(`'O''Brien'`);
  expect(QuoteSheetName('2024')).toEqual(`'2024'`);

  // things that look like references
  expect(QuoteSheetName('A1')).toEqual(`'A1'`);
  expect(QuoteSheetName('R1C1')).toEqual(`'R1C1'`);

  // already quoted
  expect(QuoteSheetName(`'My Data'`)).toEqual(`'My Data'`);

});

test('unquoting', () => {

  expect(UnquoteSheetName(`'O''Brien'`)).toEqual(`O'Brien`);
  expect(UnquoteSheetName('Sheet1')).toEqual('Sheet1');
  expect(UnquoteSheetName(QuoteSheetName('My Data'))).toEqual('My Data');

});

test('validation', () => {

  expect(ValidateSheetName('Sheet1')).toBeUndefined();
  expect(ValidateSheetName('   ')).toEqual('Worksheet name cannot be blank');
  expect(ValidateSheetName('Sheet[1]')).toEqual(`Worksheet name 'Sheet[1]' cannot contain any of the characters '[]:*?/\\'`);
  expect(ValidateSheetName('x'.repeat(32))).toEqual(`Worksheet name '${'x'.repeat(32)}' exceeds the limit of 31 characters`);
  expect(ValidateSheetName(`'quoted`)).toEqual(`Worksheet name ''quoted' cannot start or end with an apostrophe`);
  expect(ValidateSheetName('history')).toEqual(`Worksheet name 'History' is reserved`);

});

test('range references', () => {

  let reference = ParseRangeReference(`='My Data'!$A$1:$B$4`);
  expect(reference?.sheet_name).toEqual('My Data');
  expect(reference?.area.spreadsheet_label).toEqual('A1:B4');

  reference = ParseRangeReference(`Sheet1!C3`);
  expect(reference?.sheet_name).toEqual('Sheet1');
  expect(reference?.area.start).toEqual({ row: 2, column: 2, absolute_row: false, absolute_column: false });

  reference = ParseRangeReference('A1:A3');
  expect(reference?.sheet_name).toEqual('');

  expect(ParseRangeReference('Sheet1!Total')).toBeUndefined();

});

test('colors', () => {

  expect(HTMLToARGB('#ff0000')).toEqual('FFFF0000');
  expect(HTMLToARGB('00ff00')).toEqual('FF00FF00');
  expect(HTMLToARGB('Navy')).toEqual('FF000080');
  expect(HTMLToARGB('not a color')).toBeUndefined();

  expect(ColorKey({ text: '#FF0000' })).toEqual(ColorKey({ text: 'red' }));
  expect(ColorKey({ theme: 4, tint: 0.5 })).toEqual('theme:4:0.5');
  expect(ColorKey(undefined)).toEqual('');

});
