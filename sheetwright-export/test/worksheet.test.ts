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

import { Area, MAX_COLUMNS, MAX_ROWS } from 'sheetwright-base-types';
import { ParameterError, RowColumnLimitError, SheetNameError } from '../src/errors';
import { Format } from '../src/format';
import { Image } from '../src/image';
import { RelationshipType } from '../src/relationship';
import { SharedStrings } from '../src/shared-strings';
import { Table } from '../src/table';
import { DateToSerial, HeaderFooterSections, Worksheet } from '../src/worksheet';
import { TestPNG } from './read-package';

const SheetXML = (sheet: Worksheet) => sheet.XML(new SharedStrings());

describe('cells', () => {

  test('values', () => {

    const sheet = new Worksheet('Sheet1');
    sheet.WriteNumber(0, 0, 42);
    sheet.WriteString(0, 1, 'abc');
    sheet.WriteBoolean(1, 0, true);
    sheet.WriteFormula(1, 1, '=SUM(A1:A2)', undefined, 43);

    const strings = new SharedStrings();
    const xml = sheet.XML(strings);

    expect(xml).toContain('<dimension ref="A1:B2"/>');
    expect(xml).toContain('<row r="1" spans="1:2"><c r="A1"><v>42</v></c><c r="B1" t="s"><v>0</v></c></row>');
    expect(xml).toContain('<row r="2" spans="1:2"><c r="A2" t="b"><v>1</v></c><c r="B2"><f>SUM(A1:A2)</f><v>43</v></c></row>');
    expect(xml).toContain('<sheetViews><sheetView workbookViewId="0"/></sheetViews>');

    expect(strings.strings).toEqual(['abc']);
    expect(sheet.uses_string_table).toBeTruthy();

  });

  test('empty sheet', () => {
    const sheet = new Worksheet('Sheet1');
    sheet.SetActive();
    const xml = SheetXML(sheet);
    expect(xml).toContain('<dimension ref="A1"/>');
    expect(xml).toContain('<sheetView tabSelected="1" workbookViewId="0"/>');
    expect(xml).toContain('<sheetData/>');
  });

  test('write by type', () => {

    const sheet = new Worksheet('Sheet1');
    sheet.Write(0, 0, null);
    sheet.Write(0, 1, 'text');
    sheet.Write(0, 2, true);
    sheet.Write(0, 3, new Date(Date.UTC(2024, 0, 1)));
    sheet.Write(0, 4, 3.5);

    expect(sheet.CellAt(0, 0)).toBeUndefined();
    expect(sheet.CellAt(0, 1)).toEqual({ type: 'string', value: 'text', format: 0 });
    expect(sheet.CellAt(0, 2)).toEqual({ type: 'boolean', value: true, format: 0 });
    expect(sheet.CellAt(0, 3)).toEqual({ type: 'number', value: 45292, format: 1 });
    expect(sheet.CellAt(0, 4)).toEqual({ type: 'number', value: 3.5, format: 0 });

    expect(sheet.formats[1].num_format_index).toEqual(22);

  });

  test('blank cells are stored only with a format', () => {
    const sheet = new Worksheet('Sheet1');
    sheet.WriteBlank(0, 0);
    sheet.WriteBlank(0, 1, new Format().SetBold());
    expect(sheet.CellAt(0, 0)).toBeUndefined();
    expect(sheet.CellAt(0, 1)).toEqual({ type: 'blank', format: 1 });
  });

  test('formats are shared by value', () => {
    const sheet = new Worksheet('Sheet1');
    sheet.WriteNumber(0, 0, 1, new Format().SetBold());
    sheet.WriteNumber(0, 1, 2, new Format().SetBold());
    sheet.WriteNumber(0, 2, 3, new Format().SetItalic());
    expect(sheet.formats.length).toEqual(3);
    expect(sheet.CellAt(0, 1)?.format).toEqual(1);
    expect(sheet.CellAt(0, 2)?.format).toEqual(2);
  });

  test('global style index', () => {
    const sheet = new Worksheet('Sheet1');
    sheet.WriteNumber(0, 0, 1, new Format().SetBold());
    sheet.SetGlobalXfIndices([0, 7]);
    expect(SheetXML(sheet)).toContain('<c r="A1" s="7"><v>1</v></c>');
  });

  test('limits', () => {

    const sheet = new Worksheet('Sheet1');

    expect(() => sheet.WriteNumber(MAX_ROWS, 0, 1)).toThrow(RowColumnLimitError);
    expect(() => sheet.WriteNumber(0, MAX_COLUMNS, 1)).toThrow(RowColumnLimitError);
    expect(() => sheet.WriteNumber(-1, 0, 1)).toThrow(RowColumnLimitError);
    expect(() => sheet.WriteNumber(MAX_ROWS - 1, MAX_COLUMNS - 1, 1)).not.toThrow();

    expect(() => sheet.WriteNumber(0, 0, Infinity)).toThrow(ParameterError);
    expect(() => sheet.WriteNumber(0, 0, NaN)).toThrow(ParameterError);
    expect(() => sheet.WriteString(0, 0, 'x'.repeat(32768))).toThrow(ParameterError);
    expect(() => sheet.WriteDateTime(0, 0, new Date(NaN))).toThrow(ParameterError);

  });

  test('sheet names', () => {
    expect(() => new Worksheet('Bad[Name]')).toThrow(SheetNameError);
    expect(() => new Worksheet('History')).toThrow(SheetNameError);
    expect(() => new Worksheet('x'.repeat(32))).toThrow(SheetNameError);
    expect(new Worksheet('My Data').quoted_name).toEqual(`'My Data'`);
    expect(new Worksheet('Data').quoted_name).toEqual('Data');
  });

});

describe('formulas', () => {

  test('string result', () => {
    const sheet = new Worksheet('Sheet1');
    sheet.WriteFormula(0, 0, '=UPPER(A2)', undefined, 'abc');
    expect(SheetXML(sheet)).toContain('<c r="A1" t="str"><f>UPPER(A2)</f><v>abc</v></c>');
  });

  test('default result', () => {
    const sheet = new Worksheet('Sheet1');
    sheet.WriteFormula(0, 0, 'A2+1');
    expect(SheetXML(sheet)).toContain('<c r="A1"><f>A2+1</f><v>0</v></c>');
  });

  test('array formula', () => {

    const sheet = new Worksheet('Sheet1');
    sheet.WriteArrayFormula(0, 0, 2, 0, '{=TREND(B1:B3)}');

    const xml = SheetXML(sheet);
    expect(xml).toContain('<c r="A1"><f t="array" ref="A1:A3">TREND(B1:B3)</f><v>0</v></c>');
    expect(xml).toContain('<c r="A2"><v>0</v></c>');
    expect(xml).toContain('<c r="A3"><v>0</v></c>');
    expect(sheet.has_dynamic_arrays).toBeFalsy();

  });

  test('dynamic array formula', () => {

    const sheet = new Worksheet('Sheet1');
    sheet.WriteDynamicArrayFormula(0, 0, 0, 0, '=UNIQUE(A2:A5)');

    expect(SheetXML(sheet)).toContain('<c r="A1" cm="1"><f t="array" ref="A1">_xlfn.UNIQUE(A2:A5)</f><v>0</v></c>');
    expect(sheet.has_dynamic_arrays).toBeTruthy();

  });

  test('array functions are detected', () => {

    const sheet = new Worksheet('Sheet1');
    sheet.WriteFormula(0, 1, '=filter(A1:A3,C1:C3)');

    expect(SheetXML(sheet)).toContain('<c r="B1" cm="1"><f t="array" ref="B1">_xlfn._xlws.FILTER(A1:A3,C1:C3)</f><v>0</v></c>');
    expect(sheet.has_dynamic_arrays).toBeTruthy();

  });

});

test('dates', () => {
  expect(DateToSerial(new Date(Date.UTC(1900, 0, 1)))).toEqual(1);
  expect(DateToSerial(new Date(Date.UTC(1900, 1, 28)))).toEqual(59);
  expect(DateToSerial(new Date(Date.UTC(1900, 2, 1)))).toEqual(61);
  expect(DateToSerial(new Date(Date.UTC(2024, 0, 1)))).toEqual(45292);
  expect(DateToSerial(new Date(Date.UTC(2024, 0, 1, 12)))).toEqual(45292.5);
});

describe('hyperlinks', () => {

  test('external and internal', () => {

    const sheet = new Worksheet('Sheet1');
    sheet.WriteUrl(0, 0, 'https://example.com/a b');
    sheet.WriteUrl(1, 0, 'internal:Sheet2!A1', 'Go');

    expect(sheet.CellAt(0, 0)).toMatchObject({ type: 'string', value: 'https://example.com/a b', format: 1 });
    expect(sheet.CellAt(1, 0)).toMatchObject({ type: 'string', value: 'Go', format: 1 });
    expect(sheet.has_hyperlink_style).toBeTruthy();
    expect(sheet.formats[1].hyperlink).toBeTruthy();

    const xml = SheetXML(sheet);
    expect(xml).toContain('<hyperlinks><hyperlink ref="A1" r:id="rId1"/><hyperlink ref="A2" location="Sheet2!A1"/></hyperlinks>');

    expect(Object.values(sheet.relationships)).toEqual([{
      id: 'rId1',
      type: RelationshipType.hyperlink,
      target: 'https://example.com/a%20b',
      mode: 'External',
    }]);

  });

  test('mailto', () => {
    const sheet = new Worksheet('Sheet1');
    sheet.WriteUrl(0, 0, 'mailto:someone@example.com');
    expect(sheet.CellAt(0, 0)).toMatchObject({ type: 'string', value: 'someone@example.com' });
  });

  test('replacing a link', () => {
    const sheet = new Worksheet('Sheet1');
    sheet.WriteUrl(0, 0, 'https://example.com/one');
    sheet.WriteUrl(0, 0, 'https://example.com/two');
    expect(sheet.hyperlinks).toEqual([{ row: 0, column: 0, url: 'https://example.com/two', tooltip: undefined }]);
  });

  test('explicit format', () => {
    const sheet = new Worksheet('Sheet1');
    sheet.WriteUrl(0, 0, 'https://example.com', 'Example', new Format().SetBold());
    expect(sheet.has_hyperlink_style).toBeFalsy();
  });

  test('unsupported', () => {
    const sheet = new Worksheet('Sheet1');
    expect(() => sheet.WriteUrl(0, 0, 'www.example.com')).toThrow(ParameterError);
    expect(() => sheet.WriteUrl(0, 0, 'https://example.com/' + 'x'.repeat(2080))).toThrow(ParameterError);
  });

});

describe('layout', () => {

  test('merged ranges', () => {

    const sheet = new Worksheet('Sheet1');
    sheet.MergeRange(0, 0, 0, 2, 'Title');

    expect(SheetXML(sheet)).toContain('<mergeCells count="1"><mergeCell ref="A1:C1"/></mergeCells>');
    expect(sheet.CellAt(0, 0)).toEqual({ type: 'string', value: 'Title', format: 0 });

    expect(() => sheet.MergeRange(0, 1, 1, 1, 'x')).toThrow(ParameterError);
    expect(() => sheet.MergeRange(5, 5, 5, 5, 'x')).toThrow(ParameterError);

  });

  test('merged ranges carry the format across', () => {
    const sheet = new Worksheet('Sheet1');
    sheet.MergeRange(0, 0, 0, 1, 'Title', new Format().SetBorder('thin'));
    expect(sheet.CellAt(0, 1)).toEqual({ type: 'blank', format: 1 });
  });

  test('column widths', () => {

    const sheet = new Worksheet('Sheet1');
    sheet.SetColumnWidth(1, 20);
    sheet.SetColumnWidth(2, 20);
    sheet.SetColumnWidth(4, 8);

    expect(SheetXML(sheet)).toContain(
      '<cols><col min="2" max="3" width="20.7109375" customWidth="1"/><col min="5" max="5" width="8.7109375" customWidth="1"/></cols>');

    expect(sheet.ColumnPixels(1)).toEqual(145);
    expect(sheet.ColumnPixels(0)).toEqual(64);
    expect(() => sheet.SetColumnWidth(0, -1)).toThrow(ParameterError);

  });

  test('hidden column', () => {
    const sheet = new Worksheet('Sheet1');
    sheet.SetColumnWidth(0, 0);
    expect(SheetXML(sheet)).toContain('<cols><col min="1" max="1" width="0" hidden="1" customWidth="1"/></cols>');
  });

  test('row heights', () => {

    const sheet = new Worksheet('Sheet1');
    sheet.SetRowHeight(3, 30);

    expect(SheetXML(sheet)).toContain('<sheetData><row r="4" ht="30" customHeight="1"/></sheetData>');
    expect(sheet.RowPixels(3)).toEqual(40);
    expect(sheet.RowPixels(0)).toEqual(20);
    expect(() => sheet.SetRowHeight(0, 410)).toThrow(ParameterError);

  });

  test('page setup', () => {
    const sheet = new Worksheet('Sheet1');
    sheet.SetPaperSize(9).SetLandscape().SetTabColor({ text: '#FF0000' });
    const xml = SheetXML(sheet);
    expect(xml).toContain('<pageSetup paperSize="9" orientation="landscape"/>');
    expect(xml).toContain('<sheetPr><tabColor rgb="FFFF0000"/></sheetPr>');
  });

});

test('structural names', () => {

  const sheet = new Worksheet('Sheet1');
  sheet.SetAutofilter(0, 0, 9, 3);
  sheet.SetPrintArea(0, 0, 19, 5);
  sheet.SetRepeatRows(0);
  sheet.SetRepeatColumns(0, 1);

  const names = sheet.StructuralNames().map(name => name.Initialize(sheet.quoted_name));

  expect(names.map(name => [name.name, name.type, name.range])).toEqual([
    ['_xlnm._FilterDatabase', 'autofilter', 'Sheet1!$A$1:$D$10'],
    ['_xlnm.Print_Area', 'print-area', 'Sheet1!$A$1:$F$20'],
    ['_xlnm.Print_Titles', 'print-titles', 'Sheet1!$A:$B,Sheet1!$1:$1'],
  ]);

  expect(SheetXML(sheet)).toContain('<autoFilter ref="A1:D10"/>');

  // the templates are not modified
  expect(sheet.StructuralNames()[0].range).toEqual('');

});

describe('cache data', () => {

  test('mixed values', () => {

    const sheet = new Worksheet('Sheet1');
    sheet.WriteNumber(0, 0, 1);
    sheet.WriteString(1, 0, 'x');
    sheet.WriteBoolean(3, 0, true);
    sheet.WriteFormula(4, 0, '=A1*2.5', undefined, 2.5);

    expect(sheet.GetCacheData(new Area({ row: 0, column: 0 }, { row: 4, column: 0 }))).toEqual({
      type: 'string',
      data: ['1', 'x', '', '1', '2.5'],
    });

  });

  test('numbers', () => {

    const sheet = new Worksheet('Sheet1');
    sheet.WriteNumber(0, 1, 3);
    sheet.WriteFormula(1, 1, '=B1*2');

    expect(sheet.GetCacheData(new Area({ row: 0, column: 1 }, { row: 1, column: 1 }))).toEqual({
      type: 'number',
      data: ['3', ''],
    });

  });

});

describe('headers and footers', () => {

  test('sections', () => {
    expect(HeaderFooterSections('&LLeft&CCenter&RRight')).toEqual({ left: 'Left', center: 'Center', right: 'Right' });
    expect(HeaderFooterSections('Page &P')).toEqual({ left: '', center: 'Page &P', right: '' });
  });

  test('images need a placeholder', () => {

    const sheet = new Worksheet('Sheet1');
    const image = new Image(TestPNG(2, 3));

    sheet.SetHeader('&LLogo');
    expect(() => sheet.SetHeaderImage('left', image)).toThrow('The left section of the header has no &[Picture] placeholder');

    sheet.SetHeader('&L&[Picture]');
    sheet.SetHeaderImage('left', image);
    sheet.SetFooter('&R&G');
    sheet.SetFooterImage('right', image);

    expect(sheet.HeaderFooterImages().map(entry => entry.position)).toEqual(['LH', 'RF']);
    expect(SheetXML(sheet)).toContain('<headerFooter><oddHeader>&amp;L&amp;G</oddHeader><oddFooter>&amp;R&amp;G</oddFooter></headerFooter>');

  });

  test('length limit', () => {
    const sheet = new Worksheet('Sheet1');
    expect(() => sheet.SetHeader('x'.repeat(256))).toThrow(ParameterError);
  });

});

describe('tables', () => {

  test('headers and totals', () => {

    const sheet = new Worksheet('Sheet1');
    const table = sheet.AddTable(0, 0, 3, 1, {
      total_row: true,
      columns: [
        { header: 'Item', total_label: 'Total' },
        { header: 'Cost', total_function: 'sum' },
      ],
    });

    expect(sheet.CellAt(0, 0)).toMatchObject({ type: 'string', value: 'Item' });
    expect(sheet.CellAt(0, 1)).toMatchObject({ type: 'string', value: 'Cost' });
    expect(sheet.CellAt(3, 0)).toMatchObject({ type: 'string', value: 'Total' });
    expect(sheet.CellAt(3, 1)).toMatchObject({ type: 'formula', formula: 'SUBTOTAL(109,[Cost])' });

    table.index = 1;
    const xml = table.XML();

    expect(xml).toContain('id="1" name="Table1" displayName="Table1" ref="A1:B4" totalsRowCount="1">');
    expect(xml).toContain('<autoFilter ref="A1:B3"/>');
    expect(xml).toContain(
      '<tableColumns count="2"><tableColumn id="1" name="Item" totalsRowLabel="Total"/>'
      + '<tableColumn id="2" name="Cost" totalsRowFunction="sum"/></tableColumns>');
    expect(xml).toContain(
      '<tableStyleInfo name="TableStyleMedium9" showFirstColumn="0" showLastColumn="0" showRowStripes="1" showColumnStripes="0"/>');

  });

  test('column formulas', () => {

    const sheet = new Worksheet('Sheet1');
    const table = sheet.AddTable(0, 3, 2, 4, {
      name: 'Orders',
      columns: [{ header: 'Qty' }, { header: 'Total', formula: '=[@Qty]*2' }],
    });

    expect(sheet.CellAt(1, 4)).toMatchObject({ type: 'formula', formula: '[[#This Row],Qty]*2' });
    expect(sheet.CellAt(2, 4)).toMatchObject({ type: 'formula', formula: '[[#This Row],Qty]*2' });

    const xml = table.XML();
    expect(xml).toContain('name="Orders" displayName="Orders" ref="D1:E3" totalsRowShown="0">');
    expect(xml).toContain('<tableColumn id="2" name="Total"><calculatedColumnFormula>[[#This Row],Qty]*2</calculatedColumnFormula></tableColumn>');

  });

  test('default headers', () => {
    const table = new Table(new Area({ row: 0, column: 0 }, { row: 4, column: 2 }), { columns: [{ header: 'Name' }] });
    expect(table.headers).toEqual(['Name', 'Column2', 'Column3']);
  });

  test('total formulas escape special characters', () => {
    const table = new Table(new Area({ row: 0, column: 0 }, { row: 4, column: 0 }), {
      columns: [{ header: 'Item #', total_function: 'count' }],
    });
    expect(table.TotalFormula(0)).toEqual(`SUBTOTAL(103,[Item '#])`);
  });

  test('validation', () => {

    const area = new Area({ row: 0, column: 0 }, { row: 4, column: 1 });

    expect(() => new Table(area, { name: 'A1' })).toThrow(ParameterError);
    expect(() => new Table(area, { name: 'My Table' })).toThrow(ParameterError);
    expect(() => new Table(area, { name: '1st' })).toThrow(ParameterError);
    expect(() => new Table(area, { columns: [{ header: 'a' }, { header: 'A' }] })).toThrow(ParameterError);
    expect(() => new Table(area, { columns: [{}, {}, {}] })).toThrow(ParameterError);
    expect(() => new Table(new Area({ row: 0, column: 0 }, { row: 0, column: 1 }))).toThrow(ParameterError);

    const sheet = new Worksheet('Sheet1');
    sheet.AddTable(0, 0, 3, 1);
    expect(() => sheet.AddTable(2, 1, 5, 2)).toThrow(ParameterError);

  });

});
