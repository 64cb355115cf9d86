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

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { Chart } from '../src/chart';
import {
  IoError, ParameterError, SheetNameReusedError, TableNameReusedError,
  WorksheetReferenceError,
} from '../src/errors';
import { Image } from '../src/image';
import { Workbook } from '../src/workbook';
import { Worksheet } from '../src/worksheet';
import { type PackageReader, ReadPackage, TestPNG } from './read-package';

const creation_time = new Date(Date.UTC(2024, 0, 31, 16, 48, 3));

const NewWorkbook = () => {
  const workbook = new Workbook();
  workbook.properties.SetCreationTime(creation_time);
  return workbook;
};

/** attribute values for every match of an element */
const Attributes = (xml: string, element: string, attribute: string): string[] => {
  const list: string[] = [];
  for (const match of xml.matchAll(new RegExp(`<${element} [^>]*?${attribute}="([^"]*)"`, 'g'))) {
    list.push(match[1]);
  }
  return list;
};

/** resolve a relationship target against the part that owns it */
const ResolveTarget = (part: string, target: string) => {
  const parts = part.split('/').slice(0, -1);
  for (const segment of target.split('/')) {
    if (segment === '..') {
      parts.pop();
    }
    else {
      parts.push(segment);
    }
  }
  return parts.join('/');
};

const RelsPath = (part: string) => {
  const parts = part.split('/');
  const name = parts.pop();
  return [...parts, '_rels', `${name}.rels`].join('/');
};

/**
 * every part has a content type, and every relationship id used in a
 * part resolves to a part in the package
 */
const CheckPackage = (reader: PackageReader) => {

  const content_types = reader.Text('[Content_Types].xml');
  const defaults = Attributes(content_types, 'Default', 'Extension');
  const overrides = Attributes(content_types, 'Override', 'PartName');

  for (const part of reader.paths) {
    if (part === '[Content_Types].xml' || part.endsWith('.rels')) {
      continue;
    }
    const extension = part.substring(part.lastIndexOf('.') + 1);
    if (extension === 'xml') {
      expect(overrides).toContain('/' + part);
    }
    else {
      expect(defaults).toContain(extension);
    }
  }

  for (const part of reader.paths) {
    if (part.endsWith('.rels') || part === '[Content_Types].xml') {
      continue;
    }

    const xml = reader.Text(part);
    const used = [
      ...Attributes(xml, '[^ >]+', 'r:id'),
      ...Attributes(xml, '[^ >]+', 'r:embed'),
      ...Attributes(xml, '[^ >]+', 'o:relid'),
    ];

    if (!used.length) {
      continue;
    }

    const rels = reader.Text(RelsPath(part));
    const ids = Attributes(rels, 'Relationship', 'Id');
    const targets = Attributes(rels, 'Relationship', 'Target');
    const modes = Attributes(rels, 'Relationship', 'TargetMode');

    for (const id of used) {
      expect(ids).toContain(id);
    }

    for (const target of targets) {
      if (!target.startsWith('http')) {
        expect(reader.Has(ResolveTarget(part, target))).toBeTruthy();
      }
    }

    expect(modes.every(mode => mode === 'External')).toBeTruthy();

  }

};

describe('empty workbook', () => {

  test('parts', () => {

    const reader = ReadPackage(NewWorkbook().SaveToBuffer());

    expect(reader.paths).toEqual([
      '[Content_Types].xml',
      '_rels/.rels',
      'docProps/app.xml',
      'docProps/core.xml',
      'xl/workbook.xml',
      'xl/_rels/workbook.xml.rels',
      'xl/worksheets/sheet1.xml',
      'xl/styles.xml',
      'xl/theme/theme1.xml',
    ]);

    expect(reader.Text('xl/worksheets/sheet1.xml')).toContain('<sheetView tabSelected="1" workbookViewId="0"/>');
    expect(reader.Text('xl/workbook.xml')).toContain('<sheets><sheet name="Sheet1" sheetId="1" r:id="rId1"/></sheets>');
    expect(reader.Text('docProps/core.xml')).toContain(
      '<dcterms:created xsi:type="dcterms:W3CDTF">2024-01-31T16:48:03Z</dcterms:created>');

    CheckPackage(reader);

  });

  test('saves are repeatable', () => {

    const workbook = NewWorkbook();
    workbook.AddWorksheet().WriteString(0, 0, 'Hello');

    const first = workbook.SaveToBuffer();
    const second = workbook.SaveToBuffer();

    expect(second).toEqual(first);
    expect(NewWorkbook().SaveToBuffer({ compress: false }).length).toBeGreaterThan(0);

  });

});

describe('worksheets', () => {

  test('default names', () => {
    const workbook = new Workbook();
    workbook.AddWorksheet();
    workbook.PushWorksheet(new Worksheet());
    workbook.PushWorksheet(new Worksheet('Data'));
    expect(workbook.Worksheets().map(sheet => sheet.name)).toEqual(['Sheet1', 'Sheet2', 'Data']);
  });

  test('lookup', () => {

    const workbook = new Workbook();
    const sheet = workbook.PushWorksheet(new Worksheet('Data'));

    expect(workbook.WorksheetFromName('Data')).toBe(sheet);
    expect(workbook.WorksheetFromIndex(0)).toBe(sheet);
    expect(workbook.FindWorksheet('data')).toBeUndefined();
    expect(() => workbook.WorksheetFromName('Other')).toThrow(WorksheetReferenceError);
    expect(() => workbook.WorksheetFromIndex(1)).toThrow(WorksheetReferenceError);

  });

  test('active sheet', () => {

    const workbook = NewWorkbook();
    const first = workbook.AddWorksheet();
    const second = workbook.AddWorksheet().SetActive();
    workbook.AddWorksheet().SetFirstSheet();

    const reader = ReadPackage(workbook.SaveToBuffer());

    expect(reader.Text('xl/workbook.xml')).toContain(
      '<workbookView xWindow="240" yWindow="15" windowWidth="16095" windowHeight="9660" firstSheet="2" activeTab="1"/>');
    expect(reader.Text('xl/worksheets/sheet1.xml')).toContain('<sheetView workbookViewId="0"/>');
    expect(reader.Text('xl/worksheets/sheet2.xml')).toContain('<sheetView tabSelected="1" workbookViewId="0"/>');
    expect(first.active).toBeFalsy();
    expect(second.active).toBeTruthy();

  });

  test('hidden sheet', () => {
    const workbook = NewWorkbook();
    workbook.AddWorksheet();
    workbook.AddWorksheet().SetHidden();
    const reader = ReadPackage(workbook.SaveToBuffer());
    expect(reader.Text('xl/workbook.xml')).toContain('<sheet name="Sheet2" sheetId="2" state="hidden" r:id="rId2"/>');
  });

  test('duplicate names', () => {
    const workbook = NewWorkbook();
    workbook.PushWorksheet(new Worksheet('Foo'));
    workbook.PushWorksheet(new Worksheet('Foo'));
    expect(() => workbook.SaveToBuffer()).toThrow(SheetNameReusedError);
  });

  test('duplicate table names', () => {
    const workbook = NewWorkbook();
    workbook.AddWorksheet().AddTable(0, 0, 2, 1, { name: 'Foo' });
    workbook.AddWorksheet().AddTable(0, 0, 2, 1, { name: 'foo' });
    expect(() => workbook.SaveToBuffer()).toThrow(TableNameReusedError);
  });

  test('default table names', () => {
    const workbook = NewWorkbook();
    workbook.AddWorksheet().AddTable(0, 0, 2, 1);
    workbook.AddWorksheet().AddTable(0, 0, 2, 1);
    const reader = ReadPackage(workbook.SaveToBuffer());
    expect(reader.Text('xl/tables/table2.xml')).toContain('id="2" name="Table2" displayName="Table2"');
  });

  test('shared strings span sheets', () => {

    const workbook = NewWorkbook();
    workbook.AddWorksheet().WriteString(0, 0, 'a');
    const second = workbook.AddWorksheet();
    second.WriteString(0, 0, 'a');
    second.WriteString(1, 0, 'b');

    const reader = ReadPackage(workbook.SaveToBuffer());
    expect(reader.Text('xl/sharedStrings.xml')).toContain('count="3" uniqueCount="2"><si><t>a</t></si><si><t>b</t></si></sst>');
    expect(reader.Text('xl/worksheets/sheet2.xml')).toContain('<c r="A2" t="s"><v>1</v></c>');

    CheckPackage(reader);

  });

});

describe('defined names', () => {

  test('user and structural names', () => {

    const workbook = NewWorkbook();
    workbook.AddWorksheet().SetAutofilter(0, 0, 3, 1);
    workbook.AddWorksheet();

    workbook.DefineName('Exchange_rate', '=0.96');
    workbook.DefineName('Sheet2!Sales', '=Sheet2!$G$1:$H$10');
    workbook.DefineName('Regions', '=Sheet1!$A$1:$A$4');

    const reader = ReadPackage(workbook.SaveToBuffer());

    expect(reader.Text('xl/workbook.xml')).toContain(
      '<definedNames>'
      + '<definedName name="_xlnm._FilterDatabase" localSheetId="0" hidden="1">Sheet1!$A$1:$B$4</definedName>'
      + '<definedName name="Exchange_rate">0.96</definedName>'
      + '<definedName name="Regions">Sheet1!$A$1:$A$4</definedName>'
      + '<definedName name="Sales" localSheetId="1">Sheet2!$G$1:$H$10</definedName>'
      + '</definedNames>');

    const app = reader.Text('docProps/app.xml');
    expect(app).toContain(
      '<vt:vector size="4" baseType="lpstr"><vt:lpstr>Sheet1</vt:lpstr><vt:lpstr>Sheet2</vt:lpstr>'
      + '<vt:lpstr>Regions</vt:lpstr><vt:lpstr>Sheet2!Sales</vt:lpstr></vt:vector>');
    expect(app).toContain('<vt:variant><vt:lpstr>Named Ranges</vt:lpstr></vt:variant><vt:variant><vt:i4>2</vt:i4></vt:variant>');

    // resolved names are kept on the workbook
    expect(workbook.defined_names.map(name => name.index)).toEqual([0, 0, 0, 1]);

  });

  test('print titles', () => {

    const workbook = NewWorkbook();
    workbook.PushWorksheet(new Worksheet('My Data')).SetRepeatRows(0).SetRepeatColumns(0, 1).SetPrintArea(0, 0, 9, 4);

    const reader = ReadPackage(workbook.SaveToBuffer());

    expect(reader.Text('xl/workbook.xml')).toContain(
      `<definedName name="_xlnm.Print_Area" localSheetId="0">&apos;My Data&apos;!$A$1:$E$10</definedName>`
      + `<definedName name="_xlnm.Print_Titles" localSheetId="0">&apos;My Data&apos;!$A:$B,&apos;My Data&apos;!$1:$1</definedName>`);

    expect(reader.Text('docProps/app.xml')).toContain(
      `<vt:lpstr>My Data</vt:lpstr><vt:lpstr>&apos;My Data&apos;!Print_Area</vt:lpstr><vt:lpstr>&apos;My Data&apos;!Print_Titles</vt:lpstr>`);

  });

  test('invalid names', () => {
    const workbook = new Workbook();
    expect(() => workbook.DefineName('Bad Name', '=1')).toThrow(ParameterError);
    expect(() => workbook.DefineName('1st', '=1')).toThrow(ParameterError);
    expect(() => workbook.DefineName('.foo', '=1')).toThrow(ParameterError);
    expect(() => workbook.DefineName('Sheet1!Bad:Name', '=1')).toThrow(ParameterError);
  });

  test('unknown worksheet', () => {
    const workbook = NewWorkbook();
    workbook.AddWorksheet();
    workbook.DefineName('Missing!Sales', '=Missing!$A$1');
    expect(() => workbook.SaveToBuffer()).toThrow("Unknown worksheet name 'Missing' in defined name 'Sales'");
  });

});

describe('properties', () => {

  test('document properties', () => {

    const workbook = NewWorkbook();
    workbook.properties.SetTitle('Budget').SetAuthor('Test Author').SetCompany('Test Company');
    workbook.ReadOnlyRecommended();

    const reader = ReadPackage(workbook.SaveToBuffer());

    const core = reader.Text('docProps/core.xml');
    expect(core).toContain('<dc:title>Budget</dc:title>');
    expect(core).toContain('<dc:creator>Test Author</dc:creator>');
    expect(core).toContain('<cp:lastModifiedBy>Test Author</cp:lastModifiedBy>');

    const app = reader.Text('docProps/app.xml');
    expect(app).toContain('<DocSecurity>2</DocSecurity>');
    expect(app).toContain('<Company>Test Company</Company>');

    expect(reader.Text('xl/workbook.xml')).toContain('<fileSharing readOnlyRecommended="1"/>');

  });

  test('custom properties', () => {

    const workbook = NewWorkbook();
    workbook.SetCustomProperty('Checked by', 'Someone');
    workbook.SetCustomProperty('Ref', 7);
    workbook.SetCustomProperty('Approved', true);
    workbook.SetCustomProperty('Rate', 1.5);
    workbook.SetCustomProperty('Date', creation_time);
    workbook.SetCustomProperty('Ref', 8);

    const reader = ReadPackage(workbook.SaveToBuffer());

    expect(reader.paths.slice(0, 5)).toEqual([
      '[Content_Types].xml', '_rels/.rels', 'docProps/app.xml', 'docProps/core.xml', 'docProps/custom.xml',
    ]);

    const custom = reader.Text('docProps/custom.xml');
    const fmtid = 'fmtid="{D5CDD505-2E9C-101B-9397-08002B2CF9AE}"';

    expect(custom).toContain(`<property ${fmtid} pid="2" name="Checked by"><vt:lpwstr>Someone</vt:lpwstr></property>`);
    expect(custom).toContain(`<property ${fmtid} pid="3" name="Ref"><vt:i4>8</vt:i4></property>`);
    expect(custom).toContain(`<property ${fmtid} pid="4" name="Approved"><vt:bool>true</vt:bool></property>`);
    expect(custom).toContain(`<property ${fmtid} pid="5" name="Rate"><vt:r8>1.5</vt:r8></property>`);
    expect(custom).toContain(`<property ${fmtid} pid="6" name="Date"><vt:filetime>2024-01-31T16:48:03Z</vt:filetime></property>`);

    CheckPackage(reader);

    expect(() => workbook.SetCustomProperty('', 1)).toThrow(ParameterError);
    expect(() => workbook.SetCustomProperty('Bad', NaN)).toThrow(ParameterError);

  });

});

test('dynamic arrays add the metadata part', () => {

  const workbook = NewWorkbook();
  workbook.AddWorksheet().WriteFormula(0, 0, '=SEQUENCE(3)');

  const reader = ReadPackage(workbook.SaveToBuffer());

  expect(reader.Has('xl/metadata.xml')).toBeTruthy();
  expect(reader.Text('xl/_rels/workbook.xml.rels')).toContain('Target="metadata.xml"');
  expect(reader.Text('xl/worksheets/sheet1.xml')).toContain('<f t="array" ref="A1">_xlfn.SEQUENCE(3)</f>');

  CheckPackage(reader);

});

describe('objects', () => {

  const RichWorkbook = () => {

    const workbook = NewWorkbook();
    const png = TestPNG(2, 3);

    const data = workbook.PushWorksheet(new Worksheet('Data'));
    data.WriteUrl(0, 0, 'https://example.com');
    data.WriteNumber(1, 0, 10);
    data.WriteNumber(2, 0, 20);
    data.WriteNumber(3, 0, 30);
    data.AddTable(5, 0, 8, 1);

    const chart = new Chart('column');
    chart.AddSeries().SetValues('=Data!$A$2:$A$4');
    data.InsertChart(0, 3, chart);
    data.InsertImage(10, 3, new Image(png));

    const notes = workbook.PushWorksheet(new Worksheet('Notes'));
    notes.SetHeader('&C&[Picture]');
    notes.SetHeaderImage('center', new Image(png));

    return { workbook, chart };

  };

  test('parts', () => {

    const { workbook, chart } = RichWorkbook();
    const reader = ReadPackage(workbook.SaveToBuffer());

    expect(reader.paths).toEqual([
      '[Content_Types].xml',
      '_rels/.rels',
      'docProps/app.xml',
      'docProps/core.xml',
      'xl/workbook.xml',
      'xl/_rels/workbook.xml.rels',
      'xl/worksheets/sheet1.xml',
      'xl/worksheets/_rels/sheet1.xml.rels',
      'xl/worksheets/sheet2.xml',
      'xl/worksheets/_rels/sheet2.xml.rels',
      'xl/styles.xml',
      'xl/theme/theme1.xml',
      'xl/sharedStrings.xml',
      'xl/tables/table1.xml',
      'xl/charts/chart1.xml',
      'xl/drawings/drawing1.xml',
      'xl/drawings/_rels/drawing1.xml.rels',
      'xl/drawings/vmlDrawing1.vml',
      'xl/drawings/_rels/vmlDrawing1.vml.rels',
      'xl/media/image1.png',
    ]);

    expect(chart.index).toEqual(1);
    expect(reader.Text('xl/charts/chart1.xml')).toContain('<c:pt idx="2"><c:v>30</c:v></c:pt>');

    // hyperlink, then drawing, then table
    const rels = reader.Text('xl/worksheets/_rels/sheet1.xml.rels');
    expect(Attributes(rels, 'Relationship', 'Target')).toEqual([
      'https://example.com', '../drawings/drawing1.xml', '../tables/table1.xml',
    ]);

    expect(reader.Text('xl/worksheets/sheet2.xml')).toContain('<legacyDrawingHF r:id="rId1"/>');
    expect(reader.Text('xl/styles.xml')).toContain('<cellStyle name="Hyperlink" xfId="1" builtinId="8"/>');

    CheckPackage(reader);

  });

  test('a chart can only be inserted once', () => {
    const { workbook, chart } = RichWorkbook();
    workbook.WorksheetFromName('Notes').InsertChart(0, 0, chart);
    expect(() => workbook.SaveToBuffer()).toThrow(ParameterError);
    expect(() => workbook.SaveToBuffer()).toThrow(`inserted into 'Data' and 'Notes'`);
  });

  test('chart reading data from another sheet', () => {

    const workbook = NewWorkbook();
    const summary = workbook.PushWorksheet(new Worksheet('Summary'));
    const data = workbook.PushWorksheet(new Worksheet('My Data'));

    data.WriteNumber(0, 1, 5);
    data.WriteNumber(1, 1, 6);

    const chart = new Chart('column');
    chart.AddSeries().SetValues(`='My Data'!$B$1:$B$2`);
    summary.InsertChart(0, 0, chart);

    const reader = ReadPackage(workbook.SaveToBuffer());

    expect(reader.Text('xl/charts/chart1.xml')).toContain(
      '<c:numCache><c:formatCode>General</c:formatCode><c:ptCount val="2"/>'
      + '<c:pt idx="0"><c:v>5</c:v></c:pt><c:pt idx="1"><c:v>6</c:v></c:pt></c:numCache>');

    // the drawing belongs to the sheet with the chart
    expect(reader.Text('xl/worksheets/_rels/sheet1.xml.rels')).toContain('Target="../drawings/drawing1.xml"');
    expect(reader.Has('xl/worksheets/_rels/sheet2.xml.rels')).toBe(false);

    CheckPackage(reader);

  });

  test('charts need a series', () => {
    const sheet = new Worksheet('Sheet1');
    expect(() => sheet.InsertChart(0, 0, new Chart('line'))).toThrow(ParameterError);
  });

});

describe('save to file', () => {

  let directory = '';

  beforeAll(() => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'workbook-test-'));
  });

  afterAll(() => {
    fs.rmSync(directory, { recursive: true, force: true });
  });

  test('writes the package', () => {
    const workbook = NewWorkbook();
    const file = path.join(directory, 'test.xlsx');
    workbook.Save(file);
    expect(new Uint8Array(fs.readFileSync(file))).toEqual(workbook.SaveToBuffer());
  });

  test('bad path', () => {
    const workbook = NewWorkbook();
    expect(() => workbook.Save(path.join(directory, 'missing', 'test.xlsx'))).toThrow(IoError);
  });

});
