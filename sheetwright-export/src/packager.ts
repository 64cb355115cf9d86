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

import type { Chart } from './chart';
import { ContentType, ContentTypes } from './content-types';
import type { DefinedName } from './defined-name';
import { type CustomProperty, type DocProperties, CustomPropertiesXML } from './doc-properties';
import type { FormatRegistry } from './format-registry';
import { type Image, type ImageType, ImageContentTypes } from './image';
import { MetadataXML } from './metadata';
import { type RelationshipMap, AddRel, RelationshipType } from './relationship';
import { SharedStrings } from './shared-strings';
import { StylesXML } from './styles';
import type { Table } from './table';
import { ThemeXML } from './theme';
import type { Worksheet } from './worksheet';
import { type DOMContent, SerializeXML } from './xml-utils';
import { ZipWrapper } from './zip-wrapper';

/**
 * everything the packager needs to know about the workbook that isn't
 * in the parts themselves. built by the workbook after validation and
 * name resolution.
 */
export interface PackagerOptions {
  sheet_names: string[];

  /** resolved and sorted */
  defined_names: DefinedName[];

  /** "Named Ranges" entries for app.xml */
  app_names: string[];

  active_tab: number;
  first_sheet: number;

  read_only_recommended: boolean;
  has_sst_table: boolean;
  has_dynamic_arrays: boolean;
  has_custom_properties: boolean;

  num_drawings: number;
  num_charts: number;
  num_tables: number;
  num_vml: number;

  /** media types in use, in first-seen order */
  image_types: ImageType[];
}

/** parts and objects, numbered and prepared for writing */
export interface PackageSources {
  worksheets: Worksheet[];
  registry: FormatRegistry;
  properties: DocProperties;
  custom_properties: CustomProperty[];
  tables: Table[];
  charts: Chart[];

  /** unique images; media_index matches position + 1 */
  media: Image[];
}

export const DefaultPackagerOptions: PackagerOptions = {
  sheet_names: [],
  defined_names: [],
  app_names: [],
  active_tab: 0,
  first_sheet: 0,
  read_only_recommended: false,
  has_sst_table: false,
  has_dynamic_arrays: false,
  has_custom_properties: false,
  num_drawings: 0,
  num_charts: 0,
  num_tables: 0,
  num_vml: 0,
  image_types: [],
};

/**
 * writes the package. every part is written once, in a fixed order,
 * and everything it references has a relationship and a content type.
 * strings go into the shared table as sheets are written, so the
 * table is written after the sheets.
 */
export class Packager {

  public zip = new ZipWrapper();
  public content_types = new ContentTypes();

  private strings = new SharedStrings();

  constructor(
    private sources: PackageSources,
    private options: PackagerOptions) {
  }

  public AssembleFile(): ZipWrapper {

    this.WriteContentTypes();
    this.WriteRootRels();
    this.WriteAppFile();
    this.WriteCoreFile();
    this.WriteCustomFile();
    this.WriteWorkbookFile();
    this.WriteWorkbookRels();
    this.WriteWorksheetFiles();
    this.WriteStylesFile();
    this.WriteThemeFile();
    this.WriteSharedStringsFile();
    this.WriteMetadataFile();
    this.WriteTableFiles();
    this.WriteChartFiles();
    this.WriteDrawingFiles();
    this.WriteVmlFiles();
    this.WriteImageFiles();

    return this.zip;

  }

  /** write a relationship map, if it has anything in it */
  public WriteRels(rels: RelationshipMap, path: string) {

    const list = Object.values(rels);
    if (!list.length) {
      return;
    }

    const dom: DOMContent = {
      Relationships: {
        a$: {
          xmlns: 'http://schemas.openxmlformats.org/package/2006/relationships',
        },
        Relationship: list.map(rel => ({
          a$: {
            Id: rel.id,
            Type: rel.type,
            Target: rel.target,
            TargetMode: rel.mode,
          },
        })),
      },
    };

    this.zip.Set(path, SerializeXML(dom));

  }

  // --- manifest --------------------------------------------------------------

  protected WriteContentTypes() {

    const options = this.options;
    const types = this.content_types;

    for (const type of options.image_types) {
      types.AddDefault(type, ImageContentTypes[type]);
    }

    if (options.num_vml) {
      types.AddDefault('vml', ContentType.vml);
    }

    for (let i = 1; i <= options.sheet_names.length; i++) {
      types.AddWorksheet(i);
    }

    for (let i = 1; i <= options.num_drawings; i++) {
      types.AddDrawing(i);
    }

    for (let i = 1; i <= options.num_charts; i++) {
      types.AddChart(i);
    }

    for (let i = 1; i <= options.num_tables; i++) {
      types.AddTable(i);
    }

    if (options.has_sst_table) {
      types.AddSharedStrings();
    }

    if (options.has_dynamic_arrays) {
      types.AddMetadata();
    }

    if (options.has_custom_properties) {
      types.AddCustomProperties();
    }

    this.zip.Set('[Content_Types].xml', types.XML());

  }

  protected WriteRootRels() {

    const rels: RelationshipMap = {};

    AddRel(rels, RelationshipType.office_document, 'xl/workbook.xml');
    AddRel(rels, RelationshipType.core_props, 'docProps/core.xml');
    AddRel(rels, RelationshipType.extended_props, 'docProps/app.xml');

    if (this.options.has_custom_properties) {
      AddRel(rels, RelationshipType.custom_props, 'docProps/custom.xml');
    }

    this.WriteRels(rels, '_rels/.rels');

  }

  // --- document properties ---------------------------------------------------

  protected WriteAppFile() {
    this.zip.Set('docProps/app.xml', this.sources.properties.AppXML(
      this.options.sheet_names, this.options.app_names, this.options.read_only_recommended));
  }

  protected WriteCoreFile() {
    this.zip.Set('docProps/core.xml', this.sources.properties.CoreXML());
  }

  protected WriteCustomFile() {
    if (this.options.has_custom_properties) {
      this.zip.Set('docProps/custom.xml', CustomPropertiesXML(this.sources.custom_properties));
    }
  }

  // --- workbook --------------------------------------------------------------

  protected WriteWorkbookFile() {

    const options = this.options;

    const defined_names = options.defined_names.map(name => ({
      a$: {
        name: name.name,
        localSheetId: name.type === 'global' ? undefined : name.index,
        hidden: name.type === 'autofilter' ? 1 : undefined,
      },
      t$: name.range,
    }));

    const dom: DOMContent = {
      workbook: {
        a$: {
          xmlns: 'http://schemas.openxmlformats.org/spreadsheetml/2006/main',
          'xmlns:r': 'http://schemas.openxmlformats.org/officeDocument/2006/relationships',
        },
        fileVersion: {
          a$: { appName: 'xl', lastEdited: 4, lowestEdited: 4, rupBuild: 4505 },
        },
        fileSharing: options.read_only_recommended ? {
          a$: { readOnlyRecommended: 1 },
        } : undefined,
        workbookPr: {
          a$: { defaultThemeVersion: 124226 },
        },
        bookViews: {
          workbookView: {
            a$: {
              xWindow: 240,
              yWindow: 15,
              windowWidth: 16095,
              windowHeight: 9660,
              firstSheet: options.first_sheet > 0 ? options.first_sheet : undefined,
              activeTab: options.active_tab > 0 ? options.active_tab : undefined,
            },
          },
        },
        sheets: {
          sheet: this.sources.worksheets.map((sheet, index) => ({
            a$: {
              name: sheet.name,
              sheetId: index + 1,
              state: sheet.hidden ? 'hidden' : undefined,
              'r:id': `rId${index + 1}`,
            },
          })),
        },
        definedNames: defined_names.length ? { definedName: defined_names } : undefined,
        calcPr: {
          a$: { calcId: 124519, fullCalcOnLoad: 1 },
        },
      },
    };

    this.zip.Set('xl/workbook.xml', SerializeXML(dom));

  }

  /** sheets first, so sheet N is rIdN; the workbook xml depends on that */
  protected WriteWorkbookRels() {

    const rels: RelationshipMap = {};

    for (let i = 1; i <= this.options.sheet_names.length; i++) {
      AddRel(rels, RelationshipType.worksheet, `worksheets/sheet${i}.xml`);
    }

    AddRel(rels, RelationshipType.theme, 'theme/theme1.xml');
    AddRel(rels, RelationshipType.styles, 'styles.xml');

    if (this.options.has_sst_table) {
      AddRel(rels, RelationshipType.shared_strings, 'sharedStrings.xml');
    }

    if (this.options.has_dynamic_arrays) {
      AddRel(rels, RelationshipType.metadata, 'metadata.xml');
    }

    this.WriteRels(rels, 'xl/_rels/workbook.xml.rels');

  }

  protected WriteWorksheetFiles() {
    this.sources.worksheets.forEach((sheet, index) => {
      this.zip.Set(`xl/worksheets/sheet${index + 1}.xml`, sheet.XML(this.strings));
      this.WriteRels(sheet.relationships, `xl/worksheets/_rels/sheet${index + 1}.xml.rels`);
    });
  }

  protected WriteStylesFile() {
    this.zip.Set('xl/styles.xml', StylesXML(this.sources.registry));
  }

  protected WriteThemeFile() {
    this.zip.Set('xl/theme/theme1.xml', ThemeXML());
  }

  protected WriteSharedStringsFile() {
    if (this.options.has_sst_table) {
      this.zip.Set('xl/sharedStrings.xml', this.strings.XML());
    }
  }

  protected WriteMetadataFile() {
    if (this.options.has_dynamic_arrays) {
      this.zip.Set('xl/metadata.xml', MetadataXML());
    }
  }

  // --- objects ---------------------------------------------------------------

  protected WriteTableFiles() {
    for (const table of this.sources.tables) {
      this.zip.Set(`xl/tables/table${table.index}.xml`, table.XML());
    }
  }

  protected WriteChartFiles() {
    for (const chart of this.sources.charts) {
      this.zip.Set(`xl/charts/chart${chart.index}.xml`, chart.XML());
    }
  }

  protected WriteDrawingFiles() {
    for (const sheet of this.sources.worksheets) {
      const drawing = sheet.drawing;
      if (drawing && !drawing.empty) {
        this.zip.Set(`xl/drawings/drawing${drawing.index}.xml`, SerializeXML(drawing.toJSON()));
        this.WriteRels(drawing.relationships, `xl/drawings/_rels/drawing${drawing.index}.xml.rels`);
      }
    }
  }

  protected WriteVmlFiles() {
    for (const sheet of this.sources.worksheets) {
      const vml = sheet.vml;
      if (vml) {
        this.zip.Set(`xl/drawings/vmlDrawing${vml.index}.vml`, vml.XML());
        this.WriteRels(vml.relationships, `xl/drawings/_rels/vmlDrawing${vml.index}.vml.rels`);
      }
    }
  }

  protected WriteImageFiles() {
    for (const image of this.sources.media) {
      this.zip.SetBinary(`xl/${image.media_path}`, image.data);
    }
  }

}
