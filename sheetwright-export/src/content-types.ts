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

import { type DOMContent, SerializeXML } from './xml-utils';

const ooxml = 'application/vnd.openxmlformats-officedocument';

export const ContentType = {
  relationships:    'application/vnd.openxmlformats-package.relationships+xml',
  xml:              'application/xml',
  core_properties:  'application/vnd.openxmlformats-package.core-properties+xml',
  app_properties:   `${ooxml}.extended-properties+xml`,
  custom_properties:`${ooxml}.custom-properties+xml`,
  styles:           `${ooxml}.spreadsheetml.styles+xml`,
  theme:            `${ooxml}.theme+xml`,
  workbook:         `${ooxml}.spreadsheetml.sheet.main+xml`,
  worksheet:        `${ooxml}.spreadsheetml.worksheet+xml`,
  shared_strings:   `${ooxml}.spreadsheetml.sharedStrings+xml`,
  metadata:         `${ooxml}.spreadsheetml.sheetMetadata+xml`,
  table:            `${ooxml}.spreadsheetml.table+xml`,
  drawing:          `${ooxml}.drawing+xml`,
  chart:            `${ooxml}.drawingml.chart+xml`,
  vml:              `${ooxml}.vmlDrawing`,
} as const;

/**
 * the [Content_Types].xml manifest. defaults map file extensions to
 * types; overrides name individual parts. entries are written in the
 * order they were added.
 */
export class ContentTypes {

  public defaults: Array<[string, string]> = [
    ['rels', ContentType.relationships],
    ['xml', ContentType.xml],
  ];

  public overrides: Array<[string, string]> = [
    ['/docProps/app.xml', ContentType.app_properties],
    ['/docProps/core.xml', ContentType.core_properties],
    ['/xl/styles.xml', ContentType.styles],
    ['/xl/theme/theme1.xml', ContentType.theme],
    ['/xl/workbook.xml', ContentType.workbook],
  ];

  public AddDefault(extension: string, content_type: string) {
    this.defaults.push([extension, content_type]);
  }

  public AddOverride(part_name: string, content_type: string) {
    this.overrides.push([part_name, content_type]);
  }

  public AddWorksheet(index: number) {
    this.AddOverride(`/xl/worksheets/sheet${index}.xml`, ContentType.worksheet);
  }

  public AddDrawing(index: number) {
    this.AddOverride(`/xl/drawings/drawing${index}.xml`, ContentType.drawing);
  }

  public AddChart(index: number) {
    this.AddOverride(`/xl/charts/chart${index}.xml`, ContentType.chart);
  }

  public AddTable(index: number) {
    this.AddOverride(`/xl/tables/table${index}.xml`, ContentType.table);
  }

  public AddSharedStrings() {
    this.AddOverride('/xl/sharedStrings.xml', ContentType.shared_strings);
  }

  public AddMetadata() {
    this.AddOverride('/xl/metadata.xml', ContentType.metadata);
  }

  public AddCustomProperties() {
    this.AddOverride('/docProps/custom.xml', ContentType.custom_properties);
  }

  /** content type for a part path, or undefined if it has none */
  public Lookup(path: string): string|undefined {
    const part_name = path.startsWith('/') ? path : '/' + path;
    for (const [name, type] of this.overrides) {
      if (name === part_name) {
        return type;
      }
    }
    const extension = part_name.substring(part_name.lastIndexOf('.') + 1);
    for (const [name, type] of this.defaults) {
      if (name === extension) {
        return type;
      }
    }
    return undefined;
  }

  public XML(): string {

    const dom: DOMContent = {
      Types: {
        a$: {
          'xmlns': 'http://schemas.openxmlformats.org/package/2006/content-types',
        },
        Default: this.defaults.map(([extension, content_type]) => ({
          a$: { Extension: extension, ContentType: content_type },
        })),
        Override: this.overrides.map(([part_name, content_type]) => ({
          a$: { PartName: part_name, ContentType: content_type },
        })),
      },
    };

    return SerializeXML(dom);

  }

}
