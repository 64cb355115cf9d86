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
import type { Image } from './image';
import { type RelationshipMap, AddRel, RelationshipType } from './relationship';
import type { DOMContent } from './xml-utils';

/** EMUs per pixel at 96 dpi */
const pixel_offset = 9525;

export interface CellAnchor {
  row: number;
  column_offset?: number;
  column: number;
  row_offset?: number;
}

export interface TwoCellAnchor {
  from: CellAnchor;
  to: CellAnchor;

  /** size in pixels */
  width: number;
  height: number;
}

export interface AnchoredChart {
  anchor: TwoCellAnchor;
  chart: Chart;
  relationship: string;
}

export interface AnchoredImage {
  anchor: TwoCellAnchor;
  image: Image;
  relationship: string;
}

interface JSONCorner {
  'xdr:col': number,
  'xdr:colOff': number,
  'xdr:row': number,
  'xdr:rowOff': number,
}

/**
 * position of an object inserted at a cell, with pixel offsets and
 * size. the sheet supplies column and row sizes in pixels.
 */
export interface ObjectPosition {
  row: number;
  column: number;
  x_offset: number;
  y_offset: number;
  width: number;
  height: number;
}

/**
 * convert a cell position and pixel size to a two-cell anchor, walking
 * across columns and down rows until the size is used up.
 */
export const PositionToAnchor = (
    position: ObjectPosition,
    column_width: (column: number) => number,
    row_height: (row: number) => number): TwoCellAnchor => {

  let { row, column, x_offset, y_offset } = position;

  // normalize offsets that are larger than the starting cell

  while (x_offset >= column_width(column) && column_width(column) > 0) {
    x_offset -= column_width(column++);
  }

  while (y_offset >= row_height(row) && row_height(row) > 0) {
    y_offset -= row_height(row++);
  }

  const from: CellAnchor = { row, column, row_offset: y_offset, column_offset: x_offset };

  let x_end = x_offset + position.width;
  let y_end = y_offset + position.height;

  while (x_end >= column_width(column) && column_width(column) > 0) {
    x_end -= column_width(column++);
  }

  while (y_end >= row_height(row) && row_height(row) > 0) {
    y_end -= row_height(row++);
  }

  return {
    from,
    to: { row, column, row_offset: y_end, column_offset: x_end },
    width: position.width,
    height: position.height,
  };

};

/**
 * drawing part for one worksheet. holds charts and images, in the
 * order they were added, and the relationships to them.
 */
export class Drawing {

  public charts: AnchoredChart[] = [];
  public images: AnchoredImage[] = [];

  /** anchored objects in insertion order, for numbering */
  private order: Array<AnchoredChart|AnchoredImage> = [];

  public relationships: RelationshipMap = {};

  constructor(public index: number){}

  public get empty() {
    return this.order.length === 0;
  }

  /** media path must be set on the image (media_index assigned) */
  public AddImage(image: Image, anchor: TwoCellAnchor): void {
    const relationship = AddRel(this.relationships, RelationshipType.image, `../${image.media_path}`);
    const entry = { image, relationship, anchor };
    this.images.push(entry);
    this.order.push(entry);
  }

  public AddChart(chart: Chart, anchor: TwoCellAnchor): void {
    const relationship = AddRel(this.relationships, RelationshipType.chart, `../charts/chart${chart.index}.xml`);
    const entry = { chart, anchor, relationship };
    this.charts.push(entry);
    this.order.push(entry);
  }

  public CornerToJSON(anchor: CellAnchor): JSONCorner {
    return {
      'xdr:col': anchor.column,
      'xdr:colOff': (anchor.column_offset || 0) * pixel_offset,
      'xdr:row': anchor.row,
      'xdr:rowOff': (anchor.row_offset || 0) * pixel_offset,
    };
  }

  public AnchorToJSON(anchor: TwoCellAnchor): { 'xdr:from': DOMContent, 'xdr:to': DOMContent } {
    return {
      'xdr:from': { ...this.CornerToJSON(anchor.from), },
      'xdr:to': { ...this.CornerToJSON(anchor.to), },
    };
  }

  protected ImageBlock(entry: AnchoredImage, id: number): DOMContent {
    const { image, anchor } = entry;
    return {
      a$: { editAs: 'oneCell' },
      ...this.AnchorToJSON(anchor),
      'xdr:pic': {
        'xdr:nvPicPr': {
          'xdr:cNvPr': {
            a$: { id, name: `Picture ${id - 1}`, descr: image.alt_text || undefined },
          },
          'xdr:cNvPicPr': {
            'a:picLocks': {
              a$: {
                noChangeAspect: 1,
              },
            },
          },
        },
        'xdr:blipFill': {
          'a:blip': {
            a$: {
              'xmlns:r': 'http://schemas.openxmlformats.org/officeDocument/2006/relationships',
              'r:embed': entry.relationship,
            },
          },
          'a:stretch': {
            'a:fillRect': '',
          },
        },
        'xdr:spPr': {
          'a:xfrm': {
            'a:off': {
              a$: { x: 0, y: 0 },
            },
            'a:ext': {
              a$: { cx: anchor.width * pixel_offset, cy: anchor.height * pixel_offset },
            },
          },
          'a:prstGeom': {
            a$: { prst: 'rect', },
            'a:avLst': '',
          },
        },
      },
      'xdr:clientData': '',
    };
  }

  protected ChartBlock(entry: AnchoredChart, id: number): DOMContent {
    return {
      a$: { editAs: 'oneCell' },
      ...this.AnchorToJSON(entry.anchor),
      'xdr:graphicFrame': {
        a$: { macro: '' },
        'xdr:nvGraphicFramePr': {
          'xdr:cNvPr': {
            a$: { id, name: `Chart ${id - 1}`, },
          },
          'xdr:cNvGraphicFramePr': '',
        },
        'xdr:xfrm': {
          'a:off': { a$: { x: 0, y: 0, }},
          'a:ext': { a$: { cx: 0, cy: 0 }},
        },
        'a:graphic': {
          'a:graphicData': {
            a$: { uri: 'http://schemas.openxmlformats.org/drawingml/2006/chart' },
            'c:chart': {
              a$: {
                'xmlns:c': 'http://schemas.openxmlformats.org/drawingml/2006/chart',
                'xmlns:r': 'http://schemas.openxmlformats.org/officeDocument/2006/relationships',
                'r:id': entry.relationship,
              },
            },
          },
        },
      },
      'xdr:clientData': '',
    };
  }

  public toJSON(): DOMContent {

    const blocks = this.order.map((entry, index) => {
      return ('chart' in entry) ? this.ChartBlock(entry, index + 2) : this.ImageBlock(entry, index + 2);
    });

    return {
      'xdr:wsDr': {
        a$: {
          'xmlns:xdr': 'http://schemas.openxmlformats.org/drawingml/2006/spreadsheetDrawing',
          'xmlns:a': 'http://schemas.openxmlformats.org/drawingml/2006/main',
        },
        'xdr:twoCellAnchor': blocks,
      },
    };

  }

}
