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

import type { Image } from './image';
import { type RelationshipMap, AddRel, RelationshipType } from './relationship';
import { type DOMContent, xml_options, PatchXMLBuilder } from './xml-utils';

/** header/footer image positions, as the vml shape ids name them */
export type HeaderFooterPosition = 'LH'|'CH'|'RH'|'LF'|'CF'|'RF';

export interface HeaderFooterImage {
  position: HeaderFooterPosition;
  image: Image;
}

const shape_formulas = [
  'if lineDrawn pixelLineWidth 0',
  'sum @0 1 0',
  'sum 0 0 @1',
  'prod @2 1 2',
  'prod @3 21600 pixelWidth',
  'prod @3 21600 pixelHeight',
  'sum @0 0 1',
  'prod @6 1 2',
  'prod @7 21600 pixelWidth',
  'sum @8 21600 0',
  'prod @7 21600 pixelHeight',
  'sum @10 21600 0',
];

// vml is not quite xml, and doesn't get a declaration

const vml_builder = PatchXMLBuilder(xml_options);

/**
 * legacy (vml) drawing holding header and footer images for one sheet
 */
export class VMLDrawing {

  public relationships: RelationshipMap = {};

  private shapes: Array<HeaderFooterImage & { relationship: string }> = [];

  constructor(public index: number, images: HeaderFooterImage[]) {
    for (const entry of images) {
      const relationship = AddRel(this.relationships, RelationshipType.image, `../${entry.image.media_path}`);
      this.shapes.push({ ...entry, relationship });
    }
  }

  public XML(): string {

    const shapes: DOMContent[] = this.shapes.map((entry, index) => {

      // size in points

      const width = entry.image.display_width * 0.75;
      const height = entry.image.display_height * 0.75;

      return {
        a$: {
          id: entry.position,
          'o:spid': `_x0000_s${this.index * 1024 + index + 1}`,
          type: '#_x0000_t75',
          style: `position:absolute;margin-left:0;margin-top:0;width:${width}pt;height:${height}pt;z-index:${index + 1}`,
        },
        'v:imagedata': {
          a$: {
            'o:relid': entry.relationship,
            'o:title': entry.image.alt_text || `image${entry.image.media_index}`,
          },
        },
        'o:lock': { a$: { 'v:ext': 'edit', rotation: 't' } },
      };

    });

    const dom: DOMContent = {
      xml: {
        a$: {
          'xmlns:v': 'urn:schemas-microsoft-com:vml',
          'xmlns:o': 'urn:schemas-microsoft-com:office:office',
          'xmlns:x': 'urn:schemas-microsoft-com:office:excel',
        },
        'o:shapelayout': {
          a$: { 'v:ext': 'edit' },
          'o:idmap': { a$: { 'v:ext': 'edit', data: this.index } },
        },
        'v:shapetype': {
          a$: {
            id: '_x0000_t75',
            coordsize: '21600,21600',
            'o:spt': 75,
            'o:preferrelative': 't',
            path: 'm@4@5l@4@11@9@11@9@5xe',
            filled: 'f',
            stroked: 'f',
          },
          'v:stroke': { a$: { joinstyle: 'miter' } },
          'v:formulas': {
            'v:f': shape_formulas.map(eqn => ({ a$: { eqn } })),
          },
          'v:path': { a$: { 'o:extrusionok': 'f', gradientshapeok: 't', 'o:connecttype': 'rect' } },
          'o:lock': { a$: { 'v:ext': 'edit', aspectratio: 't' } },
        },
        'v:shape': shapes,
      },
    };

    return vml_builder.build(dom);

  }

}
