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

export interface Relationship {
  id: string,
  type: string,
  target: string,
  mode?: string;
}

export type RelationshipMap = Record<string, Relationship>;

const office = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';
const package_rels = 'http://schemas.openxmlformats.org/package/2006/relationships';

export const RelationshipType = {
  worksheet:        `${office}/worksheet`,
  theme:            `${office}/theme`,
  styles:           `${office}/styles`,
  shared_strings:   `${office}/sharedStrings`,
  metadata:         `${office}/sheetMetadata`,
  office_document:  `${office}/officeDocument`,
  extended_props:   `${office}/extended-properties`,
  custom_props:     `${office}/custom-properties`,
  core_props:       `${package_rels}/metadata/core-properties`,
  hyperlink:        `${office}/hyperlink`,
  drawing:          `${office}/drawing`,
  vml_drawing:      `${office}/vmlDrawing`,
  table:            `${office}/table`,
  chart:            `${office}/chart`,
  image:            `${office}/image`,
} as const;

/**
 * add a relationship and return its id. ids are sequential in the
 * order relationships are added to the map.
 */
export const AddRel = (map: RelationshipMap, type: string, target: string, mode?: string): string => {
  const index = Object.keys(map).length + 1;
  const rel = `rId${index}`;
  map[rel] = { id: rel, type, target, mode };
  return rel;
};
