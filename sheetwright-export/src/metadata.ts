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

/**
 * metadata part for dynamic arrays. there's one metadata type
 * (XLDAPR, "dynamic array properties") with one future-metadata block
 * flagging a dynamic array; cells refer to it with `cm="1"`, a 1-based
 * index into cellMetadata.
 */
export const MetadataXML = (): string => {

  const dom: DOMContent = {
    metadata: {
      a$: {
        xmlns: 'http://schemas.openxmlformats.org/spreadsheetml/2006/main',
        'xmlns:xda': 'http://schemas.microsoft.com/office/spreadsheetml/2017/dynamicarray',
      },
      metadataTypes: {
        a$: { count: 1 },
        metadataType: {
          a$: {
            name: 'XLDAPR',
            minSupportedVersion: 120000,
            copy: 1,
            pasteAll: 1,
            pasteValues: 1,
            merge: 1,
            splitFirst: 1,
            rowColShift: 1,
            clearFormats: 1,
            clearComments: 1,
            assign: 1,
            coerce: 1,
            cellMeta: 1,
          },
        },
      },
      futureMetadata: {
        a$: { name: 'XLDAPR', count: 1 },
        bk: {
          extLst: {
            ext: {
              a$: { uri: '{bdbb8cdc-fa1e-496e-a857-3c3f30c029c3}' },
              'xda:dynamicArrayProperties': {
                a$: { fDynamic: 1, fCollapsed: 0 },
              },
            },
          },
        },
      },
      cellMetadata: {
        a$: { count: 1 },
        bk: {
          rc: { a$: { t: 1, v: 0 } },
        },
      },
    },
  };

  return SerializeXML(dom);

};
