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
 * theme colors, in theme index order. theme color references in
 * formats (e.g. the hyperlink color, theme 10) index into this list.
 */
export const ThemeColors: Array<[string, string]> = [
  ['dk1', '000000'],
  ['lt1', 'FFFFFF'],
  ['dk2', '1F497D'],
  ['lt2', 'EEECE1'],
  ['accent1', '4F81BD'],
  ['accent2', 'C0504D'],
  ['accent3', '9BBB59'],
  ['accent4', '8064A2'],
  ['accent5', '4BACC6'],
  ['accent6', 'F79646'],
  ['hlink', '0000FF'],
  ['folHlink', '800080'],
];

const major_font = 'Cambria';
const minor_font = 'Calibri';

const placeholder_fill = { 'a:solidFill': { 'a:schemeClr': { a$: { val: 'phClr' } } } };

const Repeat = (entry: DOMContent, count = 3) => {
  const list: DOMContent[] = [];
  for (let i = 0; i < count; i++) {
    list.push(entry);
  }
  return list;
};

const FontScheme = (latin: string): DOMContent => ({
  'a:latin': { a$: { typeface: latin } },
  'a:ea': { a$: { typeface: '' } },
  'a:cs': { a$: { typeface: '' } },
});

/**
 * the default office theme. we write a fixed theme; the format scheme
 * is the flat version (no gradients or effects).
 */
export const ThemeXML = (): string => {

  const color_scheme: DOMContent = { a$: { name: 'Office' } };
  for (const [name, rgb] of ThemeColors) {

    // the first two are system colors

    if (name === 'dk1') {
      color_scheme[`a:${name}`] = { 'a:sysClr': { a$: { val: 'windowText', lastClr: rgb } } };
    }
    else if (name === 'lt1') {
      color_scheme[`a:${name}`] = { 'a:sysClr': { a$: { val: 'window', lastClr: rgb } } };
    }
    else {
      color_scheme[`a:${name}`] = { 'a:srgbClr': { a$: { val: rgb } } };
    }
  }

  const dom: DOMContent = {
    'a:theme': {
      a$: {
        'xmlns:a': 'http://schemas.openxmlformats.org/drawingml/2006/main',
        name: 'Office Theme',
      },
      'a:themeElements': {
        'a:clrScheme': color_scheme,
        'a:fontScheme': {
          a$: { name: 'Office' },
          'a:majorFont': FontScheme(major_font),
          'a:minorFont': FontScheme(minor_font),
        },
        'a:fmtScheme': {
          a$: { name: 'Office' },
          'a:fillStyleLst': { 'a:solidFill': Repeat(placeholder_fill['a:solidFill']) },
          'a:lnStyleLst': {
            'a:ln': Repeat({
              a$: { w: 9525, cap: 'flat', cmpd: 'sng', algn: 'ctr' },
              ...placeholder_fill,
              'a:prstDash': { a$: { val: 'solid' } },
            }),
          },
          'a:effectStyleLst': {
            'a:effectStyle': Repeat({ 'a:effectLst': '' }),
          },
          'a:bgFillStyleLst': { 'a:solidFill': Repeat(placeholder_fill['a:solidFill']) },
        },
      },
      'a:objectDefaults': '',
      'a:extraClrSchemeLst': '',
    },
  };

  return SerializeXML(dom);

};
