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

import { type Color, HTMLToARGB, IsHTMLColor, IsThemeColor } from 'sheetwright-base-types';
import type { FormatRegistry, CellXf } from './format-registry';
import type { Border, BorderSide, Fill, Font } from './format';
import { type DOMContent, SerializeXML, ValProp, WithCount } from './xml-utils';

/**
 * color attributes. html colors we can't parse are dropped (there's
 * no sensible fallback that isn't a guess).
 */
export const ColorAttributes = (color?: Color): DOMContent|undefined => {
  if (IsHTMLColor(color)) {
    const rgb = HTMLToARGB(color.text);
    return rgb ? { rgb } : undefined;
  }
  if (IsThemeColor(color)) {
    return {
      theme: color.theme,
      tint: color.tint || undefined,
    };
  }
  return undefined;
};

const ColorElement = (color?: Color): DOMContent|undefined => {
  const a$ = ColorAttributes(color);
  return a$ ? { a$ } : undefined;
};

const FontDOM = (font: Font): DOMContent => {
  return {

    // flags

    b: font.bold ? '' : undefined,
    i: font.italic ? '' : undefined,
    strike: font.strikethrough ? '' : undefined,
    u: font.underline ? (font.underline === 'single' ? '' : { a$: { val: font.underline } }) : undefined,
    vertAlign: font.script ? { a$: { val: font.script } } : undefined,

    // 'val' props

    sz: ValProp(font.size),
    color: ColorElement(font.color) || { a$: { theme: 1 } },
    name: ValProp(font.name),
    family: ValProp(font.family),
    scheme: font.scheme ? ValProp(font.scheme) : undefined,

  };
};

const FillDOM = (fill: Fill): DOMContent => {
  return {
    patternFill: {
      a$: {
        patternType: fill.pattern,
      },
      fgColor: ColorElement(fill.foreground_color),
      bgColor: ColorElement(fill.background_color) || (fill.pattern === 'solid' ? { a$: { indexed: 64 } } : undefined),
    },
  };
};

const BorderSideDOM = (side: BorderSide): DOMContent|string => {
  if (side.style === 'none') {
    return '';
  }
  return {
    a$: { style: side.style },
    color: ColorElement(side.color) || { a$: { auto: 1 } },
  };
};

const BorderDOM = (border: Border): DOMContent => {
  return {
    a$: {
      diagonalUp: (border.diagonal_type === 'up' || border.diagonal_type === 'both') ? 1 : undefined,
      diagonalDown: (border.diagonal_type === 'down' || border.diagonal_type === 'both') ? 1 : undefined,
    },
    left: BorderSideDOM(border.left),
    right: BorderSideDOM(border.right),
    top: BorderSideDOM(border.top),
    bottom: BorderSideDOM(border.bottom),
    diagonal: BorderSideDOM(border.diagonal),
  };
};

const XfDOM = (xf: CellXf): DOMContent => {

  const alignment = xf.format.alignment;
  const properties = xf.format.properties;

  const a$: DOMContent = {
    numFmtId: xf.number_format,
    fontId: xf.font,
    fillId: xf.fill,
    borderId: xf.border,
    xfId: xf.xf_id,
    quotePrefix: properties.quote_prefix ? 1 : undefined,
    applyNumberFormat: xf.number_format ? 1 : undefined,
    applyFont: xf.font ? 1 : undefined,
    applyFill: xf.fill ? 1 : undefined,
    applyBorder: xf.border ? 1 : undefined,
  };

  const block: DOMContent = { a$ };

  if (alignment.horizontal || alignment.vertical || alignment.wrap
      || alignment.shrink || alignment.indent || alignment.rotation) {

    const attrs: DOMContent = {};

    if (alignment.horizontal) {
      attrs.horizontal = alignment.horizontal;
    }
    if (alignment.vertical) {
      attrs.vertical = alignment.vertical;
    }
    if (alignment.rotation) {
      // 255 is stacked text; negative angles are stored as 91..180
      attrs.textRotation = alignment.rotation === 270 ? 255 :
        alignment.rotation < 0 ? 90 - alignment.rotation : alignment.rotation;
    }
    if (alignment.wrap) {
      attrs.wrapText = 1;
    }
    if (alignment.indent) {
      attrs.indent = alignment.indent;
    }
    if (alignment.shrink) {
      attrs.shrinkToFit = 1;
    }

    block.alignment = { a$: attrs };
    a$.applyAlignment = 1;

  }

  if (!properties.locked || properties.hidden) {
    block.protection = {
      a$: {
        locked: properties.locked ? undefined : 0,
        hidden: properties.hidden ? 1 : undefined,
      },
    };
    a$.applyProtection = 1;
  }

  return block;

};

/**
 * build styles.xml from a prepared registry
 */
export const StylesXML = (registry: FormatRegistry): string => {

  const hyperlink_font = registry.has_hyperlink_style ? (registry.cell_xfs[1]?.font || 0) : 0;

  const style_xfs: DOMContent[] = [
    { a$: { numFmtId: 0, fontId: 0, fillId: 0, borderId: 0 } },
  ];

  const cell_styles: DOMContent[] = [
    { a$: { name: 'Normal', xfId: 0, builtinId: 0 }},
  ];

  if (registry.has_hyperlink_style) {
    style_xfs.push({ a$: {
      numFmtId: 0, fontId: hyperlink_font, fillId: 0, borderId: 0,
      applyNumberFormat: 0, applyFill: 0, applyBorder: 0, applyAlignment: 0, applyProtection: 0,
    }});
    cell_styles.push({ a$: { name: 'Hyperlink', xfId: 1, builtinId: 8 }});
  }

  const dom: DOMContent = {

    styleSheet: {

      a$: {
        'xmlns': 'http://schemas.openxmlformats.org/spreadsheetml/2006/main',
      },

      // only numFmts can be empty, everything else has at least
      // the default entry

      numFmts: WithCount('numFmt', registry.number_formats.map(format => ({
        a$: {
          numFmtId: format.id,
          formatCode: format.format,
        },
      }))),

      fonts: WithCount('font', registry.fonts.map(FontDOM)),
      fills: WithCount('fill', registry.fills.map(FillDOM)),
      borders: WithCount('border', registry.borders.map(BorderDOM)),
      cellStyleXfs: WithCount('xf', style_xfs),
      cellXfs: WithCount('xf', registry.cell_xfs.map(XfDOM)),
      cellStyles: WithCount('cellStyle', cell_styles),

      dxfs: { a$: { count: 0 } },
      tableStyles: {
        a$: { count: 0, defaultTableStyle: 'TableStyleMedium9', defaultPivotStyle: 'PivotStyleLight16' },
      },

    },

  };

  return SerializeXML(dom);

};
