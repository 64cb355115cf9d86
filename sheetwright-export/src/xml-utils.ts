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

import { XMLBuilder, type XmlBuilderOptions } from 'fast-xml-parser';

export const XMLDeclaration = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n`;

/**
 * structure passed to the xml builder. attributes go in `a$`, text
 * in `t$`. child elements with value undefined are dropped.
 */
export interface DOMContent {
  [index: string]: string|DOMContent|string[]|DOMContent[]|number|number[]|undefined;
}

const IsDOMContent = (test: unknown): test is DOMContent => {
  return !!test && (typeof test === 'object') && !Array.isArray(test);
};

/**
 * the builder writes undefined attributes as the string "undefined",
 * so filter attributes that have value === undefined
 */
export const ScrubXML = (dom: DOMContent) => {
  for (const [key, value] of Object.entries(dom)) {
    if (key === 'a$') {
      if (IsDOMContent(value)) {
        const replacement: DOMContent = {};
        for (const [attr_name, attr_value] of Object.entries(value)) {
          if (attr_value !== undefined) {
            replacement[attr_name] = attr_value;
          }
        }
        dom[key] = replacement;
      }
    }
    else if (Array.isArray(value)) {
      for (const entry of value) {
        if (IsDOMContent(entry)) {
          ScrubXML(entry);
        }
      }
    }
    else if (IsDOMContent(value)) {
      ScrubXML(value);
    }
  }
  return dom;
};

export const PatchXMLBuilder = (options: Partial<XmlBuilderOptions>) => {

  const builder = new XMLBuilder(options);
  const build = builder.build;

  builder.build = (arg: DOMContent) => {
    return build.call(builder, ScrubXML(arg)); // get the "this" value right
  }

  return builder;

};

/**
 * note: never use boolean attribute values. the builder writes `true`
 * as a bare attribute name, which is not valid xml. use 1/0.
 *
 * output is not formatted. with formatting on, the builder pads the
 * text of elements that have both attributes and text.
 */
export const xml_options: Partial<XmlBuilderOptions> = {
  format: false,
  attributesGroupName: 'a$',
  textNodeName: 't$',
  ignoreAttributes: false,
  suppressEmptyNode: true,
};

const xml_builder = PatchXMLBuilder(xml_options);

/** build dom to xml text, with declaration */
export const SerializeXML = (dom: DOMContent): string => {
  return XMLDeclaration + xml_builder.build(dom);
};

/** text node, with xml:space set if there's leading or trailing whitespace */
export const TextNode = (text: string): DOMContent|string => {
  if (/^\s|\s$/.test(text)) {
    return { a$: { 'xml:space': 'preserve' }, t$: text };
  }
  return text;
};

/** element with a single `val` attribute, or undefined */
export const ValProp = (prop: string|number|undefined): DOMContent|undefined => {
  if (typeof prop === 'undefined') {
    return undefined;
  }
  return { a$: { val: prop } };
};

/** element wrapping a list with a count attribute, or undefined if empty */
export const WithCount = (key: string, source: DOMContent[]): DOMContent|undefined => {
  if (source.length) {
    return {
      a$: { count: source.length },
      [key]: source,
    };
  }
  return undefined;
};
