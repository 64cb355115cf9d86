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

import { ParameterError } from './errors';
import { type DOMContent, SerializeXML } from './xml-utils';

/** value of a custom property. dates are written as filetime */
export type CustomPropertyValue = string|number|boolean|Date;

export interface CustomProperty {
  name: string;
  value: CustomPropertyValue;
}

/** longest custom property name */
export const MAX_CUSTOM_PROPERTY_NAME = 255;

/** W3CDTF without fractional seconds, like `2024-01-31T16:48:03Z` */
export const W3CDTF = (date: Date) => date.toISOString().replace(/\.\d{3}Z$/, 'Z');

/**
 * document properties, written to docProps/core.xml (the standard
 * set) and docProps/app.xml (manager, company, hyperlink base).
 */
export class DocProperties {

  public title = '';
  public subject = '';
  public author = '';
  public manager = '';
  public company = '';
  public category = '';
  public keywords = '';
  public comment = '';
  public status = '';
  public hyperlink_base = '';

  /**
   * creation time, also used as the modified time. if this is not
   * set, the time of the save is used; set it to get the same package
   * from repeated saves.
   */
  public creation_time?: Date;

  public SetTitle(title: string) { this.title = title; return this; }
  public SetSubject(subject: string) { this.subject = subject; return this; }
  public SetAuthor(author: string) { this.author = author; return this; }
  public SetManager(manager: string) { this.manager = manager; return this; }
  public SetCompany(company: string) { this.company = company; return this; }
  public SetCategory(category: string) { this.category = category; return this; }
  public SetKeywords(keywords: string) { this.keywords = keywords; return this; }
  public SetComment(comment: string) { this.comment = comment; return this; }
  public SetStatus(status: string) { this.status = status; return this; }
  public SetHyperlinkBase(hyperlink_base: string) { this.hyperlink_base = hyperlink_base; return this; }

  public SetCreationTime(time: Date) {
    if (Number.isNaN(time.getTime())) {
      throw new ParameterError('Invalid creation time');
    }
    this.creation_time = time;
    return this;
  }

  public CoreXML(now: Date = new Date()): string {

    const time = W3CDTF(this.creation_time || now);
    const Optional = (text: string) => text || undefined;

    const dom: DOMContent = {
      'cp:coreProperties': {
        a$: {
          'xmlns:cp': 'http://schemas.openxmlformats.org/package/2006/metadata/core-properties',
          'xmlns:dc': 'http://purl.org/dc/elements/1.1/',
          'xmlns:dcterms': 'http://purl.org/dc/terms/',
          'xmlns:dcmitype': 'http://purl.org/dc/dcmitype/',
          'xmlns:xsi': 'http://www.w3.org/2001/XMLSchema-instance',
        },
        'dc:title': Optional(this.title),
        'dc:subject': Optional(this.subject),
        'dc:creator': this.author,
        'cp:keywords': Optional(this.keywords),
        'dc:description': Optional(this.comment),
        'cp:lastModifiedBy': this.author,
        'dcterms:created': { a$: { 'xsi:type': 'dcterms:W3CDTF' }, t$: time },
        'dcterms:modified': { a$: { 'xsi:type': 'dcterms:W3CDTF' }, t$: time },
        'cp:category': Optional(this.category),
        'cp:contentStatus': Optional(this.status),
      },
    };

    return SerializeXML(dom);

  }

  /**
   * app.xml lists the sheet names and the named ranges (in the order
   * the workbook sorted them) as "titles of parts".
   */
  public AppXML(sheet_names: string[], named_ranges: string[], read_only_recommended = false): string {

    const heading_pairs: DOMContent[] = [
      { 'vt:lpstr': 'Worksheets' },
      { 'vt:i4': sheet_names.length },
    ];

    if (named_ranges.length) {
      heading_pairs.push(
        { 'vt:lpstr': 'Named Ranges' },
        { 'vt:i4': named_ranges.length });
    }

    const titles = [...sheet_names, ...named_ranges];

    const dom: DOMContent = {
      Properties: {
        a$: {
          xmlns: 'http://schemas.openxmlformats.org/officeDocument/2006/extended-properties',
          'xmlns:vt': 'http://schemas.openxmlformats.org/officeDocument/2006/docPropsVTypes',
        },
        Application: 'Microsoft Excel',
        DocSecurity: read_only_recommended ? 2 : 0,
        ScaleCrop: 'false',
        HeadingPairs: {
          'vt:vector': {
            a$: { size: heading_pairs.length, baseType: 'variant' },
            'vt:variant': heading_pairs,
          },
        },
        TitlesOfParts: {
          'vt:vector': {
            a$: { size: titles.length, baseType: 'lpstr' },
            'vt:lpstr': titles,
          },
        },
        Manager: this.manager || undefined,
        Company: this.company,
        LinksUpToDate: 'false',
        SharedDoc: 'false',
        HyperlinkBase: this.hyperlink_base || undefined,
        HyperlinksChanged: 'false',
        AppVersion: '12.0000',
      },
    };

    return SerializeXML(dom);

  }

}

/** element for a custom property value */
const CustomValue = (value: CustomPropertyValue): DOMContent => {

  if (value instanceof Date) {
    return { 'vt:filetime': W3CDTF(value) };
  }

  switch (typeof value) {
    case 'boolean':
      return { 'vt:bool': value ? 'true' : 'false' };
    case 'number':
      return Number.isInteger(value) && Math.abs(value) <= 0x7fffffff ?
        { 'vt:i4': value } : { 'vt:r8': value };
    default:
      return { 'vt:lpwstr': value };
  }

};

/**
 * docProps/custom.xml. property ids start at 2; the format id is the
 * same for every user-defined property.
 */
export const CustomPropertiesXML = (properties: CustomProperty[]): string => {

  const dom: DOMContent = {
    Properties: {
      a$: {
        xmlns: 'http://schemas.openxmlformats.org/officeDocument/2006/custom-properties',
        'xmlns:vt': 'http://schemas.openxmlformats.org/officeDocument/2006/docPropsVTypes',
      },
      property: properties.map((property, index) => ({
        a$: {
          fmtid: '{D5CDD505-2E9C-101B-9397-08002B2CF9AE}',
          pid: index + 2,
          name: property.name,
        },
        ...CustomValue(property.value),
      })),
    },
  };

  return SerializeXML(dom);

};
