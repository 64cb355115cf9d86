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

import * as fs from 'node:fs';
import type { Chart } from './chart';
import { StitchChartCaches } from './chart-cache';
import { DefinedName, ResolveDefinedNames } from './defined-name';
import {
  type CustomProperty, type CustomPropertyValue, DocProperties,
  MAX_CUSTOM_PROPERTY_NAME,
} from './doc-properties';
import {
  IoError, ParameterError, SheetNameReusedError, TableNameReusedError,
  WorksheetReferenceError,
} from './errors';
import { FormatRegistry } from './format-registry';
import type { Image, ImageType } from './image';
import { type PackageSources, type PackagerOptions, DefaultPackagerOptions, Packager } from './packager';
import type { Table } from './table';
import { Worksheet } from './worksheet';

export interface SaveOptions {

  /** deflate parts. turn off for faster (larger) files */
  compress: boolean;
}

export const DefaultSaveOptions: SaveOptions = {
  compress: true,
};

/**
 * the document. holds worksheets, defined names and properties, and
 * runs the save pipeline:
 *
 *  reset -> sheets -> formats -> media and drawings -> tables ->
 *  chart caches -> names and manifest -> package
 *
 * everything the pipeline computes is rebuilt on every save, so a
 * workbook can be saved, modified and saved again.
 */
export class Workbook {

  public worksheets: Worksheet[] = [];

  /** global style table, rebuilt on each save */
  public registry = new FormatRegistry();

  public properties = new DocProperties();
  public custom_properties: CustomProperty[] = [];

  /** names from DefineName, as entered */
  public user_defined_names: DefinedName[] = [];

  /** user and structural names, resolved and sorted at save */
  public defined_names: DefinedName[] = [];

  public read_only_recommended = false;

  // --- save state ------------------------------------------------------------

  protected active_tab = 0;
  protected first_sheet = 0;
  protected tables: Table[] = [];
  protected charts: Chart[] = [];
  protected media: Image[] = [];

  // --- worksheets ------------------------------------------------------------

  /** add a sheet with the default name, `Sheet{n}` */
  public AddWorksheet(): Worksheet {
    return this.PushWorksheet(new Worksheet());
  }

  /**
   * add a sheet created separately. sheets without a name get the
   * default name. duplicate names are caught at save.
   */
  public PushWorksheet(worksheet: Worksheet): Worksheet {
    if (!worksheet.name) {
      worksheet.SetName(`Sheet${this.worksheets.length + 1}`);
    }
    this.worksheets.push(worksheet);
    return worksheet;
  }

  public WorksheetFromIndex(index: number): Worksheet {
    const worksheet = this.worksheets[index];
    if (!worksheet) {
      throw new WorksheetReferenceError(index);
    }
    return worksheet;
  }

  public WorksheetFromName(name: string): Worksheet {
    const worksheet = this.FindWorksheet(name);
    if (!worksheet) {
      throw new WorksheetReferenceError(name);
    }
    return worksheet;
  }

  /** like WorksheetFromName, but returns undefined instead of throwing */
  public FindWorksheet(name: string): Worksheet|undefined {
    return this.worksheets.find(worksheet => worksheet.name === name);
  }

  public Worksheets(): Worksheet[] {
    return [...this.worksheets];
  }

  // --- names and properties --------------------------------------------------

  /**
   * define a name. `Name` is global; `Sheet1!Name` is local to the
   * sheet. the formula is a range or a constant, with or without `=`.
   * the sheet is not checked until the workbook is saved.
   */
  public DefineName(name: string, formula: string) {
    this.user_defined_names.push(DefinedName.Parse(name, formula));
    return this;
  }

  public SetProperties(properties: DocProperties) {
    this.properties = properties;
    return this;
  }

  /** add or replace a custom property */
  public SetCustomProperty(name: string, value: CustomPropertyValue) {

    if (!name || name.length > MAX_CUSTOM_PROPERTY_NAME) {
      throw new ParameterError(`Custom property name must be 1 to ${MAX_CUSTOM_PROPERTY_NAME} characters`);
    }

    if (typeof value === 'number' && !Number.isFinite(value)) {
      throw new ParameterError(`Invalid value for custom property '${name}'`);
    }

    const property = this.custom_properties.find(test => test.name === name);
    if (property) {
      property.value = value;
    }
    else {
      this.custom_properties.push({ name, value });
    }

    return this;

  }

  /** show the "open as read-only?" prompt when the file is opened */
  public ReadOnlyRecommended() {
    this.read_only_recommended = true;
    return this;
  }

  // --- save ------------------------------------------------------------------

  /**
   * save to a file. the package is built in memory first; the file is
   * only opened once there's something to write.
   */
  public Save(path: string, options: Partial<SaveOptions> = {}) {

    const bytes = this.SaveToBuffer(options);
    let fd: number|undefined;

    try {
      fd = fs.openSync(path, 'w');
      let offset = 0;
      while (offset < bytes.length) {
        offset += fs.writeSync(fd, bytes, offset);
      }
    }
    catch (err) {
      throw new IoError(`error writing ${path}`, err);
    }
    finally {
      if (fd !== undefined) {
        try {
          fs.closeSync(fd);
        }
        catch (err) {
          // eslint-disable-next-line no-unsafe-finally
          throw new IoError(`error closing ${path}`, err);
        }
      }
    }

  }

  public SaveToBuffer(options: Partial<SaveOptions> = {}): Uint8Array {

    const { compress } = { ...DefaultSaveOptions, ...options };

    this.Reset();
    this.PrepareSheets();
    this.PrepareFormats();
    this.PrepareDrawings();
    this.PrepareTables();
    this.PrepareChartCaches();

    const packager_options = this.PackagerOptions();

    const sources: PackageSources = {
      worksheets: this.worksheets,
      registry: this.registry,
      properties: this.properties,
      custom_properties: this.custom_properties,
      tables: this.tables,
      charts: this.charts,
      media: this.media,
    };

    const zip = new Packager(sources, packager_options).AssembleFile();
    return new Uint8Array(zip.ArrayBuffer(compress));

  }

  // --- pipeline --------------------------------------------------------------

  /** clear anything left from a previous save */
  protected Reset() {
    this.registry.Reset();
    this.defined_names = [];
    this.tables = [];
    this.charts = [];
    this.media = [];
    for (const worksheet of this.worksheets) {
      worksheet.Reset();
    }
  }

  /**
   * there has to be at least one sheet, and exactly one is active: the
   * last one flagged, or the first.
   */
  protected PrepareSheets() {

    if (!this.worksheets.length) {
      this.AddWorksheet();
    }

    this.active_tab = 0;
    this.first_sheet = 0;

    this.worksheets.forEach((worksheet, index) => {
      if (worksheet.active) {
        this.active_tab = index;
      }
      if (worksheet.first_sheet) {
        this.first_sheet = index;
      }
    });

    this.worksheets.forEach((worksheet, index) => worksheet.SetActive(index === this.active_tab));

  }

  /**
   * register every sheet's formats with the global registry and give
   * each sheet its local -> global map. the hyperlink style, if any
   * sheet uses it, has to go in first so it lands at index 1.
   */
  protected PrepareFormats() {

    if (this.worksheets.some(worksheet => worksheet.has_hyperlink_style)) {
      this.registry.AddHyperlinkStyle();
    }

    for (const worksheet of this.worksheets) {
      worksheet.SetGlobalXfIndices(worksheet.formats.map(format => this.registry.Register(format)));
    }

    this.registry.Prepare();

  }

  /**
   * number media, charts, drawings and vml drawings. identical images
   * (by content) share a media part.
   */
  protected PrepareDrawings() {

    const media_map: Map<string, number> = new Map();

    for (const worksheet of this.worksheets) {
      const images = [...worksheet.images, ...worksheet.HeaderFooterImages().map(entry => entry.image)];
      for (const image of images) {
        let index = media_map.get(image.hash);
        if (index === undefined) {
          this.media.push(image);
          index = this.media.length;
          media_map.set(image.hash, index);
        }
        image.media_index = index;
      }
    }

    let drawing_index = 1;
    let vml_index = 1;

    // chart -> sheet it was first inserted into
    const owners: Map<Chart, string> = new Map();

    for (const worksheet of this.worksheets) {

      for (const chart of worksheet.charts) {
        const owner = owners.get(chart);
        if (owner !== undefined) {
          throw new ParameterError(
            `A chart can only be inserted once (inserted into '${owner}' and '${worksheet.name}')`);
        }
        owners.set(chart, worksheet.name);
        this.charts.push(chart);
        chart.index = this.charts.length;
      }

      if (worksheet.drawing_objects.length) {
        worksheet.PrepareDrawing(drawing_index++);
      }

      if (worksheet.HeaderFooterImages().length) {
        worksheet.PrepareVML(vml_index++);
      }

    }

  }

  /** number tables; names must be unique, ignoring case */
  protected PrepareTables() {

    const names: Set<string> = new Set();

    for (const worksheet of this.worksheets) {
      for (const table of worksheet.tables) {
        this.tables.push(table);
        table.index = this.tables.length;
        const name = table.name.toLowerCase();
        if (names.has(name)) {
          throw new TableNameReusedError(table.name);
        }
        names.add(name);
      }
    }

  }

  protected PrepareChartCaches() {
    StitchChartCaches(this.charts, name => this.FindWorksheet(name));
  }

  /**
   * check sheet names, resolve defined names and collect the flags the
   * packager needs.
   */
  protected PackagerOptions(): PackagerOptions {

    const sheet_indices: Map<string, number> = new Map();

    this.worksheets.forEach((worksheet, index) => {
      if (sheet_indices.has(worksheet.name)) {
        throw new SheetNameReusedError(worksheet.name);
      }
      sheet_indices.set(worksheet.name, index);
    });

    const names = [...this.user_defined_names];
    for (const worksheet of this.worksheets) {
      for (const name of worksheet.StructuralNames()) {
        names.push(name.Initialize(worksheet.quoted_name));
      }
    }

    const resolved = ResolveDefinedNames(names, sheet_indices);
    this.defined_names = resolved.names;

    const image_types: ImageType[] = [];
    for (const image of this.media) {
      if (!image_types.includes(image.type)) {
        image_types.push(image.type);
      }
    }

    return {
      ...DefaultPackagerOptions,
      sheet_names: this.worksheets.map(worksheet => worksheet.name),
      defined_names: resolved.names,
      app_names: resolved.app_names,
      active_tab: this.active_tab,
      first_sheet: this.first_sheet,
      read_only_recommended: this.read_only_recommended,
      has_sst_table: this.worksheets.some(worksheet => worksheet.uses_string_table),
      has_dynamic_arrays: this.worksheets.some(worksheet => worksheet.has_dynamic_arrays),
      has_custom_properties: this.custom_properties.length > 0,
      num_drawings: this.worksheets.filter(worksheet => !!worksheet.drawing).length,
      num_charts: this.charts.length,
      num_tables: this.tables.length,
      num_vml: this.worksheets.filter(worksheet => !!worksheet.vml).length,
      image_types,
    };

  }

}
