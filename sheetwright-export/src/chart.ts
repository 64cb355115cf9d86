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

import { Area, ParseRangeReference, QuoteSheetName } from 'sheetwright-base-types';
import { ParameterError } from './errors';
import { type DOMContent, SerializeXML } from './xml-utils';

export type ChartType = 'column'|'bar'|'line'|'pie'|'doughnut'|'scatter';

/**
 * cached values for a chart range. these are written into the chart
 * xml so that readers can draw the chart without calculating.
 * `none` means the range has not been (or could not be) resolved.
 */
export interface ChartCacheData {
  type: 'number'|'string'|'none';
  data: string[];
}

export const EmptyCacheData = (): ChartCacheData => ({ type: 'none', data: [] });

/**
 * reference from a chart element to a range on some worksheet
 */
export class ChartRange {

  /**
   * from a reference like `Sheet1!$A$1:$A$5`, with or without the
   * leading `=`. the sheet name is required.
   */
  public static FromString(reference: string): ChartRange {
    const parsed = ParseRangeReference(reference);
    if (!parsed || !parsed.sheet_name) {
      throw new ParameterError(`Invalid chart range '${reference}'`);
    }
    return new ChartRange(parsed.sheet_name, parsed.area);
  }

  /** from zero-based cell coordinates */
  public static FromCells(sheet_name: string, first_row: number, first_column: number, last_row: number, last_column: number) {
    return new ChartRange(sheet_name, new Area(
      { row: first_row, column: first_column },
      { row: last_row, column: last_column }, true));
  }

  public cache: ChartCacheData = EmptyCacheData();

  constructor(public sheet_name = '', public area?: Area) {}

  /** true if this range points at something */
  public HasData(): boolean {
    return !!this.sheet_name && !!this.area;
  }

  /**
   * identity of the range, for sharing caches. two references to the
   * same cells on the same sheet have the same key.
   */
  public Key(): string {
    if (!this.area) {
      return '';
    }
    const { start, end } = this.area;
    return JSON.stringify([this.sheet_name, start.row, start.column, end.row, end.column]);
  }

  /** formula text as written in the chart */
  public Formula(): string {
    if (!this.area) {
      return '';
    }
    return `${QuoteSheetName(this.sheet_name)}!${this.area.absolute_label}`;
  }

}

/**
 * a title (chart, axis, series name or data label) is either literal
 * text or a reference to a cell. text starting with `=` is treated as
 * a reference.
 */
export class ChartTitle {

  public text = '';
  public range = new ChartRange();

  public Set(name: string) {
    if (name.startsWith('=')) {
      this.range = ChartRange.FromString(name);
      this.text = '';
    }
    else {
      this.text = name;
      this.range = new ChartRange();
    }
    return this;
  }

  public get empty() {
    return !this.text && !this.range.HasData();
  }

}

export class ChartAxis {

  public title = new ChartTitle();

  /** number format for axis labels */
  public num_format = '';

  public SetName(name: string) {
    this.title.Set(name);
    return this;
  }

  public SetNumFormat(num_format: string) {
    this.num_format = num_format;
    return this;
  }

}

export class ChartSeries {

  public values = new ChartRange();
  public categories = new ChartRange();
  public title = new ChartTitle();

  /** per-point data labels. an empty title leaves the default label */
  public custom_data_labels: ChartTitle[] = [];

  /** line and scatter only */
  public smooth = false;

  public SetValues(reference: string|ChartRange) {
    this.values = typeof reference === 'string' ? ChartRange.FromString(reference) : reference;
    return this;
  }

  public SetCategories(reference: string|ChartRange) {
    this.categories = typeof reference === 'string' ? ChartRange.FromString(reference) : reference;
    return this;
  }

  public SetName(name: string) {
    this.title.Set(name);
    return this;
  }

  /** labels, in point order. literal text or `=Sheet!$A$1` references */
  public SetCustomDataLabels(labels: string[]) {
    this.custom_data_labels = labels.map(label => new ChartTitle().Set(label));
    return this;
  }

  public SetSmooth(smooth = true) {
    this.smooth = smooth;
    return this;
  }

}

/** default chart size, in pixels */
export const DEFAULT_CHART_WIDTH = 480;
export const DEFAULT_CHART_HEIGHT = 288;

export class Chart {

  public title = new ChartTitle();
  public x_axis = new ChartAxis();
  public y_axis = new ChartAxis();
  public series: ChartSeries[] = [];

  public width = DEFAULT_CHART_WIDTH;
  public height = DEFAULT_CHART_HEIGHT;

  /** chart number in the package, assigned at save */
  public index = 0;

  constructor(public type: ChartType) {}

  /** add a series and return it, for setting ranges */
  public AddSeries(): ChartSeries {
    const series = new ChartSeries();
    this.series.push(series);
    return series;
  }

  public SetTitle(name: string) {
    this.title.Set(name);
    return this;
  }

  public SetSize(width: number, height: number) {
    this.width = width;
    this.height = height;
    return this;
  }

  /** true if this chart type has axes */
  public get has_axes() {
    return this.type !== 'pie' && this.type !== 'doughnut';
  }

  public XML(): string {
    return SerializeXML(this.toJSON());
  }

  public toJSON(): DOMContent {

    const axis_ids = [50010000 + this.index * 2, 50010001 + this.index * 2];

    const plot_area: DOMContent = {
      'c:layout': '',
      [this.ChartElementName()]: this.ChartElement(axis_ids),
    };

    if (this.type === 'scatter') {
      plot_area['c:valAx'] = [
        this.AxisDOM(this.x_axis, 'c:valAx', axis_ids[0], axis_ids[1], 'b'),
        this.AxisDOM(this.y_axis, 'c:valAx', axis_ids[1], axis_ids[0], 'l'),
      ];
    }
    else if (this.has_axes) {
      const horizontal = this.type === 'bar';
      plot_area['c:catAx'] = this.AxisDOM(this.x_axis, 'c:catAx', axis_ids[0], axis_ids[1], horizontal ? 'l' : 'b');
      plot_area['c:valAx'] = this.AxisDOM(this.y_axis, 'c:valAx', axis_ids[1], axis_ids[0], horizontal ? 'b' : 'l');
    }

    return {
      'c:chartSpace': {
        a$: {
          'xmlns:c': 'http://schemas.openxmlformats.org/drawingml/2006/chart',
          'xmlns:a': 'http://schemas.openxmlformats.org/drawingml/2006/main',
          'xmlns:r': 'http://schemas.openxmlformats.org/officeDocument/2006/relationships',
        },
        'c:lang': { a$: { val: 'en-US' } },
        'c:chart': {
          'c:title': this.title.empty ? undefined : TitleDOM(this.title),
          'c:autoTitleDeleted': this.title.empty && this.series.length > 1 ? { a$: { val: 1 } } : undefined,
          'c:plotArea': plot_area,
          'c:legend': {
            'c:legendPos': { a$: { val: this.has_axes ? 'r' : 'b' } },
            'c:overlay': { a$: { val: 0 } },
          },
          'c:plotVisOnly': { a$: { val: 1 } },
          'c:dispBlanksAs': { a$: { val: 'gap' } },
        },
      },
    };

  }

  protected ChartElementName() {
    switch (this.type) {
      case 'column':
      case 'bar':
        return 'c:barChart';
      case 'line':
        return 'c:lineChart';
      case 'pie':
        return 'c:pieChart';
      case 'doughnut':
        return 'c:doughnutChart';
      case 'scatter':
        return 'c:scatterChart';
    }
  }

  protected ChartElement(axis_ids: number[]): DOMContent {

    const series = this.series.map((series, index) => this.SeriesDOM(series, index));
    const axes = axis_ids.map(val => ({ a$: { val } }));

    switch (this.type) {
      case 'column':
      case 'bar':
        return {
          'c:barDir': { a$: { val: this.type === 'bar' ? 'bar' : 'col' } },
          'c:grouping': { a$: { val: 'clustered' } },
          'c:varyColors': { a$: { val: 0 } },
          'c:ser': series,
          'c:gapWidth': { a$: { val: 150 } },
          'c:axId': axes,
        };

      case 'line':
        return {
          'c:grouping': { a$: { val: 'standard' } },
          'c:varyColors': { a$: { val: 0 } },
          'c:ser': series,
          'c:marker': { a$: { val: 1 } },
          'c:axId': axes,
        };

      case 'scatter':
        return {
          'c:scatterStyle': { a$: { val: 'lineMarker' } },
          'c:varyColors': { a$: { val: 0 } },
          'c:ser': series,
          'c:axId': axes,
        };

      case 'pie':
        return {
          'c:varyColors': { a$: { val: 1 } },
          'c:ser': series,
          'c:firstSliceAng': { a$: { val: 0 } },
        };

      case 'doughnut':
        return {
          'c:varyColors': { a$: { val: 1 } },
          'c:ser': series,
          'c:firstSliceAng': { a$: { val: 0 } },
          'c:holeSize': { a$: { val: 50 } },
        };
    }

  }

  protected SeriesDOM(series: ChartSeries, index: number): DOMContent {

    const block: DOMContent = {
      'c:idx': { a$: { val: index } },
      'c:order': { a$: { val: index } },
      'c:tx': series.title.empty ? undefined : SeriesNameDOM(series.title),
    };

    if (this.type === 'line' || this.type === 'scatter') {
      block['c:spPr'] = {
        'a:ln': {
          a$: { w: 28575, cap: 'rnd' },
          'a:solidFill': { 'a:schemeClr': { a$: { val: `accent${(index % 6) + 1}` } } },
          'a:round': '',
        },
      };
      block['c:marker'] = { 'c:symbol': { a$: { val: this.type === 'scatter' ? 'circle' : 'none' } } };
    }
    else if (this.type === 'column' || this.type === 'bar') {
      block['c:invertIfNegative'] = { a$: { val: 0 } };
    }

    if (series.custom_data_labels.length) {
      block['c:dLbls'] = DataLabelsDOM(series.custom_data_labels);
    }

    if (this.type === 'scatter') {
      block['c:xVal'] = series.categories.HasData() ? RangeDOM(series.categories) : undefined;
      block['c:yVal'] = RangeDOM(series.values, true);
      block['c:smooth'] = { a$: { val: series.smooth ? 1 : 0 } };
    }
    else {
      block['c:cat'] = series.categories.HasData() ? RangeDOM(series.categories) : undefined;
      block['c:val'] = RangeDOM(series.values, true);
      if (this.type === 'line') {
        block['c:smooth'] = { a$: { val: series.smooth ? 1 : 0 } };
      }
    }

    return block;

  }

  protected AxisDOM(axis: ChartAxis, element: 'c:catAx'|'c:valAx', id: number, cross: number, position: 'b'|'l'): DOMContent {

    const block: DOMContent = {
      'c:axId': { a$: { val: id } },
      'c:scaling': { 'c:orientation': { a$: { val: 'minMax' } } },
      'c:delete': { a$: { val: 0 } },
      'c:axPos': { a$: { val: position } },
      'c:majorGridlines': (element === 'c:valAx' && position === 'l') ? '' : undefined,
      'c:title': axis.title.empty ? undefined : TitleDOM(axis.title),
      'c:numFmt': {
        a$: {
          formatCode: axis.num_format || 'General',
          sourceLinked: axis.num_format ? 0 : 1,
        },
      },
      'c:majorTickMark': { a$: { val: 'out' } },
      'c:minorTickMark': { a$: { val: 'none' } },
      'c:tickLblPos': { a$: { val: 'nextTo' } },
      'c:crossAx': { a$: { val: cross } },
      'c:crosses': { a$: { val: 'autoZero' } },
    };

    if (element === 'c:catAx') {
      block['c:auto'] = { a$: { val: 1 } };
      block['c:lblAlgn'] = { a$: { val: 'ctr' } };
      block['c:lblOffset'] = { a$: { val: 100 } };
    }
    else {
      block['c:crossBetween'] = { a$: { val: this.type === 'scatter' ? 'midCat' : 'between' } };
    }

    return block;

  }

}

// --- dom helpers -------------------------------------------------------------

const CacheDOM = (cache: ChartCacheData, numeric: boolean): DOMContent|undefined => {

  if (cache.type === 'none') {
    return undefined;
  }

  const points: DOMContent[] = [];
  for (const [idx, value] of cache.data.entries()) {
    if (value !== '') {
      points.push({ a$: { idx }, 'c:v': value });
    }
  }

  return {
    'c:formatCode': numeric ? 'General' : undefined,
    'c:ptCount': { a$: { val: cache.data.length } },
    'c:pt': points,
  };

};

/**
 * numeric reference with cache, or string reference if the cache has
 * any text in it. values are always numeric references.
 */
const RangeDOM = (range: ChartRange, values = false): DOMContent => {

  if (values || range.cache.type !== 'string') {
    return {
      'c:numRef': {
        'c:f': range.Formula(),
        'c:numCache': CacheDOM(range.cache, true),
      },
    };
  }

  return {
    'c:strRef': {
      'c:f': range.Formula(),
      'c:strCache': CacheDOM(range.cache, false),
    },
  };

};

const StringReferenceDOM = (range: ChartRange): DOMContent => ({
  'c:strRef': {
    'c:f': range.Formula(),
    'c:strCache': CacheDOM(range.cache, false),
  },
});

const RichTextDOM = (text: string): DOMContent => ({
  'c:rich': {
    'a:bodyPr': '',
    'a:lstStyle': '',
    'a:p': {
      'a:pPr': { 'a:defRPr': '' },
      'a:r': {
        'a:rPr': { a$: { lang: 'en-US' } },
        'a:t': text,
      },
    },
  },
});

const TitleDOM = (title: ChartTitle): DOMContent => ({
  'c:tx': title.range.HasData() ? StringReferenceDOM(title.range) : RichTextDOM(title.text),
  'c:overlay': { a$: { val: 0 } },
});

const SeriesNameDOM = (title: ChartTitle): DOMContent => {
  if (title.range.HasData()) {
    return StringReferenceDOM(title.range);
  }
  return { 'c:v': title.text };
};

const DataLabelsDOM = (labels: ChartTitle[]): DOMContent => {

  const entries: DOMContent[] = [];
  for (const [idx, label] of labels.entries()) {
    if (label.empty) {
      continue;
    }
    entries.push({
      'c:idx': { a$: { val: idx } },
      'c:tx': label.range.HasData() ? StringReferenceDOM(label.range) : RichTextDOM(label.text),
      'c:showLegendKey': { a$: { val: 0 } },
      'c:showVal': { a$: { val: 1 } },
      'c:showCatName': { a$: { val: 0 } },
      'c:showSerName': { a$: { val: 0 } },
      'c:showPercent': { a$: { val: 0 } },
      'c:showBubbleSize': { a$: { val: 0 } },
    });
  }

  return {
    'c:dLbl': entries,
    'c:showLegendKey': { a$: { val: 0 } },
    'c:showVal': { a$: { val: 1 } },
    'c:showCatName': { a$: { val: 0 } },
    'c:showSerName': { a$: { val: 0 } },
    'c:showPercent': { a$: { val: 0 } },
    'c:showBubbleSize': { a$: { val: 0 } },
  };

};
