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

import type { Area } from 'sheetwright-base-types';
import { type Chart, type ChartCacheData, type ChartRange, EmptyCacheData } from './chart';

/** anything that can produce cache data for a range: a worksheet */
export interface CacheDataSource {
  GetCacheData(area: Area): ChartCacheData;
}

/**
 * every range-bearing element in a chart: titles, axis titles, series
 * names, values, categories and custom data labels.
 */
export const ChartRanges = (chart: Chart): ChartRange[] => {

  const ranges: ChartRange[] = [
    chart.title.range,
    chart.x_axis.title.range,
    chart.y_axis.title.range,
  ];

  for (const series of chart.series) {
    ranges.push(series.title.range, series.values, series.categories);
    for (const label of series.custom_data_labels) {
      ranges.push(label.range);
    }
  }

  return ranges;

};

/**
 * fill chart caches from worksheet data. charts can reference data on
 * any sheet, so this runs at the workbook level:
 *
 * (1) collect the distinct ranges from every chart
 * (2) resolve each range once, against the sheet it names
 * (3) copy the result back into every element using that range
 *
 * a range on a sheet that doesn't exist gets an empty cache; that's
 * not an error, since the chart is still valid without a cache.
 *
 * returns the resolved caches by range key.
 */
export const StitchChartCaches = (
    charts: Chart[],
    lookup: (sheet_name: string) => CacheDataSource|undefined): Map<string, ChartCacheData> => {

  const pending: Map<string, ChartRange> = new Map();

  for (const chart of charts) {
    for (const range of ChartRanges(chart)) {
      if (range.HasData()) {
        const key = range.Key();
        if (!pending.has(key)) {
          pending.set(key, range);
        }
      }
    }
  }

  const caches: Map<string, ChartCacheData> = new Map();

  for (const [key, range] of pending.entries()) {
    const source = lookup(range.sheet_name);
    if (source && range.area) {
      caches.set(key, source.GetCacheData(range.area));
    }
    else {
      console.warn(`chart range ${range.Formula()} refers to an unknown worksheet`);
      caches.set(key, EmptyCacheData());
    }
  }

  for (const chart of charts) {
    for (const range of ChartRanges(chart)) {
      const cache = range.HasData() ? caches.get(range.Key()) : undefined;
      range.cache = cache || EmptyCacheData();
    }
  }

  return caches;

};
