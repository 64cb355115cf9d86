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

export * from './errors';
export * from './format';
export { FormatRegistry, BASE_NUMBER_FORMAT_ID } from './format-registry';
export type { CellXf, NumberFormat } from './format-registry';
export * from './chart';
export { StitchChartCaches, ChartRanges } from './chart-cache';
export type { CacheDataSource } from './chart-cache';
export { DefinedName, ResolveDefinedNames } from './defined-name';
export type { DefinedNameType, ResolvedNames } from './defined-name';
export { DocProperties, W3CDTF } from './doc-properties';
export type { CustomProperty, CustomPropertyValue } from './doc-properties';
export { Image } from './image';
export type { ImageType } from './image';
export { Table, DefaultTableOptions } from './table';
export type { TableColumn, TableOptions, TotalFunction } from './table';
export * from './worksheet';
export * from './workbook';
export { Packager, DefaultPackagerOptions } from './packager';
export type { PackagerOptions, PackageSources } from './packager';
export { ContentTypes, ContentType } from './content-types';
export { RelationshipType } from './relationship';
export type { Relationship, RelationshipMap } from './relationship';
