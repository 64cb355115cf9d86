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

/**
 * column widths in the file are measured in characters of the maximum
 * digit width of the default font, plus 5 pixels of padding (two on
 * each side, one for the gridline). for calibri 11 the digit width is 7
 * pixels, so a column 8 characters wide is stored as
 *
 *   Truncate([8*7+5]/7*256)/256 = 8.7109375
 *
 * and renders at 61 pixels. widths below one character scale without
 * padding.
 */

const MaximumDigitWidth = 7; // @ calibri 11
const Padding = 5;

/** default column width, in characters, and its pixel width */
export const DEFAULT_COLUMN_WIDTH = 8.43;
export const DEFAULT_COLUMN_PIXELS = 64;

/** default row height, in points, and its pixel height */
export const DEFAULT_ROW_HEIGHT = 15;
export const DEFAULT_ROW_PIXELS = 20;

/** character width (as the user sets it) to pixels */
export const ColumnWidthToPixels = (width: number): number => {
  if (width <= 0) {
    return 0;
  }
  if (width < 1) {
    return Math.round(width * (MaximumDigitWidth + Padding));
  }
  return Math.round(width * MaximumDigitWidth) + Padding;
};

/** character width (as the user sets it) to the value stored in the file */
export const ColumnWidthToXML = (width: number): number => {
  if (width <= 0) {
    return 0;
  }
  const pixels = ColumnWidthToPixels(width);
  return Math.floor(pixels / MaximumDigitWidth * 256) / 256;
};

export const PixelsToColumnWidth = (pixels: number): number => {
  if (pixels < MaximumDigitWidth + Padding) {
    return Math.floor(pixels / (MaximumDigitWidth + Padding) * 100 + 0.5) / 100;
  }
  return Math.floor((pixels - Padding) / MaximumDigitWidth * 100 + 0.5) / 100;
};

/** row height in points to pixels */
export const RowHeightToPixels = (height: number): number => {
  return Math.round(height * 4 / 3);
};
