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
 * html-style color, either `#rrggbb`, `rrggbb` or one of the basic
 * named colors.
 */
export interface HTMLColor {
  text: string;
}

/** theme color index, with optional tint in the range [-1, 1] */
export interface ThemeColor {
  theme: number;
  tint?: number;
}

/** absent colors are represented by undefined */
export type Color = ThemeColor|HTMLColor;

export const IsHTMLColor = (color?: Color): color is HTMLColor => {
  return !!color && ('text' in color);
};

export const IsThemeColor = (color?: Color): color is ThemeColor => {
  return !!color && ('theme' in color);
};

const named_colors: Record<string, string> = {
  black: '000000',
  blue: '0000FF',
  brown: '800000',
  cyan: '00FFFF',
  gray: '808080',
  green: '008000',
  lime: '00FF00',
  magenta: 'FF00FF',
  navy: '000080',
  orange: 'FF6600',
  pink: 'FF00FF',
  purple: '800080',
  red: 'FF0000',
  silver: 'C0C0C0',
  white: 'FFFFFF',
  yellow: 'FFFF00',
};

/**
 * convert html color text to the `FFRRGGBB` form used in xlsx. returns
 * undefined if the text isn't something we understand.
 */
export const HTMLToARGB = (text: string): string|undefined => {

  const normalized = text.trim().toLowerCase();
  const named = named_colors[normalized];
  if (named) {
    return 'FF' + named;
  }

  const match = normalized.match(/^#?([0-9a-f]{6})$/);
  if (match) {
    return 'FF' + match[1].toUpperCase();
  }

  return undefined;

};

/**
 * stable text for a color, suitable for use in a lookup key.
 */
export const ColorKey = (color?: Color): string => {
  if (IsHTMLColor(color)) {
    return HTMLToARGB(color.text) || color.text;
  }
  if (IsThemeColor(color)) {
    return `theme:${color.theme}:${color.tint || 0}`;
  }
  return '';
};
