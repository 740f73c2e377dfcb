/**
 * Cell styles and the ordered merge used to layer highlights
 */

import { REVERSE } from './constants.js';

/** `#rrggbb` truecolor value */
export type HexColor = `#${string}`;

/** Named ANSI colors the TUI uses */
export type NamedColor = 'default' | 'red';

export type Color = HexColor | NamedColor;

/**
 * Style of a single terminal cell. Absent fields inherit from whatever the
 * style is patched onto.
 */
export interface Style {
  fg?: Color;
  bg?: Color;
  reversed?: boolean;
}

/** A highlight layer maps the style beneath it to a new style */
export type StyleLayer = (base: Style) => Style;

/**
 * Overlays `patch` on `base`. Colors in the patch replace the base colors;
 * `reversed` is additive and is never switched off by a patch.
 */
export function patchStyle(base: Style, patch: Style): Style {
  return {
    fg: patch.fg ?? base.fg,
    bg: patch.bg ?? base.bg,
    reversed: base.reversed === true || patch.reversed === true,
  };
}

/**
 * Builds a layer that patches a fixed style on top of its input
 */
export function layer(patch: Style): StyleLayer {
  return (base) => patchStyle(base, patch);
}

/**
 * Applies layers left to right over a base style
 */
export function composeStyles(base: Style, layers: readonly StyleLayer[]): Style {
  return layers.reduce<Style>((style, apply) => apply(style), base);
}

function parseHex(color: HexColor): [number, number, number] {
  const match = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(color);
  if (!match) {
    throw new Error(`Invalid hex color: ${color}`);
  }
  return [parseInt(match[1], 16), parseInt(match[2], 16), parseInt(match[3], 16)];
}

function colorCode(color: Color, ground: 'fg' | 'bg'): string | null {
  switch (color) {
    case 'default':
      return null;
    case 'red':
      return ground === 'fg' ? '31' : '41';
    default: {
      const [r, g, b] = parseHex(color);
      return `${ground === 'fg' ? 38 : 48};2;${r};${g};${b}`;
    }
  }
}

/**
 * ANSI escape sequence that switches the terminal to `style` from a reset state
 */
export function styleToAnsi(style: Style): string {
  let out = '';
  if (style.fg) {
    const code = colorCode(style.fg, 'fg');
    if (code) out += `\x1b[${code}m`;
  }
  if (style.bg) {
    const code = colorCode(style.bg, 'bg');
    if (code) out += `\x1b[${code}m`;
  }
  if (style.reversed) {
    out += REVERSE;
  }
  return out;
}

export function stylesEqual(a: Style, b: Style): boolean {
  return a.fg === b.fg && a.bg === b.bg && (a.reversed === true) === (b.reversed === true);
}
