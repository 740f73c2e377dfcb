/**
 * Color palettes for the table
 *
 * Shades follow the Tailwind scale; only the stops the table uses are listed.
 */

import type { HexColor } from './style.js';

export interface Palette {
  c200: HexColor;
  c400: HexColor;
  c600: HexColor;
  c900: HexColor;
  c950: HexColor;
}

export const PALETTE_NAMES = ['blue', 'emerald', 'indigo', 'red'] as const;

export type PaletteName = (typeof PALETTE_NAMES)[number];

const SLATE: Palette = {
  c200: '#e2e8f0',
  c400: '#94a3b8',
  c600: '#475569',
  c900: '#0f172a',
  c950: '#020617',
};

export const PALETTES: Record<PaletteName, Palette> = {
  blue: { c200: '#bfdbfe', c400: '#60a5fa', c600: '#2563eb', c900: '#1e3a8a', c950: '#172554' },
  emerald: { c200: '#a7f3d0', c400: '#34d399', c600: '#059669', c900: '#064e3b', c950: '#022c22' },
  indigo: { c200: '#c7d2fe', c400: '#818cf8', c600: '#4f46e5', c900: '#312e81', c950: '#1e1b4b' },
  red: { c200: '#fecaca', c400: '#f87171', c600: '#dc2626', c900: '#7f1d1d', c950: '#450a0a' },
};

/**
 * Colors the renderer needs for one frame
 */
export interface TableColors {
  bufferBg: HexColor;
  rowFg: HexColor;
  selectedRowFg: HexColor;
  selectedColumnFg: HexColor;
  selectedCellFg: HexColor;
  normalRowBg: HexColor;
  altRowBg: HexColor;
}

/**
 * Builds the table colors for an accent palette on the slate base
 */
export function createTableColors(name: PaletteName): TableColors {
  const accent = PALETTES[name];
  return {
    bufferBg: SLATE.c950,
    rowFg: SLATE.c200,
    selectedRowFg: accent.c400,
    selectedColumnFg: accent.c400,
    selectedCellFg: accent.c600,
    normalRowBg: SLATE.c950,
    altRowBg: SLATE.c900,
  };
}
