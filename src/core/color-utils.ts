import { colord, extend } from 'colord';
import namesPlugin from 'colord/plugins/names';
import type { RGB } from './types.js';

extend([namesPlugin]);

/** Linear-segment cutoff of the WCAG 2.1 sRGB transfer function */
const SRGB_LINEAR_CUTOFF = 0.03928;

const LUMINANCE_WEIGHTS = { r: 0.2126, g: 0.7152, b: 0.0722 } as const;

/**
 * Converts one sRGB channel in [0, 1] to linear light.
 */
export function srgbToLinear(channel: number): number {
  if (channel <= SRGB_LINEAR_CUTOFF) {
    return channel / 12.92;
  }
  return ((channel + 0.055) / 1.055) ** 2.4;
}

/**
 * WCAG 2.1 relative luminance of an 8-bit RGB color, in [0, 1].
 * https://www.w3.org/WAI/GL/wiki/Relative_luminance
 */
export function relativeLuminance(rgb: RGB): number {
  return (
    LUMINANCE_WEIGHTS.r * srgbToLinear(rgb.r / 255) +
    LUMINANCE_WEIGHTS.g * srgbToLinear(rgb.g / 255) +
    LUMINANCE_WEIGHTS.b * srgbToLinear(rgb.b / 255)
  );
}

/**
 * WCAG contrast ratio between two opaque colors, in [1, 21].
 * Argument order does not matter: the lighter luminance is always the numerator.
 */
export function contrastRatio(a: RGB, b: RGB): number {
  const la = relativeLuminance(a);
  const lb = relativeLuminance(b);
  const lighter = Math.max(la, lb);
  const darker = Math.min(la, lb);
  return (lighter + 0.05) / (darker + 0.05);
}

/** Formats a contrast ratio as shown in reasons and reports, e.g. "4.50:1" */
export function formatRatio(ratio: number): string {
  return `${ratio.toFixed(2)}:1`;
}

/** Page color assumed behind a span whose background is not opaque */
const PAPER: RGB = { r: 255, g: 255, b: 255 };

/**
 * Parses a CSS color string (hex, rgb(), hsl(), named colors) into 8-bit RGB.
 * Alpha below 1 is kept in `a`; "transparent" is black at alpha 0.
 *
 * Returns null for empty or unparseable values.
 */
export function parseColor(value: string): RGB | null {
  const trimmed = value.trim();
  if (!trimmed) return null;
  if (trimmed.toLowerCase() === 'transparent') return { r: 0, g: 0, b: 0, a: 0 };

  const parsed = colord(trimmed);
  if (!parsed.isValid()) return null;

  const { r, g, b, a } = parsed.toRgb();
  return a < 1 ? { r, g, b, a } : { r, g, b };
}

/**
 * Composites a color over an opaque backdrop.
 * Formula: result = fg * alpha + bg * (1 - alpha)
 */
export function compositeOver(fg: RGB, bg: RGB): RGB {
  const alpha = fg.a ?? 1;
  if (alpha >= 1) return { r: fg.r, g: fg.g, b: fg.b };

  return {
    r: Math.round(fg.r * alpha + bg.r * (1 - alpha)),
    g: Math.round(fg.g * alpha + bg.g * (1 - alpha)),
    b: Math.round(fg.b * alpha + bg.b * (1 - alpha)),
  };
}

/**
 * Contrast as painted: the background is composited over white paper,
 * then the text color over that background.
 */
export function effectiveContrast(fg: RGB, bg: RGB): number {
  const backdrop = compositeOver(bg, PAPER);
  return contrastRatio(compositeOver(fg, backdrop), backdrop);
}

/** Formats an RGB color as lowercase hex, with an alpha pair when a < 1 */
export function toHex(rgb: RGB): string {
  return colord(rgb).toHex();
}
