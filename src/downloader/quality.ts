import type { FormatDescriptor, QualityOption } from "./types.js";

/**
 * Standard resolution ladder, highest first.
 */
export const STANDARD_HEIGHTS = [2160, 1440, 1080, 720, 480, 360, 240, 144] as const;

export const BEST_QUALITY: QualityOption = {
  selector: "bestvideo+bestaudio/best",
  label: "Best Quality (Video + Audio)",
};

export const AUDIO_ONLY_OPTIONS: readonly QualityOption[] = [
  { selector: "bestaudio/best", label: "Audio Only (Best Quality)" },
  { selector: "bestaudio[ext=m4a]/bestaudio", label: "Audio Only (M4A)" },
];

/**
 * Selector capping the video height, falling back to a muxed stream.
 */
export function heightSelector(height: number): string {
  return `bestvideo[height<=${height}]+bestaudio/best[height<=${height}]`;
}

/**
 * Derives the quality ladder from the formats a source offers:
 * best first, then each available standard height descending, then audio only.
 */
export function buildQualityOptions(formats: readonly FormatDescriptor[]): QualityOption[] {
  if (formats.length === 0) return [];

  const standard = new Set<number>(STANDARD_HEIGHTS);
  const available = new Set<number>();
  for (const format of formats) {
    if (standard.has(format.height)) {
      available.add(format.height);
    }
  }

  const resolutions = [...available]
    .sort((a, b) => b - a)
    .map((height) => ({ selector: heightSelector(height), label: `${height}p (Video + Audio)` }));

  return [{ ...BEST_QUALITY }, ...resolutions, ...AUDIO_ONLY_OPTIONS.map((option) => ({ ...option }))];
}

// ============================================================================
// Presets
// ============================================================================

/**
 * Named quality shortcuts accepted by the CLI and stored in config.
 */
export const QUALITY_PRESETS = {
  best: BEST_QUALITY.selector,
  "1080p": heightSelector(1080),
  "720p": heightSelector(720),
  "480p": heightSelector(480),
  audio: "bestaudio/best",
} as const;

export type QualityPreset = keyof typeof QUALITY_PRESETS;

export function isQualityPreset(value: string): value is QualityPreset {
  return Object.hasOwn(QUALITY_PRESETS, value);
}

/**
 * Resolves a preset name to its selector; anything else is treated as a selector.
 */
export function resolveQualitySelector(quality: string | undefined, fallback: QualityPreset = "best"): string {
  const value = quality?.trim();
  if (!value) return QUALITY_PRESETS[fallback];
  return isQualityPreset(value) ? QUALITY_PRESETS[value] : value;
}
