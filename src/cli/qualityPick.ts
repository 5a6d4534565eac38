import type { QualityOption } from "../downloader/types.js";

/**
 * Lines for a numbered quality list. The numbers are what `--pick` takes.
 */
export function numberedQualities(options: readonly QualityOption[]): string[] {
  const width = String(options.length).length;
  return options.map((option, index) => `${String(index + 1).padStart(width)}. ${option.label}`);
}

/**
 * Selector of the 1-based choice from a numbered quality list.
 * @throws Error when the number is outside the list
 */
export function pickQuality(options: readonly QualityOption[], choice: number): string {
  const option = Number.isInteger(choice) ? options[choice - 1] : undefined;
  if (!option) {
    throw new Error(
      options.length === 0 ? "No qualities to pick from" : `Pick a number from 1 to ${options.length}`
    );
  }
  return option.selector;
}
