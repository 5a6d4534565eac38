import { z } from "zod";

/**
 * A single format entry from the engine's JSON metadata.
 * Fields the engine leaves out or sets to null are accepted as absent.
 */
export const engineFormatSchema = z.object({
  format_id: z.string().nullish(),
  ext: z.string().nullish(),
  resolution: z.string().nullish(),
  filesize: z.number().nullish(),
  filesize_approx: z.number().nullish(),
  vcodec: z.string().nullish(),
  acodec: z.string().nullish(),
  height: z.number().nullish(),
  fps: z.number().nullish(),
});

export type EngineFormat = z.infer<typeof engineFormatSchema>;

/**
 * A flat playlist entry. Unresolved entries may be null.
 */
export const engineEntrySchema = z.object({
  url: z.string().nullish(),
  webpage_url: z.string().nullish(),
  title: z.string().nullish(),
  duration: z.number().nullish(),
  thumbnail: z.string().nullish(),
});

export type EngineEntry = z.infer<typeof engineEntrySchema>;

/**
 * Metadata document produced by one engine query (`yt-dlp -J`).
 */
export const engineInfoSchema = z.object({
  _type: z.string().nullish(),
  id: z.string().nullish(),
  title: z.string().nullish(),
  uploader: z.string().nullish(),
  duration: z.number().nullish(),
  thumbnail: z.string().nullish(),
  webpage_url: z.string().nullish(),
  formats: z.array(engineFormatSchema).nullish(),
  entries: z.array(engineEntrySchema.nullable()).nullish(),
});

export type EngineInfo = z.infer<typeof engineInfoSchema>;
