import { z } from 'zod';

/**
 * Input to one conversion: where to fetch from and where output may be written.
 */
export interface ConversionRequest {
  url: string;
  tempDir: string;
}

/**
 * Metadata returned by the engine. A non-empty `entries` list is a playlist.
 */
export interface MediaInfo {
  id?: string;
  title?: string | null;
  entries?: (MediaInfo | null)[];
}

export type EngineProgress =
  | {
      status: 'downloading';
      downloadedBytes?: number;
      totalBytes?: number;
      totalBytesEstimate?: number;
      speed?: number;
      eta?: number;
      filename?: string;
    }
  | { status: 'finished'; filename?: string };

export interface EngineHooks {
  onProgress?: (progress: EngineProgress) => void;
}

/**
 * The external fetch/transcode collaborator. Rejects with the engine's own
 * message on failure.
 */
export interface MediaEngine {
  extract(request: ConversionRequest, hooks?: EngineHooks): Promise<MediaInfo>;
}

export const MediaInfoSchema: z.ZodType<MediaInfo> = z.lazy(() =>
  z.object({
    id: z.string().optional(),
    title: z.string().nullish(),
    entries: z.array(MediaInfoSchema.nullable()).optional(),
  }),
);

const optionalNumber = z
  .number()
  .nullish()
  .transform((v) => (typeof v === 'number' && Number.isFinite(v) ? v : undefined));

const optionalString = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined);

/**
 * yt-dlp progress dict, as printed by `--progress-template '%(progress)j'`.
 */
export const RawProgressSchema = z.object({
  status: z.string(),
  downloaded_bytes: optionalNumber,
  total_bytes: optionalNumber,
  total_bytes_estimate: optionalNumber,
  speed: optionalNumber,
  eta: optionalNumber,
  filename: optionalString,
});

export function toEngineProgress(raw: z.infer<typeof RawProgressSchema>): EngineProgress | null {
  if (raw.status === 'downloading') {
    return {
      status: 'downloading',
      downloadedBytes: raw.downloaded_bytes,
      totalBytes: raw.total_bytes,
      totalBytesEstimate: raw.total_bytes_estimate,
      speed: raw.speed,
      eta: raw.eta,
      filename: raw.filename,
    };
  }
  if (raw.status === 'finished') {
    return { status: 'finished', filename: raw.filename };
  }
  return null;
}
