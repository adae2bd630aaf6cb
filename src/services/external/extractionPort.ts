/**
 * Extraction Port
 * Boundary to the external video-fetching engine and to the transcoder.
 * The core only sees these interfaces; the yt-dlp and ffmpeg adapters implement them.
 */

/** Environment-specific engine switches. Opaque to the core. */
export interface ExtractionOptions {
  /** Browser profile to read cookies from (yt-dlp --cookies-from-browser) */
  cookiesFromBrowser?: string;
  /** yt-dlp --remote-components value */
  remoteComponents?: string;
  /** Passed through verbatim */
  extraArgs?: string[];
}

export interface VideoInfo {
  title: string;
  durationSeconds: number;
  uploader: string;
  thumbnail?: string;
}

export interface RawProgress {
  downloadedBytes: number;
  totalBytes: number;
}

export interface ExtractionRequest {
  url: string;
  /** Ranked format selector, alternatives separated by "/" */
  format: string;
  /** Output path template, e.g. /downloads/%(title)s.%(ext)s */
  outputTemplate: string;
  /** Container to merge separate video+audio streams into */
  mergeOutputFormat?: string;
  /** Move the moov atom to the front when merging */
  faststart?: boolean;
  /** Audio extraction post-step */
  extractAudio?: { codec: string; quality: string };
  options?: ExtractionOptions;
}

export interface ExtractionResult {
  /** Final file path as reported by the engine */
  filePath: string;
  title: string;
  /** Engine-reported video codec, when known ("none" for audio) */
  vcodec?: string;
}

export interface ExtractionPort {
  probe(url: string, options?: ExtractionOptions): Promise<VideoInfo>;
  download(
    request: ExtractionRequest,
    onProgress: (progress: RawProgress) => void,
    signal?: AbortSignal
  ): Promise<ExtractionResult>;
}

export interface TranscoderPort {
  /** Codec name of the first video stream, undefined when there is none */
  probeVideoCodec(filePath: string): Promise<string | undefined>;
  /** H.264 + AAC with fast-start into outputPath. Rejects on non-zero exit. */
  reencodeToH264(inputPath: string, outputPath: string, signal?: AbortSignal): Promise<void>;
}
