/**
 * Capability interfaces for the external binaries.
 *
 * The pipeline only talks to these; the bridges in this folder implement them
 * by spawning yt-dlp, ffprobe and ffmpeg, and tests swap in in-memory fakes.
 */

export interface ToolRunOptions {
  processId?: string;
  /** Kill the process once it has run this long */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ToolRunResult {
  processId: string;
  success: boolean;
  exitCode: number | null;
  /** Wall-clock runtime in milliseconds */
  duration: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  aborted: boolean;
  error?: string;
}

export interface DownloadRequestOptions extends ToolRunOptions {
  /** Format selector passed to the extractor */
  format?: string;
}

export interface DownloaderTool {
  /**
   * Download `url` non-interactively into `outputTemplate` (which carries the
   * `%(ext)s` placeholder). Resolves with success=false on a download error;
   * rejects only when the binary cannot be run.
   */
  download(url: string, outputTemplate: string, options?: DownloadRequestOptions): Promise<ToolRunResult>;
}

export interface ProbeStream {
  index: number;
  codec_type?: string;
  duration?: string;
}

export interface ProbeFormat {
  filename?: string;
  format_name?: string;
  duration?: string;
  size?: string;
}

export interface ProbeOutput {
  streams: ProbeStream[];
  format?: ProbeFormat;
}

export interface ProbeTool {
  /** Raw text of the container duration field (may be empty or "N/A") */
  queryDuration(filePath: string, options?: ToolRunOptions): Promise<string>;
  /** Full structural description of the container */
  probe(filePath: string, options?: ToolRunOptions): Promise<ProbeOutput>;
}

export interface TranscoderTool {
  run(args: string[], options?: ToolRunOptions): Promise<ToolRunResult>;
}
