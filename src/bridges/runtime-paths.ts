/**
 * Default binary locations for the external tools.
 * Binaries are looked up on PATH unless the configuration names a full path.
 */

export interface ToolPaths {
  ytdlp: string;
  ffmpeg: string;
  ffprobe: string;
}

/**
 * Get platform-specific binary extension
 */
export function getBinaryExtension(): string {
  return process.platform === 'win32' ? '.exe' : '';
}

export function defaultToolPaths(): ToolPaths {
  const ext = getBinaryExtension();
  return {
    ytdlp: `yt-dlp${ext}`,
    ffmpeg: `ffmpeg${ext}`,
    ffprobe: `ffprobe${ext}`,
  };
}
