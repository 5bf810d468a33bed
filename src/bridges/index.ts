/**
 * Binary Bridges - wrappers for the external tools
 */

export * from './tool.interfaces';
export * from './tool.tokens';
export { BinaryBridge } from './binary-bridge';
export { YtDlpBridge, YtDlpConfig, buildDownloadArgs } from './ytdlp-bridge';
export { FfprobeBridge, parseProbeOutput } from './ffprobe-bridge';
export { FfmpegBridge } from './ffmpeg-bridge';
export { ToolPaths, defaultToolPaths, getBinaryExtension } from './runtime-paths';
