export const DOWNLOADER_TOOL = Symbol('DOWNLOADER_TOOL');
export const PROBE_TOOL = Symbol('PROBE_TOOL');
export const TRANSCODER_TOOL = Symbol('TRANSCODER_TOOL');
