// sign-clip-pipeline/src/common/interfaces/manifest.interface.ts

/**
 * One manifest record as read from the CSV, before any coercion.
 * Column names follow the manifest builder's output.
 */
export interface RawManifestRow {
  id?: string;
  url?: string;
  frame_start?: string;
  frame_end?: string;
  fps?: string;
  dataset_type?: string;
  /** Source filename from the dataset JSON, carried into the audit log */
  filename?: string;
  [column: string]: string | undefined;
}

/** A validated clip request */
export interface ManifestRow {
  id: number;
  url: string;
  frameStart: number;
  /** -1 keeps the source through its end */
  frameEnd: number;
  fps: number;
  datasetTag?: string;
}
