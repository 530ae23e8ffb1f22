export type FileSample = {
  sizeBytes: number;
  mtimeMs: number;
};

/** Cheap metadata read used to decide whether a file has stopped changing. */
export interface FileProbe {
  sample(absolutePath: string): Promise<FileSample | null>;
}
