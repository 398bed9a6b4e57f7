export interface AudioArtifact {
  id: string;
  fileName: string;
  localPath: string;
  publicUrl: string;
  sizeBytes: number;
  createdAt: Date;
}

export interface StoredAudio {
  id: string;
  data: Buffer;
  createdAt: Date;
}

/** Write side of the artifact store, as seen by the dialogue engine. */
export interface AudioSink {
  put(data: Buffer): Promise<AudioArtifact>;
}

export interface AudioStoreOptions {
  dir: string;
  publicBaseUrl: string;
  /** Artifacts older than this are removed by sweep(). */
  maxAgeMs: number;
  sweepIntervalMs: number;
}
