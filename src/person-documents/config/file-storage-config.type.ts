export type FileStorageConfig = {
  /** Directory that stored file paths are resolved against */
  basePath: string;
};
